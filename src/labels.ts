/** Axis title: the property name, then ", <unit>" when a unit is given. */
export function axisLabel(property: string, unit = ""): string {
	const u = unit.trim();
	return u ? `${property}, ${u}` : property;
}
