import type { ZodIssue } from "zod";

/** Base class for contract violations raised by this package. */
export class AshbyError extends Error {
	constructor(message: string) {
		super(message);
		this.name = new.target.name;
	}
}

export class UnknownPropertyError extends AshbyError {
	readonly property: string;

	constructor(property: string) {
		super(`Property "${property}" has no column descriptor`);
		this.property = property;
	}
}

export class MissingCategoryColumnError extends AshbyError {
	readonly column: string;

	constructor(column: string) {
		super(`Category column "${column}" not found in table`);
		this.column = column;
	}
}

export class InvalidPlotRequestError extends AshbyError {
	readonly issues: ZodIssue[];

	constructor(issues: ZodIssue[]) {
		super(
			`Invalid plot request: ${issues
				.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
				.join("; ")}`,
		);
		this.issues = issues;
	}
}
