export interface Logger {
	debug(message: string, ...args: unknown[]): void;
	warn(message: string, ...args: unknown[]): void;
}

export const consoleLogger: Logger = {
	debug: (message, ...args) => console.debug(`[ashby] ${message}`, ...args),
	warn: (message, ...args) => console.warn(`[ashby] ${message}`, ...args),
};

export const silentLogger: Logger = {
	debug: () => {},
	warn: () => {},
};
