/**
 * Minimal logger surface. A NestJS `Logger` satisfies it.
 */
export interface LedgerLogger {
	log(message: string): void;
	warn(message: string): void;
	error(message: string, stack?: string): void;
}

export const silentLogger: LedgerLogger = {
	log: () => {},
	warn: () => {},
	error: () => {},
};
