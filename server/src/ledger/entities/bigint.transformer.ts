import type { ValueTransformer } from "typeorm";

/**
 * u64 amounts and identifiers exceed SQLite's exact integer range for
 * JavaScript numbers, so they are stored as decimal text.
 */
export const bigintText: ValueTransformer = {
	to: (value: bigint | null | undefined) =>
		value === null || value === undefined ? value : value.toString(),
	from: (value: string | null) => (value === null ? null : BigInt(value)),
};
