/**
 * JSON.stringify that renders bigints as decimal strings.
 */
export function toJson(value: unknown): string {
	return JSON.stringify(value, (_key, v: unknown) =>
		typeof v === "bigint" ? v.toString() : v,
	);
}
