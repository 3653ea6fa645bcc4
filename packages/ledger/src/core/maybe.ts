/**
 * Explicit presence for optional ledger fields.
 *
 * Fields such as the sequential forwarding address or a party's evidence
 * hash are either written once or absent. They are never nullable pointers.
 */

export type Some<T> = { readonly kind: "some"; readonly value: T };
export type None = { readonly kind: "none" };
export type Maybe<T> = Some<T> | None;

export function some<T>(value: T): Some<T> {
	return { kind: "some", value };
}

export function none(): None {
	return { kind: "none" };
}

export function isSome<T>(maybe: Maybe<T>): maybe is Some<T> {
	return maybe.kind === "some";
}

export function isNone<T>(maybe: Maybe<T>): maybe is None {
	return maybe.kind === "none";
}

export function unwrapOr<T>(maybe: Maybe<T>, fallback: T): T {
	return maybe.kind === "some" ? maybe.value : fallback;
}

/**
 * Convert to a nullable value at a serialization boundary.
 */
export function toNullable<T>(maybe: Maybe<T>): T | null {
	return maybe.kind === "some" ? maybe.value : null;
}

export function fromNullable<T>(value: T | null | undefined): Maybe<T> {
	return value === null || value === undefined ? none() : some(value);
}
