import { sha256 } from "@noble/hashes/sha2";
import { utf8ToBytes } from "@noble/hashes/utils";

export const SIGNER_HEADER = "x-signer";
export const TIMESTAMP_HEADER = "x-timestamp";
export const SIGNATURE_HEADER = "x-signature";

export type SignedRequestParts = {
	/** Unix epoch in milliseconds, as sent in the header */
	timestamp: string;
	method: string;
	/** Path with query string */
	path: string;
	/** Output of `serializeBody` */
	body: string;
};

/**
 * Requests without a body, or with an empty JSON object, sign the empty
 * string.
 */
export function serializeBody(body: unknown): string {
	if (body === undefined || body === null) return "";
	if (typeof body === "object" && Object.keys(body).length === 0) return "";
	return JSON.stringify(body);
}

/**
 * sha256("{timestamp}:{METHOD}:{path}:{body}"), the message a party signs
 * with its Schnorr key.
 */
export function signedRequestDigest(parts: SignedRequestParts): Uint8Array {
	return sha256(
		utf8ToBytes(
			`${parts.timestamp}:${parts.method.toUpperCase()}:${parts.path}:${parts.body}`,
		),
	);
}
