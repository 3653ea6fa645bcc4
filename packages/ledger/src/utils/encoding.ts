/**
 * Byte helpers shared by addressing and validation.
 *
 * Hex on the ledger is always lowercase; decoding accepts either case.
 */

import { concatBytes as concat, utf8ToBytes } from "@noble/hashes/utils";
import { hex } from "@scure/base";

const HEX_DIGITS = /^[0-9a-fA-F]*$/;

export const bytesToHex = (bytes: Uint8Array): string => hex.encode(bytes);

/** @throws when `value` has odd length or a non-hex digit */
export const hexToBytes = (value: string): Uint8Array =>
	hex.decode(value.toLowerCase());

export const stringToBytes = (value: string): Uint8Array => utf8ToBytes(value);

export const concatBytes = (...parts: Uint8Array[]): Uint8Array => concat(...parts);

/** True when `value` renders exactly `byteLength` bytes */
export function isHexOfLength(value: string, byteLength: number): boolean {
	return value.length === byteLength * 2 && HEX_DIGITS.test(value);
}
