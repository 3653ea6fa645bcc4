/**
 * Fixed-point amounts
 *
 * Amounts are unsigned 64-bit integers with 6 implied decimals, carried as
 * bigint. Arithmetic is checked: overflow and underflow throw instead of
 * wrapping or saturating.
 */

import { LedgerError } from "./errors.js";

export type Amount = bigint;

export const AMOUNT_DECIMALS = 6;
export const U64_MAX: Amount = (1n << 64n) - 1n;

/** 100 units */
export const MAX_AMOUNT: Amount = 100_000_000n;

export const BPS_DENOMINATOR = 10_000n;
export const FEE_BPS = 100n;
export const DISPUTE_BOND_BPS = 500n;

function assertU64(value: Amount, operation: string): Amount {
	if (value < 0n) {
		throw new LedgerError(
			"ARITHMETIC_UNDERFLOW",
			`Arithmetic underflow in ${operation}`,
			{ value: value.toString() },
		);
	}
	if (value > U64_MAX) {
		throw new LedgerError(
			"ARITHMETIC_OVERFLOW",
			`Arithmetic overflow in ${operation}`,
			{ value: value.toString() },
		);
	}
	return value;
}

export function checkedAdd(a: Amount, b: Amount): Amount {
	return assertU64(assertU64(a, "add") + assertU64(b, "add"), "add");
}

export function checkedSub(a: Amount, b: Amount): Amount {
	return assertU64(assertU64(a, "sub") - assertU64(b, "sub"), "sub");
}

export function checkedMul(a: Amount, b: Amount): Amount {
	return assertU64(assertU64(a, "mul") * assertU64(b, "mul"), "mul");
}

/**
 * `amount * bps / 10_000`, floored. The intermediate product is checked too.
 */
export function basisPoints(amount: Amount, bps: Amount): Amount {
	return checkedMul(amount, bps) / BPS_DENOMINATOR;
}

/** 1% of the principal */
export function computeFee(amount: Amount): Amount {
	return basisPoints(amount, FEE_BPS);
}

/** 5% of the principal */
export function computeBond(amount: Amount): Amount {
	return basisPoints(amount, DISPUTE_BOND_BPS);
}

export function validateAmount(amount: Amount): Amount {
	if (amount <= 0n) {
		throw new LedgerError(
			"INVALID_AMOUNT",
			"Invalid amount: Zero or negative",
			{ amount: amount.toString() },
		);
	}
	if (amount > MAX_AMOUNT) {
		throw new LedgerError(
			"AMOUNT_TOO_LARGE",
			`Invalid amount: exceeds maximum of ${MAX_AMOUNT}`,
			{ amount: amount.toString(), max: MAX_AMOUNT.toString() },
		);
	}
	return amount;
}

/**
 * Parse a decimal integer string (base units) into an Amount.
 */
export function parseAmount(value: string): Amount {
	if (!/^\d+$/.test(value)) {
		throw new LedgerError("INVALID_AMOUNT", `Invalid amount: ${value}`);
	}
	return assertU64(BigInt(value), "parse");
}

/**
 * Render base units with the implied decimals, e.g. 1_010_000n -> "1.010000".
 */
export function formatAmount(amount: Amount): string {
	const scale = 10n ** BigInt(AMOUNT_DECIMALS);
	const whole = amount / scale;
	const fraction = (amount % scale).toString().padStart(AMOUNT_DECIMALS, "0");
	return `${whole}.${fraction}`;
}
