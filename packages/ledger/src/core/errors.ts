/**
 * Ledger errors
 *
 * Every failure aborts the whole operation and surfaces a specific code.
 * Each code belongs to exactly one kind.
 */

import { ContractError } from "../contracts/types.js";

export type LedgerErrorKind =
	| "validation"
	| "authorization"
	| "state"
	| "deadline"
	| "funds"
	| "reinitialization"
	| "not-found";

export const LEDGER_ERROR_CODES = {
	// validation
	INVALID_AMOUNT: "validation",
	AMOUNT_TOO_LARGE: "validation",
	ARITHMETIC_OVERFLOW: "validation",
	ARITHMETIC_UNDERFLOW: "validation",
	INVALID_IDENTIFIER: "validation",
	INVALID_ADDRESS: "validation",
	INVALID_HASH: "validation",
	INVALID_SEEDS: "validation",
	INVALID_PARTIES: "validation",
	MISSING_SEQUENTIAL_ADDRESS: "validation",
	NOT_SEQUENTIAL: "validation",
	DUPLICATE_EVIDENCE: "validation",

	// authorization
	UNAUTHORIZED: "authorization",
	INVALID_SIGNER: "authorization",

	// state
	INVALID_STATE: "state",
	FIAT_NOT_PAID: "state",
	FIAT_ALREADY_PAID: "state",
	ALREADY_RESPONDED: "state",
	EVIDENCE_INCOMPLETE: "state",
	NO_BOND_POSTED: "state",
	VAULT_NOT_EMPTY: "state",
	VAULT_NOT_FOUND: "state",

	// deadline
	DEPOSIT_DEADLINE_EXPIRED: "deadline",
	FIAT_DEADLINE_EXPIRED: "deadline",
	RESPONSE_DEADLINE_EXPIRED: "deadline",
	RESPONSE_DEADLINE_NOT_REACHED: "deadline",
	ARBITRATION_DEADLINE_EXPIRED: "deadline",
	DEADLINE_NOT_REACHED: "deadline",

	// funds
	INSUFFICIENT_FUNDS: "funds",

	// reinitialization
	ALREADY_INITIALIZED: "reinitialization",
	ESCROW_EXISTS: "reinitialization",

	// not-found
	ESCROW_NOT_FOUND: "not-found",
} as const satisfies Record<string, LedgerErrorKind>;

export type LedgerErrorCode = keyof typeof LEDGER_ERROR_CODES;

/**
 * Error thrown by ledger operations.
 *
 * @example
 * ```typescript
 * try {
 *   await ledger.releaseEscrow(seller, address);
 * } catch (err) {
 *   if (err instanceof LedgerError && err.kind === "state") {
 *     // e.g. FIAT_NOT_PAID
 *   }
 * }
 * ```
 */
export class LedgerError extends ContractError {
	declare readonly code: LedgerErrorCode;
	readonly kind: LedgerErrorKind;

	constructor(code: LedgerErrorCode, message: string, details?: unknown) {
		super(message, code, details);
		this.name = "LedgerError";
		this.kind = LEDGER_ERROR_CODES[code];
	}
}

export function isLedgerError(err: unknown): err is LedgerError {
	return err instanceof LedgerError;
}
