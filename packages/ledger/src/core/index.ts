/**
 * Core module - amounts, identifiers, presence and errors
 */

export {
	type Amount,
	AMOUNT_DECIMALS,
	U64_MAX,
	MAX_AMOUNT,
	BPS_DENOMINATOR,
	FEE_BPS,
	DISPUTE_BOND_BPS,
	checkedAdd,
	checkedSub,
	checkedMul,
	basisPoints,
	computeFee,
	computeBond,
	validateAmount,
	parseAmount,
	formatAmount,
} from "./amounts.js";

export {
	type Address,
	type Hash32,
	type U64Id,
	type PartyRole,
	U64_ID_MAX,
	otherRole,
	validateAddress,
	validateHash32,
	validateU64Id,
} from "./types.js";

export {
	type Maybe,
	type Some,
	type None,
	some,
	none,
	isSome,
	isNone,
	unwrapOr,
	toNullable,
	fromNullable,
} from "./maybe.js";

export {
	type LedgerErrorKind,
	type LedgerErrorCode,
	LEDGER_ERROR_CODES,
	LedgerError,
	isLedgerError,
} from "./errors.js";
