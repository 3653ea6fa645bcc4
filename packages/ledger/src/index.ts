/**
 * Stablecoin Escrow Ledger
 *
 * Custodial escrow for peer-to-peer stablecoin trades: a state machine over
 * deterministically addressed custody vaults, deadline enforcement and a
 * bonded dispute protocol settled by an arbitrator.
 *
 * @example
 * ```typescript
 * import {
 *   EscrowLedger,
 *   MemoryLedgerStorage,
 *   ManualClock,
 * } from "@stablecoin-escrow/ledger";
 *
 * const ledger = new EscrowLedger({
 *   storage: new MemoryLedgerStorage(),
 *   programId,
 *   arbitrator,
 *   clock: new ManualClock(),
 * });
 *
 * ledger.subscribe((event) => console.log(event.type));
 * ```
 */

// Core - amounts, identifiers, presence and errors
export {
	type Amount,
	type Address,
	type Hash32,
	type U64Id,
	type PartyRole,
	type Maybe,
	type Some,
	type None,
	type LedgerErrorKind,
	type LedgerErrorCode,
	AMOUNT_DECIMALS,
	U64_MAX,
	U64_ID_MAX,
	MAX_AMOUNT,
	BPS_DENOMINATOR,
	FEE_BPS,
	DISPUTE_BOND_BPS,
	LEDGER_ERROR_CODES,
	LedgerError,
	isLedgerError,
	checkedAdd,
	checkedSub,
	checkedMul,
	basisPoints,
	computeFee,
	computeBond,
	validateAmount,
	parseAmount,
	formatAmount,
	otherRole,
	validateAddress,
	validateHash32,
	validateU64Id,
	some,
	none,
	isSome,
	isNone,
	unwrapOr,
	toNullable,
	fromNullable,
} from "./core/index.js";

// Contracts - transition tables
export {
	type ContractErrorCode,
	type Edge,
	type StateSpec,
	type TransitionTableConfig,
	ContractError,
	TransitionTable,
	defineState,
	edge,
} from "./contracts/index.js";

// Addressing - deterministic derivation
export {
	type Seed,
	type VaultKind,
	type EscrowAddresses,
	SEED_TAGS,
	deriveAddress,
	encodeU64LE,
	escrowSeeds,
	vaultSeeds,
	bondVaultKind,
	deriveEscrowAddress,
	deriveVaultAddress,
	deriveEscrowAddresses,
} from "./addressing/index.js";

// Custody - token accounts and vaults
export {
	type AccountKind,
	type TokenAccount,
	type TransferSigner,
	type VaultSpec,
	Custody,
} from "./custody/index.js";

// Clock
export { type Clock, SystemClock, ManualClock } from "./clock/index.js";

// Storage - pluggable persistence
export {
	type LedgerStorage,
	type TransactionalLedgerStorage,
	type EscrowQueryOptions,
	type AccountQueryOptions,
	type QueryResult,
	StorageError,
	MemoryLedgerStorage,
} from "./storage/index.js";

// Events
export {
	type LedgerEvent,
	type LedgerEventType,
	type LedgerEventListener,
	type EscrowCreatedEvent,
	type FundsDepositedEvent,
	type FiatMarkedPaidEvent,
	type SequentialAddressUpdatedEvent,
	type EscrowReleasedEvent,
	type EscrowCancelledEvent,
	type BondAccountInitializedEvent,
	type DisputeOpenedEvent,
	type DisputeResponseSubmittedEvent,
	type DisputeResolvedEvent,
	type DisputeDefaultJudgmentEvent,
	LedgerEventBus,
} from "./events/index.js";

// Inspection
export {
	type VaultReport,
	type EscrowInspection,
	expectedVaultBalances,
	inspectEscrow,
} from "./inspection/index.js";

// Logging
export { type LedgerLogger, silentLogger } from "./logger.js";

// Escrow module
export * from "./modules/escrow/index.js";

// Utilities
export { bytesToHex, hexToBytes } from "./utils/index.js";
