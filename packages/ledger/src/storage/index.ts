/**
 * Storage module - Pluggable persistence for escrow records and accounts
 */

export type {
	LedgerStorage,
	TransactionalLedgerStorage,
	EscrowQueryOptions,
	AccountQueryOptions,
	QueryResult,
} from "./types.js";

export { StorageError } from "./types.js";

export { MemoryLedgerStorage } from "./memory-adapter.js";
