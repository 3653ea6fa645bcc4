/**
 * Storage Adapter Types
 *
 * Interfaces for pluggable storage backends. The ledger persists escrow
 * records and token accounts; hosts bring their own persistence layer by
 * implementing these.
 */

import type { Address } from "../core/types.js";
import type { AccountKind, TokenAccount } from "../custody/types.js";
import type { EscrowRecord, EscrowState } from "../modules/escrow/types.js";

/**
 * Query options for listing escrow records.
 */
export interface EscrowQueryOptions {
	/** Filter by state(s) */
	state?: EscrowState | EscrowState[];
	/** Filter by a party appearing as seller or buyer */
	party?: Address;
	/** Maximum number of results */
	limit?: number;
	/** Number of results to skip */
	offset?: number;
	/** Sort direction on createdAt */
	sortOrder?: "asc" | "desc";
}

/**
 * Query result with pagination info.
 */
export interface QueryResult<T> {
	/** The items matching the query */
	items: T[];
	/** Total count of matching items (before pagination) */
	total: number;
	/** Whether there are more items */
	hasMore: boolean;
}

export interface AccountQueryOptions {
	escrow?: Address;
	kind?: AccountKind;
}

/**
 * Storage adapter interface.
 *
 * Loads return copies; callers persist changes through the save methods.
 */
export interface LedgerStorage {
	loadEscrow(address: Address): Promise<EscrowRecord | null>;

	/**
	 * Create or replace the record stored at `record.address`.
	 */
	saveEscrow(record: EscrowRecord): Promise<void>;

	queryEscrows(options?: EscrowQueryOptions): Promise<QueryResult<EscrowRecord>>;

	loadAccount(address: Address): Promise<TokenAccount | null>;

	saveAccount(account: TokenAccount): Promise<void>;

	/**
	 * Should succeed even if the account doesn't exist.
	 */
	deleteAccount(address: Address): Promise<void>;

	listAccounts(options?: AccountQueryOptions): Promise<TokenAccount[]>;
}

/**
 * Storage adapter with transaction support.
 *
 * `fn` receives a storage scoped to the transaction. If it throws, nothing
 * it wrote is kept.
 */
export interface TransactionalLedgerStorage extends LedgerStorage {
	withTransaction<T>(fn: (tx: LedgerStorage) => Promise<T>): Promise<T>;
}

/**
 * Error thrown by storage operations.
 */
export class StorageError extends Error {
	constructor(
		message: string,
		public readonly code?: string,
		public readonly details?: unknown,
	) {
		super(message);
		this.name = "StorageError";
	}
}
