/**
 * In-Memory Storage Adapter
 *
 * A simple in-memory storage adapter for testing and development.
 * Data is lost when the process exits.
 */

import type { Address } from "../core/types.js";
import type { TokenAccount } from "../custody/types.js";
import type { EscrowRecord } from "../modules/escrow/types.js";
import type {
	AccountQueryOptions,
	EscrowQueryOptions,
	LedgerStorage,
	QueryResult,
	TransactionalLedgerStorage,
} from "./types.js";

/**
 * In-memory storage adapter.
 *
 * Records are cloned on the way in and out, so callers never share
 * references with the store. A transaction works on a copy of both maps and
 * swaps them in on success. Transactions are not isolated from each other;
 * the ledger runs one at a time.
 *
 * @example
 * ```typescript
 * const storage = new MemoryLedgerStorage();
 * const ledger = new EscrowLedger({ storage, programId, arbitrator });
 * ```
 */
export class MemoryLedgerStorage implements TransactionalLedgerStorage {
	private escrows: Map<Address, EscrowRecord>;
	private accounts: Map<Address, TokenAccount>;

	constructor(
		escrows: Map<Address, EscrowRecord> = new Map(),
		accounts: Map<Address, TokenAccount> = new Map(),
	) {
		this.escrows = escrows;
		this.accounts = accounts;
	}

	async withTransaction<T>(fn: (tx: LedgerStorage) => Promise<T>): Promise<T> {
		// Stored values are never handed out, so copying the maps is enough.
		const scope = new MemoryLedgerStorage(
			new Map(this.escrows),
			new Map(this.accounts),
		);
		const result = await fn(scope);
		this.escrows = scope.escrows;
		this.accounts = scope.accounts;
		return result;
	}

	async loadEscrow(address: Address): Promise<EscrowRecord | null> {
		const record = this.escrows.get(address);
		return record ? structuredClone(record) : null;
	}

	async saveEscrow(record: EscrowRecord): Promise<void> {
		this.escrows.set(record.address, structuredClone(record));
	}

	async queryEscrows(
		options?: EscrowQueryOptions,
	): Promise<QueryResult<EscrowRecord>> {
		let records = Array.from(this.escrows.values());

		if (options?.state) {
			const states = Array.isArray(options.state)
				? options.state
				: [options.state];
			records = records.filter((r) => states.includes(r.phase.state));
		}

		const party = options?.party;
		if (party) {
			records = records.filter((r) => r.seller === party || r.buyer === party);
		}

		const total = records.length;

		const sortOrder = options?.sortOrder ?? "desc";
		records.sort((a, b) =>
			sortOrder === "asc"
				? a.createdAt - b.createdAt
				: b.createdAt - a.createdAt,
		);

		const offset = options?.offset ?? 0;
		const limit = options?.limit ?? records.length;
		const items = records
			.slice(offset, offset + limit)
			.map((r) => structuredClone(r));

		return {
			items,
			total,
			hasMore: offset + items.length < total,
		};
	}

	async loadAccount(address: Address): Promise<TokenAccount | null> {
		const account = this.accounts.get(address);
		return account ? structuredClone(account) : null;
	}

	async saveAccount(account: TokenAccount): Promise<void> {
		this.accounts.set(account.address, structuredClone(account));
	}

	async deleteAccount(address: Address): Promise<void> {
		this.accounts.delete(address);
	}

	async listAccounts(options?: AccountQueryOptions): Promise<TokenAccount[]> {
		return Array.from(this.accounts.values())
			.filter((a) => {
				if (options?.kind && a.kind !== options.kind) return false;
				if (options?.escrow) {
					return a.escrow.kind === "some" && a.escrow.value === options.escrow;
				}
				return true;
			})
			.map((a) => structuredClone(a));
	}
}
