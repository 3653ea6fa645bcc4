/**
 * TypeORM Storage Adapter
 *
 * Implements the ledger's TransactionalLedgerStorage on top of TypeORM. A
 * transaction hands the ledger an adapter bound to the transaction's
 * EntityManager, so every read and write of one operation commits or rolls
 * back together.
 */

import type { DataSource, EntityManager, Repository } from "typeorm";
import {
	type AccountQueryOptions,
	type EscrowQueryOptions,
	type EscrowRecord,
	type LedgerStorage,
	type QueryResult,
	type TokenAccount,
	type TransactionalLedgerStorage,
	StorageError,
	fromNullable,
	toNullable,
} from "@stablecoin-escrow/ledger";
import { EscrowRecordEntity } from "./entities/escrow-record.entity";
import { TokenAccountEntity } from "./entities/token-account.entity";
import { decodePhase, encodePhase } from "./phase.codec";

export function toRecordEntity(record: EscrowRecord): EscrowRecordEntity {
	const entity = new EscrowRecordEntity();
	entity.address = record.address;
	entity.escrowId = record.escrowId;
	entity.tradeId = record.tradeId;
	entity.seller = record.seller;
	entity.buyer = record.buyer;
	entity.arbitrator = record.arbitrator;
	entity.amount = record.amount;
	entity.fee = record.fee;
	entity.depositDeadline = record.depositDeadline;
	entity.fiatDeadline = record.fiatDeadline;
	entity.sequential = record.sequential;
	entity.fiatPaid = record.fiatPaid;
	entity.counter = record.counter;
	entity.trackedBalance = record.trackedBalance;
	entity.state = record.phase.state;
	entity.phase = encodePhase(record.phase);
	entity.createdAt = record.createdAt;
	entity.updatedAt = record.updatedAt;
	return entity;
}

export function fromRecordEntity(entity: EscrowRecordEntity): EscrowRecord {
	return {
		address: entity.address,
		escrowId: entity.escrowId,
		tradeId: entity.tradeId,
		seller: entity.seller,
		buyer: entity.buyer,
		arbitrator: entity.arbitrator,
		amount: entity.amount,
		fee: entity.fee,
		depositDeadline: entity.depositDeadline,
		fiatDeadline: entity.fiatDeadline,
		sequential: entity.sequential,
		fiatPaid: entity.fiatPaid,
		counter: entity.counter,
		trackedBalance: entity.trackedBalance,
		createdAt: entity.createdAt,
		updatedAt: entity.updatedAt,
		phase: decodePhase(entity.phase),
	};
}

function toAccountEntity(account: TokenAccount): TokenAccountEntity {
	const entity = new TokenAccountEntity();
	entity.address = account.address;
	entity.owner = account.owner;
	entity.kind = account.kind;
	entity.escrow = toNullable(account.escrow);
	entity.balance = account.balance;
	return entity;
}

function fromAccountEntity(entity: TokenAccountEntity): TokenAccount {
	return {
		address: entity.address,
		owner: entity.owner,
		kind: entity.kind,
		escrow: fromNullable(entity.escrow),
		balance: entity.balance,
	};
}

/**
 * TypeORM-based storage adapter for the escrow ledger.
 *
 * @example
 * ```typescript
 * const storage = new TypeOrmLedgerStorage(dataSource);
 * const ledger = new EscrowLedger({ storage, programId, arbitrator });
 * ```
 */
export class TypeOrmLedgerStorage implements TransactionalLedgerStorage {
	private readonly records: Repository<EscrowRecordEntity>;
	private readonly accounts: Repository<TokenAccountEntity>;

	constructor(
		private readonly dataSource: DataSource,
		manager: EntityManager = dataSource.manager,
	) {
		this.records = manager.getRepository(EscrowRecordEntity);
		this.accounts = manager.getRepository(TokenAccountEntity);
	}

	async withTransaction<T>(fn: (tx: LedgerStorage) => Promise<T>): Promise<T> {
		return this.dataSource.transaction((manager) =>
			fn(new TypeOrmLedgerStorage(this.dataSource, manager)),
		);
	}

	async loadEscrow(address: string): Promise<EscrowRecord | null> {
		try {
			const entity = await this.records.findOne({ where: { address } });
			return entity ? fromRecordEntity(entity) : null;
		} catch (error) {
			throw new StorageError(`Failed to load escrow ${address}`, "LOAD_ERROR", {
				error,
			});
		}
	}

	async saveEscrow(record: EscrowRecord): Promise<void> {
		try {
			await this.records.save(toRecordEntity(record));
		} catch (error) {
			throw new StorageError(
				`Failed to save escrow ${record.address}`,
				"SAVE_ERROR",
				{ error },
			);
		}
	}

	async queryEscrows(
		options?: EscrowQueryOptions,
	): Promise<QueryResult<EscrowRecord>> {
		try {
			const qb = this.records.createQueryBuilder("e");

			if (options?.state) {
				const states = Array.isArray(options.state)
					? options.state
					: [options.state];
				qb.andWhere("e.state IN (:...states)", { states });
			}

			if (options?.party) {
				qb.andWhere("(e.seller = :party OR e.buyer = :party)", {
					party: options.party,
				});
			}

			const total = await qb.getCount();

			const order = options?.sortOrder === "asc" ? "ASC" : "DESC";
			qb.orderBy("e.createdAt", order).addOrderBy("e.address", order);

			const offset = options?.offset ?? 0;
			qb.skip(offset);
			if (options?.limit !== undefined) {
				qb.take(options.limit);
			}

			const entities = await qb.getMany();
			return {
				items: entities.map(fromRecordEntity),
				total,
				hasMore: offset + entities.length < total,
			};
		} catch (error) {
			throw new StorageError("Failed to query escrows", "QUERY_ERROR", {
				error,
			});
		}
	}

	async loadAccount(address: string): Promise<TokenAccount | null> {
		try {
			const entity = await this.accounts.findOne({ where: { address } });
			return entity ? fromAccountEntity(entity) : null;
		} catch (error) {
			throw new StorageError(`Failed to load account ${address}`, "LOAD_ERROR", {
				error,
			});
		}
	}

	async saveAccount(account: TokenAccount): Promise<void> {
		try {
			await this.accounts.save(toAccountEntity(account));
		} catch (error) {
			throw new StorageError(
				`Failed to save account ${account.address}`,
				"SAVE_ERROR",
				{ error },
			);
		}
	}

	async deleteAccount(address: string): Promise<void> {
		try {
			await this.accounts.delete({ address });
		} catch (error) {
			throw new StorageError(
				`Failed to delete account ${address}`,
				"DELETE_ERROR",
				{ error },
			);
		}
	}

	async listAccounts(options?: AccountQueryOptions): Promise<TokenAccount[]> {
		try {
			const entities = await this.accounts.find({
				where: {
					...(options?.kind ? { kind: options.kind } : {}),
					...(options?.escrow ? { escrow: options.escrow } : {}),
				},
			});
			return entities.map(fromAccountEntity);
		} catch (error) {
			throw new StorageError("Failed to list accounts", "LIST_ERROR", {
				error,
			});
		}
	}
}
