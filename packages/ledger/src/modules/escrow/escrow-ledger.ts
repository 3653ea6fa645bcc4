/**
 * Escrow Ledger
 *
 * The record and transition logic for custodial escrows: creation,
 * deposit, fiat confirmation, release, cancellation and the bonded dispute
 * sub-protocol. Every operation runs as a single storage transaction and
 * publishes its event only after commit.
 */

import {
	type EscrowAddresses,
	bondVaultKind,
	deriveEscrowAddresses,
	escrowSeeds,
} from "../../addressing/derive.js";
import { type Clock, SystemClock } from "../../clock/clock.js";
import {
	type Amount,
	checkedAdd,
	computeBond,
	computeFee,
	validateAmount,
} from "../../core/amounts.js";
import { LedgerError } from "../../core/errors.js";
import { none, some } from "../../core/maybe.js";
import {
	type Address,
	type Hash32,
	type PartyRole,
	validateAddress,
	validateHash32,
	validateU64Id,
} from "../../core/types.js";
import { Custody } from "../../custody/custody.js";
import type { TokenAccount, TransferSigner } from "../../custody/types.js";
import { LedgerEventBus } from "../../events/event-bus.js";
import type { LedgerEvent, LedgerEventListener } from "../../events/types.js";
import {
	type EscrowInspection,
	inspectEscrow,
} from "../../inspection/reconciliation.js";
import { type LedgerLogger, silentLogger } from "../../logger.js";
import type {
	EscrowQueryOptions,
	LedgerStorage,
	QueryResult,
	TransactionalLedgerStorage,
} from "../../storage/types.js";
import {
	ARBITRATION_WINDOW_SECONDS,
	DEPOSIT_WINDOW_SECONDS,
	DISPUTE_RESPONSE_WINDOW_SECONDS,
	FIAT_WINDOW_SECONDS,
	assertDepositWindowOpen,
	assertFiatWindowOpen,
	assertResponseWindowElapsed,
	assertResponseWindowOpen,
	checkArbitrationDeadline,
	isAutoCancelEligible,
} from "./deadlines.js";
import { isFinalState, nextEscrowState } from "./escrow-state-machine.js";
import {
	bondVaultAddress,
	disputePlan,
	partyAddress,
	principalRecipient,
	refundPlan,
	releasePlan,
} from "./settlement.js";
import type {
	ArbitrationDeadlinePolicy,
	CreateEscrowParams,
	DisputeInfo,
	EscrowPhase,
	EscrowRecord,
	EscrowState,
	Payout,
} from "./types.js";

export interface EscrowLedgerOptions {
	storage: TransactionalLedgerStorage;
	/** Namespace for every derived address */
	programId: Address;
	/** Identity allowed to release, cancel and settle disputes */
	arbitrator: Address;
	clock?: Clock;
	logger?: LedgerLogger;
	/** Defaults to "warn" */
	arbitrationDeadlinePolicy?: ArbitrationDeadlinePolicy;
}

type Actor = "seller" | "buyer" | "arbitrator";

interface OperationContext {
	tx: LedgerStorage;
	custody: Custody;
	now: number;
}

interface OperationResult<T> {
	result: T;
	events: LedgerEvent[];
}

/**
 * Escrow Ledger
 *
 * @example
 * ```typescript
 * const ledger = new EscrowLedger({
 *   storage: new MemoryLedgerStorage(),
 *   programId,
 *   arbitrator,
 * });
 *
 * const escrow = await ledger.createEscrow(seller, {
 *   escrowId: 1n,
 *   tradeId: 42n,
 *   buyer,
 *   amount: 1_000_000n,
 *   sequential: false,
 * });
 * await ledger.fundEscrow(seller, escrow.address);
 * await ledger.markFiatPaid(buyer, escrow.address);
 * await ledger.releaseEscrow(seller, escrow.address);
 * ```
 */
export class EscrowLedger {
	readonly programId: Address;
	readonly arbitrator: Address;
	private readonly storage: TransactionalLedgerStorage;
	private readonly clock: Clock;
	private readonly logger: LedgerLogger;
	private readonly arbitrationDeadlinePolicy: ArbitrationDeadlinePolicy;
	private readonly events: LedgerEventBus;
	private tail: Promise<void> = Promise.resolve();

	constructor(options: EscrowLedgerOptions) {
		this.programId = validateAddress(options.programId, "programId");
		this.arbitrator = validateAddress(options.arbitrator, "arbitrator");
		this.storage = options.storage;
		this.clock = options.clock ?? new SystemClock();
		this.logger = options.logger ?? silentLogger;
		this.arbitrationDeadlinePolicy = options.arbitrationDeadlinePolicy ?? "warn";
		this.events = new LedgerEventBus(this.logger);
	}

	/**
	 * Listen to committed ledger events.
	 *
	 * @returns Unsubscribe function
	 */
	subscribe(listener: LedgerEventListener): () => void {
		return this.events.subscribe(listener);
	}

	// ==================== Reads ====================

	async getEscrow(address: Address): Promise<EscrowRecord> {
		return this.loadRecord(this.storage, address);
	}

	async findEscrow(escrowId: bigint, tradeId: bigint): Promise<EscrowRecord | null> {
		return this.storage.loadEscrow(this.deriveAddresses(escrowId, tradeId).record);
	}

	async listEscrows(
		options?: EscrowQueryOptions,
	): Promise<QueryResult<EscrowRecord>> {
		return this.storage.queryEscrows(options);
	}

	async balanceOf(address: Address): Promise<Amount> {
		return new Custody(this.storage, this.programId).balanceOf(
			validateAddress(address),
		);
	}

	async getAccount(address: Address): Promise<TokenAccount | null> {
		return this.storage.loadAccount(validateAddress(address));
	}

	deriveAddresses(escrowId: bigint, tradeId: bigint): EscrowAddresses {
		return deriveEscrowAddresses(
			this.programId,
			validateU64Id(escrowId, "escrowId"),
			validateU64Id(tradeId, "tradeId"),
		);
	}

	/**
	 * Compare each vault's balance with what the record says it holds.
	 */
	async inspect(address: Address): Promise<EscrowInspection> {
		const report = await inspectEscrow(
			this.storage,
			this.programId,
			validateAddress(address),
		);
		if (report.mismatch) {
			this.logger.error(`Balance mismatch on escrow ${report.address}`);
		}
		return report;
	}

	// ==================== Wallets ====================

	/**
	 * Open the caller's own wallet so it can receive forwarded principal.
	 */
	async openWallet(actor: Address): Promise<TokenAccount> {
		const owner = validateAddress(actor, "actor");
		return this.run(async ({ custody }) => ({
			result: await custody.openWallet(owner),
			events: [],
		}));
	}

	/**
	 * Credit external funds to a wallet.
	 */
	async depositToWallet(address: Address, amount: Amount): Promise<TokenAccount> {
		const wallet = validateAddress(address);
		if (amount <= 0n) {
			throw new LedgerError("INVALID_AMOUNT", "Invalid amount: Zero or negative");
		}
		return this.run(async ({ custody }) => ({
			result: await custody.credit(wallet, amount),
			events: [],
		}));
	}

	// ==================== Core transitions ====================

	async createEscrow(
		actor: Address,
		params: CreateEscrowParams,
	): Promise<EscrowRecord> {
		const seller = validateAddress(actor, "seller");
		const buyer = validateAddress(params.buyer, "buyer");
		const amount = validateAmount(params.amount);
		const addresses = this.deriveAddresses(params.escrowId, params.tradeId);

		if (seller === buyer) {
			throw new LedgerError("INVALID_PARTIES", "Seller and buyer must differ");
		}
		if (seller === this.arbitrator || buyer === this.arbitrator) {
			throw new LedgerError(
				"INVALID_PARTIES",
				"The arbitrator cannot be a trading party",
			);
		}

		let sequential: EscrowRecord["sequential"] = { kind: "direct" };
		if (params.sequential) {
			if (params.sequentialAddress === undefined) {
				throw new LedgerError(
					"MISSING_SEQUENTIAL_ADDRESS",
					"Sequential escrow requires a forwarding address",
				);
			}
			sequential = {
				kind: "sequential",
				next: some(validateAddress(params.sequentialAddress, "sequentialAddress")),
			};
		} else if (params.sequentialAddress !== undefined) {
			throw new LedgerError(
				"NOT_SEQUENTIAL",
				"A forwarding address is only accepted for sequential escrows",
			);
		}

		return this.run(async ({ tx, now }) => {
			if (sequential.kind === "sequential" && sequential.next.kind === "some") {
				await this.requireForwardingWallet(tx, sequential.next.value);
			}
			const existing = await tx.loadEscrow(addresses.record);
			if (existing && !isFinalState(existing.phase.state)) {
				throw new LedgerError(
					"ESCROW_EXISTS",
					`Escrow ${addresses.record} is already active`,
					{ address: addresses.record, state: existing.phase.state },
				);
			}

			const record: EscrowRecord = {
				address: addresses.record,
				escrowId: params.escrowId,
				tradeId: params.tradeId,
				seller,
				buyer,
				arbitrator: this.arbitrator,
				amount,
				fee: computeFee(amount),
				depositDeadline: now + DEPOSIT_WINDOW_SECONDS,
				fiatDeadline: 0,
				sequential,
				fiatPaid: false,
				counter: 0,
				trackedBalance: 0n,
				createdAt: now,
				updatedAt: now,
				phase: { state: "created" },
			};
			await tx.saveEscrow(record);

			return {
				result: record,
				events: [
					{
						type: "EscrowCreated",
						...this.eventBase(record, now),
						seller,
						buyer,
						amount,
						fee: record.fee,
						sequential: sequential.kind === "sequential",
						depositDeadline: record.depositDeadline,
					},
				],
			};
		});
	}

	async fundEscrow(actor: Address, address: Address): Promise<EscrowRecord> {
		return this.run(async ({ tx, custody, now }) => {
			const record = await this.loadRecord(tx, address);
			this.requireActor(record, actor, ["seller"]);
			const target = nextEscrowState(record.phase.state, "fund");
			assertDepositWindowOpen(record, now);

			const vaults = this.addressesOf(record);
			await custody.openVault({
				address: vaults.principalVault,
				kind: "principal-vault",
				authority: record.address,
				escrow: record.address,
			});
			const total = checkedAdd(record.amount, record.fee);
			await custody.transfer(record.seller, vaults.principalVault, total, {
				kind: "owner",
				address: record.seller,
			});

			this.enter(record, target, { state: "funded" });
			record.fiatDeadline = now + FIAT_WINDOW_SECONDS;
			record.trackedBalance = total;
			record.counter += 1;
			await this.save(tx, record, now);

			return {
				result: record,
				events: [
					{
						type: "FundsDeposited",
						...this.eventBase(record, now),
						seller: record.seller,
						vault: vaults.principalVault,
						amount: record.amount,
						fee: record.fee,
						fiatDeadline: record.fiatDeadline,
					},
				],
			};
		});
	}

	async markFiatPaid(actor: Address, address: Address): Promise<EscrowRecord> {
		return this.run(async ({ tx, now }) => {
			const record = await this.loadRecord(tx, address);
			this.requireActor(record, actor, ["buyer"]);
			const target = nextEscrowState(record.phase.state, "mark-fiat-paid");
			if (record.fiatPaid) {
				throw new LedgerError(
					"FIAT_ALREADY_PAID",
					"Fiat payment is already confirmed",
				);
			}
			assertFiatWindowOpen(record, now);

			record.fiatPaid = true;
			this.enter(record, target, record.phase);
			await this.save(tx, record, now);

			return {
				result: record,
				events: [
					{
						type: "FiatMarkedPaid",
						...this.eventBase(record, now),
						buyer: record.buyer,
					},
				],
			};
		});
	}

	async updateSequentialAddress(
		actor: Address,
		address: Address,
		sequentialAddress: Address,
	): Promise<EscrowRecord> {
		const nextAddress = validateAddress(sequentialAddress, "sequentialAddress");
		return this.run(async ({ tx, now }) => {
			const record = await this.loadRecord(tx, address);
			this.requireActor(record, actor, ["buyer"]);
			if (record.sequential.kind !== "sequential") {
				throw new LedgerError("NOT_SEQUENTIAL", "Escrow is not sequential");
			}
			const target = nextEscrowState(record.phase.state, "update-sequential-address");
			await this.requireForwardingWallet(tx, nextAddress);

			this.enter(record, target, record.phase);
			record.sequential = { kind: "sequential", next: some(nextAddress) };
			await this.save(tx, record, now);

			return {
				result: record,
				events: [
					{
						type: "SequentialAddressUpdated",
						...this.eventBase(record, now),
						sequentialAddress: nextAddress,
					},
				],
			};
		});
	}

	async releaseEscrow(actor: Address, address: Address): Promise<EscrowRecord> {
		return this.run(async ({ tx, custody, now }) => {
			const record = await this.loadRecord(tx, address);
			const releasedBy = this.requireActor(record, actor, ["seller", "arbitrator"]);
			const target = nextEscrowState(record.phase.state, "release");
			if (!record.fiatPaid) {
				throw new LedgerError("FIAT_NOT_PAID", "Fiat payment is not confirmed");
			}

			const vaults = this.addressesOf(record);
			const payouts = releasePlan(record, vaults);
			await this.settle(custody, record, vaults, payouts);

			this.enter(record, target, { state: "released" });
			record.trackedBalance = 0n;
			record.counter += 1;
			await this.save(tx, record, now);

			return {
				result: record,
				events: [
					{
						type: "EscrowReleased",
						...this.eventBase(record, now),
						releasedBy,
						recipient: principalRecipient(record),
						payouts,
					},
				],
			};
		});
	}

	async cancelEscrow(actor: Address, address: Address): Promise<EscrowRecord> {
		return this.run(async (ctx) => {
			const record = await this.loadRecord(ctx.tx, address);
			const cancelledBy = this.requireActor(record, actor, ["seller", "arbitrator"]);
			const target = nextEscrowState(record.phase.state, "cancel");
			if (record.fiatPaid) {
				throw new LedgerError(
					"FIAT_ALREADY_PAID",
					"Cannot cancel after fiat payment is confirmed",
				);
			}
			return this.cancel(ctx, record, target, cancelledBy, false);
		});
	}

	/**
	 * Cancel an escrow whose deposit or fiat window has lapsed.
	 */
	async autoCancel(actor: Address, address: Address): Promise<EscrowRecord> {
		return this.run(async (ctx) => {
			const record = await this.loadRecord(ctx.tx, address);
			const cancelledBy = this.requireActor(record, actor, ["arbitrator"]);
			const target = nextEscrowState(record.phase.state, "auto-cancel");
			if (record.fiatPaid) {
				throw new LedgerError(
					"FIAT_ALREADY_PAID",
					"Cannot cancel after fiat payment is confirmed",
				);
			}
			if (!isAutoCancelEligible(record, ctx.now)) {
				const deadline =
					record.phase.state === "created"
						? record.depositDeadline
						: record.fiatDeadline;
				throw new LedgerError(
					"DEADLINE_NOT_REACHED",
					`Deadline ${deadline} has not passed`,
					{ deadline, now: ctx.now },
				);
			}
			return this.cancel(ctx, record, target, cancelledBy, true);
		});
	}

	// ==================== Dispute sub-protocol ====================

	/**
	 * Create the caller's bond vault ahead of a dispute. Repeating the call
	 * is a no-op while the vault is empty.
	 */
	async initializeBondAccount(
		actor: Address,
		address: Address,
		role: PartyRole,
	): Promise<TokenAccount> {
		return this.run(async ({ tx, custody, now }) => {
			const record = await this.loadRecord(tx, address);
			this.requireActor(record, actor, [role]);
			if (isFinalState(record.phase.state)) {
				throw new LedgerError(
					"INVALID_STATE",
					`Escrow is ${record.phase.state}`,
					{ state: record.phase.state },
				);
			}

			const vaults = this.addressesOf(record);
			const { vault, created } = await custody.ensureVault({
				address: bondVaultAddress(vaults, role),
				kind: bondVaultKind(role),
				authority: record.address,
				escrow: record.address,
			});

			const events: LedgerEvent[] = created
				? [
						{
							type: "BondAccountInitialized",
							...this.eventBase(record, now),
							role,
							vault: vault.address,
						},
					]
				: [];
			return { result: vault, events };
		});
	}

	async openDisputeWithBond(
		actor: Address,
		address: Address,
		evidenceHash: Hash32,
	): Promise<EscrowRecord> {
		const evidence = validateHash32(evidenceHash, "evidenceHash");
		return this.run(async ({ tx, custody, now }) => {
			const record = await this.loadRecord(tx, address);
			const initiator = this.partyRole(record, actor);
			const target = nextEscrowState(record.phase.state, "open-dispute");
			if (!record.fiatPaid) {
				throw new LedgerError(
					"FIAT_NOT_PAID",
					"A dispute can only be opened after fiat payment is confirmed",
				);
			}

			const bond = await this.postBond(custody, record, initiator);
			const submissions: DisputeInfo["submissions"] = {
				buyer: none(),
				seller: none(),
			};
			submissions[initiator] = some({
				evidenceHash: evidence,
				bond,
				submittedAt: now,
			});
			const dispute: DisputeInfo = {
				initiator,
				initiatedAt: now,
				responseDeadline: now + DISPUTE_RESPONSE_WINDOW_SECONDS,
				arbitrationDeadline: none(),
				submissions,
			};
			this.enter(record, target, { state: "disputed", dispute });
			await this.save(tx, record, now);

			return {
				result: record,
				events: [
					{
						type: "DisputeOpened",
						...this.eventBase(record, now),
						initiator,
						party: partyAddress(record, initiator),
						evidenceHash: evidence,
						bond,
						responseDeadline: dispute.responseDeadline,
					},
				],
			};
		});
	}

	async respondToDisputeWithBond(
		actor: Address,
		address: Address,
		evidenceHash: Hash32,
	): Promise<EscrowRecord> {
		const evidence = validateHash32(evidenceHash, "evidenceHash");
		return this.run(async ({ tx, custody, now }) => {
			const record = await this.loadRecord(tx, address);
			const respondent = this.partyRole(record, actor);
			const target = nextEscrowState(record.phase.state, "respond-dispute");
			const dispute = this.disputeOf(record);

			if (respondent === dispute.initiator) {
				throw new LedgerError(
					"UNAUTHORIZED",
					"Only the other party may respond to a dispute",
				);
			}
			if (dispute.submissions[respondent].kind === "some") {
				throw new LedgerError(
					"ALREADY_RESPONDED",
					"A response has already been submitted",
				);
			}
			assertResponseWindowOpen(dispute, now);
			const initiatorSubmission = dispute.submissions[dispute.initiator];
			if (
				initiatorSubmission.kind === "some" &&
				initiatorSubmission.value.evidenceHash === evidence
			) {
				throw new LedgerError(
					"DUPLICATE_EVIDENCE",
					"Response evidence must differ from the initiator's",
				);
			}

			const bond = await this.postBond(custody, record, respondent);
			const arbitrationDeadline = now + ARBITRATION_WINDOW_SECONDS;
			dispute.submissions[respondent] = some({
				evidenceHash: evidence,
				bond,
				submittedAt: now,
			});
			dispute.arbitrationDeadline = some(arbitrationDeadline);
			this.enter(record, target, { state: "disputed", dispute });
			await this.save(tx, record, now);

			return {
				result: record,
				events: [
					{
						type: "DisputeResponseSubmitted",
						...this.eventBase(record, now),
						respondent,
						party: partyAddress(record, respondent),
						evidenceHash: evidence,
						bond,
						arbitrationDeadline,
					},
				],
			};
		});
	}

	async resolveDisputeWithExplanation(
		actor: Address,
		address: Address,
		buyerWins: boolean,
		explanationHash: Hash32,
	): Promise<EscrowRecord> {
		const explanation = validateHash32(explanationHash, "explanationHash");
		return this.run(async ({ tx, custody, now }) => {
			const record = await this.loadRecord(tx, address);
			this.requireActor(record, actor, ["arbitrator"]);
			const target = nextEscrowState(record.phase.state, "resolve-dispute");
			const dispute = this.disputeOf(record);

			if (
				dispute.submissions.buyer.kind === "none" ||
				dispute.submissions.seller.kind === "none"
			) {
				throw new LedgerError(
					"EVIDENCE_INCOMPLETE",
					"Both parties must post bond and evidence before resolution",
				);
			}
			checkArbitrationDeadline(
				dispute,
				now,
				this.arbitrationDeadlinePolicy,
				this.logger,
				record.address,
			);

			const winner: PartyRole = buyerWins ? "buyer" : "seller";
			const vaults = this.addressesOf(record);
			const payouts = disputePlan(record, dispute, winner, vaults);
			await this.settle(custody, record, vaults, payouts);

			this.enter(record, target, {
				state: "resolved",
				dispute,
				resolution: {
					kind: "arbitrated",
					winner,
					explanationHash: explanation,
					resolvedAt: now,
				},
			});
			record.trackedBalance = 0n;
			record.counter += 1;
			await this.save(tx, record, now);

			return {
				result: record,
				events: [
					{
						type: "DisputeResolved",
						...this.eventBase(record, now),
						winner,
						explanationHash: explanation,
						payouts,
					},
				],
			};
		});
	}

	/**
	 * Award the escrow to the only party that posted, once the response
	 * window has lapsed without a response.
	 */
	async defaultJudgment(actor: Address, address: Address): Promise<EscrowRecord> {
		return this.run(async ({ tx, custody, now }) => {
			const record = await this.loadRecord(tx, address);
			this.requireActor(record, actor, ["arbitrator"]);
			const target = nextEscrowState(record.phase.state, "default-judgment");
			const dispute = this.disputeOf(record);

			const posted = (["buyer", "seller"] as const).filter(
				(role) => dispute.submissions[role].kind === "some",
			);
			if (posted.length === 2) {
				throw new LedgerError(
					"ALREADY_RESPONDED",
					"Both parties posted; resolve the dispute with an explanation",
				);
			}
			const winner = posted[0];
			if (winner === undefined) {
				throw new LedgerError("NO_BOND_POSTED", "No party has posted a bond");
			}
			assertResponseWindowElapsed(dispute, now);

			const vaults = this.addressesOf(record);
			const payouts = disputePlan(record, dispute, winner, vaults);
			await this.settle(custody, record, vaults, payouts);

			this.enter(record, target, {
				state: "resolved",
				dispute,
				resolution: { kind: "default-judgment", winner, resolvedAt: now },
			});
			record.trackedBalance = 0n;
			record.counter += 1;
			await this.save(tx, record, now);

			return {
				result: record,
				events: [
					{
						type: "DisputeDefaultJudgment",
						...this.eventBase(record, now),
						winner,
						payouts,
					},
				],
			};
		});
	}

	// ==================== Internals ====================

	/**
	 * Run one operation: read the clock once, execute inside a storage
	 * transaction, then publish its events. Operations never interleave.
	 */
	private run<T>(
		operation: (ctx: OperationContext) => Promise<OperationResult<T>>,
	): Promise<T> {
		const execute = async (): Promise<T> => {
			const now = this.clock.now();
			const { result, events } = await this.storage.withTransaction((tx) =>
				operation({ tx, custody: new Custody(tx, this.programId), now }),
			);
			for (const event of events) {
				this.events.publish(event);
			}
			return result;
		};
		const result = this.tail.then(execute);
		this.tail = result.then(
			() => undefined,
			() => undefined,
		);
		return result;
	}

	private async cancel(
		{ tx, custody, now }: OperationContext,
		record: EscrowRecord,
		target: EscrowState,
		cancelledBy: Address,
		automatic: boolean,
	): Promise<OperationResult<EscrowRecord>> {
		const vaults = this.addressesOf(record);
		const funded = record.phase.state === "funded";
		// an unfunded escrow may still own bond vaults opened ahead of time
		await this.settle(custody, record, vaults, funded ? refundPlan(record, vaults) : []);
		const refunded: Amount = funded ? checkedAdd(record.amount, record.fee) : 0n;

		this.enter(record, target, { state: "cancelled", automatic });
		record.trackedBalance = 0n;
		record.counter += 1;
		await this.save(tx, record, now);

		return {
			result: record,
			events: [
				{
					type: "EscrowCancelled",
					...this.eventBase(record, now),
					cancelledBy,
					automatic,
					refunded,
				},
			],
		};
	}

	/**
	 * Execute a payout plan under the record's derived authority, then close
	 * every vault the escrow owns.
	 */
	private async settle(
		custody: Custody,
		record: EscrowRecord,
		vaults: EscrowAddresses,
		payouts: Payout[],
	): Promise<void> {
		const signer = this.vaultSigner(record);
		const participants = new Set([record.seller, record.buyer, record.arbitrator]);
		for (const payout of payouts) {
			// only the escrow's own participants get a wallet opened on payout
			if (participants.has(payout.to)) {
				await custody.openWallet(payout.to);
			}
			await custody.transfer(payout.from, payout.to, payout.amount, signer);
		}

		const closable: Array<[Address, Address]> = [
			[vaults.principalVault, record.seller],
			[vaults.buyerBondVault, record.buyer],
			[vaults.sellerBondVault, record.seller],
		];
		for (const [vault, payer] of closable) {
			const account = await custody.getAccount(vault);
			if (!account || account.kind === "wallet") continue;
			if (account.balance > 0n) {
				await custody.openWallet(payer);
			}
			const residual = await custody.closeVault(vault, signer, payer);
			if (residual > 0n) {
				this.logger.warn(
					`Vault ${vault} of escrow ${record.address} held ${residual} beyond its accounting; refunded to ${payer}`,
				);
			}
		}
	}

	private async postBond(
		custody: Custody,
		record: EscrowRecord,
		role: PartyRole,
	): Promise<Amount> {
		const vaults = this.addressesOf(record);
		const vault = bondVaultAddress(vaults, role);
		await custody.ensureVault({
			address: vault,
			kind: bondVaultKind(role),
			authority: record.address,
			escrow: record.address,
		});
		const bond = computeBond(record.amount);
		const party = partyAddress(record, role);
		await custody.transfer(party, vault, bond, { kind: "owner", address: party });
		return bond;
	}

	/**
	 * Apply the phase an action produces. `target` comes from the transition
	 * table and must agree with it.
	 */
	private enter(record: EscrowRecord, target: EscrowState, phase: EscrowPhase): void {
		if (phase.state !== target) {
			throw new LedgerError(
				"INVALID_STATE",
				`Transition leads to ${target}, not ${phase.state}`,
				{ state: record.phase.state, target, phase: phase.state },
			);
		}
		record.phase = phase;
	}

	/**
	 * Forwarded principal may only land in an existing wallet. Vault
	 * addresses are derivable by anyone and must stay free for their escrow.
	 */
	private async requireForwardingWallet(
		tx: LedgerStorage,
		address: Address,
	): Promise<void> {
		const account = await tx.loadAccount(address);
		if (!account || account.kind !== "wallet") {
			throw new LedgerError(
				"INVALID_ADDRESS",
				`Forwarding address ${address} is not an open wallet`,
				{ address, kind: account?.kind ?? null },
			);
		}
	}

	private vaultSigner(record: EscrowRecord): TransferSigner {
		return { kind: "derived", seeds: escrowSeeds(record.escrowId, record.tradeId) };
	}

	private addressesOf(record: EscrowRecord): EscrowAddresses {
		return deriveEscrowAddresses(this.programId, record.escrowId, record.tradeId);
	}

	private async loadRecord(
		store: LedgerStorage,
		address: Address,
	): Promise<EscrowRecord> {
		const key = validateAddress(address, "escrow address");
		const record = await store.loadEscrow(key);
		if (!record) {
			throw new LedgerError("ESCROW_NOT_FOUND", `Escrow ${key} not found`, {
				address: key,
			});
		}
		return record;
	}

	private async save(
		tx: LedgerStorage,
		record: EscrowRecord,
		now: number,
	): Promise<void> {
		record.updatedAt = now;
		await tx.saveEscrow(record);
	}

	/**
	 * @returns the validated actor address
	 */
	private requireActor(
		record: EscrowRecord,
		actor: Address,
		allowed: Actor[],
	): Address {
		const caller = validateAddress(actor, "actor");
		const matches = allowed.some((role) => this.addressOfActor(record, role) === caller);
		if (!matches) {
			throw new LedgerError(
				"UNAUTHORIZED",
				`Caller must be the ${allowed.join(" or ")}`,
				{ actor: caller, allowed },
			);
		}
		return caller;
	}

	private partyRole(record: EscrowRecord, actor: Address): PartyRole {
		const caller = validateAddress(actor, "actor");
		if (caller === record.buyer) return "buyer";
		if (caller === record.seller) return "seller";
		throw new LedgerError("UNAUTHORIZED", "Caller must be the buyer or seller", {
			actor: caller,
		});
	}

	private addressOfActor(record: EscrowRecord, role: Actor): Address {
		switch (role) {
			case "seller":
				return record.seller;
			case "buyer":
				return record.buyer;
			case "arbitrator":
				return record.arbitrator;
		}
	}

	private disputeOf(record: EscrowRecord): DisputeInfo {
		if (record.phase.state !== "disputed") {
			throw new LedgerError("INVALID_STATE", "Escrow is not disputed", {
				state: record.phase.state,
			});
		}
		return record.phase.dispute;
	}

	private eventBase(record: EscrowRecord, now: number) {
		return {
			escrowAddress: record.address,
			escrowId: record.escrowId,
			tradeId: record.tradeId,
			counter: record.counter,
			timestamp: now,
		};
	}
}
