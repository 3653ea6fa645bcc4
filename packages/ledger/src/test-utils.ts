import { ManualClock } from "./clock/clock.js";
import type { Amount } from "./core/amounts.js";
import type { Address } from "./core/types.js";
import type { LedgerEvent } from "./events/types.js";
import type { LedgerLogger } from "./logger.js";
import { EscrowLedger } from "./modules/escrow/escrow-ledger.js";
import type {
	ArbitrationDeadlinePolicy,
	EscrowRecord,
} from "./modules/escrow/types.js";
import { MemoryLedgerStorage } from "./storage/memory-adapter.js";

export const PROGRAM_ID = "11".repeat(32);
export const SELLER = "a1".repeat(32);
export const BUYER = "b2".repeat(32);
export const ARBITRATOR = "c3".repeat(32);
export const FORWARD_WALLET = "d4".repeat(32);
export const OUTSIDER = "e5".repeat(32);

export const BUYER_EVIDENCE = "0b".repeat(32);
export const SELLER_EVIDENCE = "0c".repeat(32);
export const EXPLANATION = "0e".repeat(32);

export const START = 1_700_000_000;
export const AMOUNT: Amount = 1_000_000n;
export const WALLET_FUNDS: Amount = 10_000_000n;

export class RecordingLogger implements LedgerLogger {
	readonly logs: string[] = [];
	readonly warnings: string[] = [];
	readonly errors: string[] = [];

	log(message: string): void {
		this.logs.push(message);
	}

	warn(message: string): void {
		this.warnings.push(message);
	}

	error(message: string): void {
		this.errors.push(message);
	}
}

export interface LedgerHarness {
	ledger: EscrowLedger;
	storage: MemoryLedgerStorage;
	clock: ManualClock;
	logger: RecordingLogger;
	events: LedgerEvent[];
}

export async function createHarness(
	options: { arbitrationDeadlinePolicy?: ArbitrationDeadlinePolicy } = {},
): Promise<LedgerHarness> {
	const storage = new MemoryLedgerStorage();
	const clock = new ManualClock(START);
	const logger = new RecordingLogger();
	const ledger = new EscrowLedger({
		storage,
		programId: PROGRAM_ID,
		arbitrator: ARBITRATOR,
		clock,
		logger,
		arbitrationDeadlinePolicy: options.arbitrationDeadlinePolicy,
	});
	const events: LedgerEvent[] = [];
	ledger.subscribe((event) => events.push(event));

	await ledger.depositToWallet(SELLER, WALLET_FUNDS);
	await ledger.depositToWallet(BUYER, WALLET_FUNDS);
	await ledger.openWallet(FORWARD_WALLET);

	return { ledger, storage, clock, logger, events };
}

export async function createEscrow(
	ledger: EscrowLedger,
	overrides: {
		escrowId?: bigint;
		tradeId?: bigint;
		amount?: Amount;
		sequentialAddress?: Address;
		sequential?: boolean;
	} = {},
): Promise<EscrowRecord> {
	return ledger.createEscrow(SELLER, {
		escrowId: overrides.escrowId ?? 1n,
		tradeId: overrides.tradeId ?? 7n,
		buyer: BUYER,
		amount: overrides.amount ?? AMOUNT,
		sequential: overrides.sequential ?? false,
		sequentialAddress: overrides.sequentialAddress,
	});
}

/**
 * Created, funded and fiat confirmed.
 */
export async function createPaidEscrow(
	ledger: EscrowLedger,
	overrides: Parameters<typeof createEscrow>[1] = {},
): Promise<EscrowRecord> {
	const escrow = await createEscrow(ledger, overrides);
	await ledger.fundEscrow(SELLER, escrow.address);
	return ledger.markFiatPaid(BUYER, escrow.address);
}
