import { Inject, Injectable, Logger } from "@nestjs/common";
import {
	EscrowLedger,
	type EscrowInspection,
	type EscrowState,
	parseAmount,
} from "@stablecoin-escrow/ledger";
import { toTokenAccountDto } from "../../escrows/escrow.mapper";
import type { GetTokenAccountDto } from "../../escrows/dto/token-account.dto";
import { LEDGER } from "../../ledger/ledger.tokens";
import type GetAdminStatsDto from "./get-admin-stats";
import type { GetReconciliationDto } from "./get-reconciliation.dto";

const ACTIVE: EscrowState[] = ["created", "funded"];
const SETTLED: EscrowState[] = ["released", "cancelled", "resolved"];

function toReconciliationDto(report: EscrowInspection): GetReconciliationDto {
	return {
		address: report.address,
		escrowId: report.escrowId.toString(),
		tradeId: report.tradeId.toString(),
		state: report.state,
		counter: report.counter,
		trackedBalance: report.trackedBalance.toString(),
		addressMatches: report.addressMatches,
		vaults: report.vaults.map((v) => ({
			kind: v.kind,
			address: v.address,
			status: v.status,
			balance: v.balance.toString(),
			expected: v.expected.toString(),
			mismatch: v.mismatch,
		})),
		lockedFunds: report.lockedFunds.toString(),
		mismatch: report.mismatch,
	};
}

/**
 * Operator tooling: minting test balances and auditing vaults.
 */
@Injectable()
export class AdminService {
	private readonly logger = new Logger(AdminService.name);

	constructor(@Inject(LEDGER) private readonly ledger: EscrowLedger) {}

	async getEscrowStats(): Promise<GetAdminStatsDto["escrows"]> {
		const count = async (state?: EscrowState[]) =>
			(await this.ledger.listEscrows({ state, limit: 1 })).total;
		const [total, active, disputed, settled] = await Promise.all([
			count(),
			count(ACTIVE),
			count(["disputed"]),
			count(SETTLED),
		]);
		return { total, active, disputed, settled };
	}

	async creditWallet(address: string, amount: string): Promise<GetTokenAccountDto> {
		const account = await this.ledger.depositToWallet(address, parseAmount(amount));
		this.logger.log(`Credited ${amount} to wallet ${account.address}`);
		return toTokenAccountDto(account);
	}

	async reconcile(address: string): Promise<GetReconciliationDto> {
		return toReconciliationDto(await this.ledger.inspect(address));
	}
}
