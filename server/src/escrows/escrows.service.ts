import { Inject, Injectable, Logger, NotFoundException } from "@nestjs/common";
import {
	EscrowLedger,
	type EscrowState,
	type PartyRole,
	type QueryResult,
	parseAmount,
} from "@stablecoin-escrow/ledger";
import { LEDGER } from "../ledger/ledger.tokens";
import type { CreateEscrowInDto } from "./dto/create-escrow.dto";
import type { GetEscrowDto } from "./dto/get-escrow.dto";
import type { GetTokenAccountDto, GetWalletBalanceDto } from "./dto/token-account.dto";
import { toEscrowDto, toTokenAccountDto, toWalletBalanceDto } from "./escrow.mapper";

export type EscrowQueryFilter = {
	state?: EscrowState;
	party?: string;
};

/**
 * HTTP-facing wrapper around the ledger. Actors arrive already
 * authenticated; every rule is enforced by the ledger itself.
 */
@Injectable()
export class EscrowsService {
	private readonly logger = new Logger(EscrowsService.name);

	constructor(@Inject(LEDGER) private readonly ledger: EscrowLedger) {}

	// ===== Reads =====

	async list(
		filter: EscrowQueryFilter,
		limit: number,
		offset: number,
	): Promise<QueryResult<GetEscrowDto>> {
		const result = await this.ledger.listEscrows({
			state: filter.state,
			party: filter.party?.toLowerCase(),
			limit,
			offset,
		});
		return { ...result, items: result.items.map(toEscrowDto) };
	}

	async getOne(address: string): Promise<GetEscrowDto> {
		return toEscrowDto(await this.ledger.getEscrow(address));
	}

	async lookup(escrowId: bigint, tradeId: bigint): Promise<GetEscrowDto> {
		const record = await this.ledger.findEscrow(escrowId, tradeId);
		if (!record) {
			throw new NotFoundException(`No escrow for (${escrowId}, ${tradeId})`);
		}
		return toEscrowDto(record);
	}

	async walletBalance(address: string): Promise<GetWalletBalanceDto> {
		const wallet = address.toLowerCase();
		return toWalletBalanceDto(wallet, await this.ledger.balanceOf(wallet));
	}

	async openWallet(owner: string): Promise<GetWalletBalanceDto> {
		const wallet = await this.ledger.openWallet(owner);
		return toWalletBalanceDto(wallet.address, wallet.balance);
	}

		// ===== Core transitions =====

	async create(seller: string, dto: CreateEscrowInDto): Promise<GetEscrowDto> {
		const record = await this.ledger.createEscrow(seller, {
			escrowId: BigInt(dto.escrowId),
			tradeId: BigInt(dto.tradeId),
			buyer: dto.buyer,
			amount: parseAmount(dto.amount),
			sequential: dto.sequential,
			sequentialAddress: dto.sequentialAddress,
		});
		this.logger.log(
			`Escrow ${record.address} created by ${seller} for ${record.amount} (${record.escrowId}/${record.tradeId})`,
		);
		return toEscrowDto(record);
	}

	async fund(actor: string, address: string): Promise<GetEscrowDto> {
		const record = await this.ledger.fundEscrow(actor, address);
		this.logger.log(`Escrow ${record.address} funded with ${record.trackedBalance}`);
		return toEscrowDto(record);
	}

	async markFiatPaid(actor: string, address: string): Promise<GetEscrowDto> {
		return toEscrowDto(await this.ledger.markFiatPaid(actor, address));
	}

	async updateSequentialAddress(
		actor: string,
		address: string,
		sequentialAddress: string,
	): Promise<GetEscrowDto> {
		return toEscrowDto(
			await this.ledger.updateSequentialAddress(
				actor,
				address,
				sequentialAddress,
			),
		);
	}

	async release(actor: string, address: string): Promise<GetEscrowDto> {
		const record = await this.ledger.releaseEscrow(actor, address);
		this.logger.log(`Escrow ${record.address} released by ${actor}`);
		return toEscrowDto(record);
	}

	async cancel(actor: string, address: string): Promise<GetEscrowDto> {
		const record = await this.ledger.cancelEscrow(actor, address);
		this.logger.log(`Escrow ${record.address} cancelled by ${actor}`);
		return toEscrowDto(record);
	}

	async autoCancel(actor: string, address: string): Promise<GetEscrowDto> {
		const record = await this.ledger.autoCancel(actor, address);
		this.logger.log(`Escrow ${record.address} cancelled after its deadline`);
		return toEscrowDto(record);
	}

	// ===== Disputes =====

	async initializeBondAccount(
		actor: string,
		address: string,
		role: PartyRole,
	): Promise<GetTokenAccountDto> {
		return toTokenAccountDto(
			await this.ledger.initializeBondAccount(actor, address, role),
		);
	}

	async openDispute(
		actor: string,
		address: string,
		evidenceHash: string,
	): Promise<GetEscrowDto> {
		const record = await this.ledger.openDisputeWithBond(
			actor,
			address,
			evidenceHash,
		);
		this.logger.log(`Dispute opened on ${record.address} by ${actor}`);
		return toEscrowDto(record);
	}

	async respondToDispute(
		actor: string,
		address: string,
		evidenceHash: string,
	): Promise<GetEscrowDto> {
		return toEscrowDto(
			await this.ledger.respondToDisputeWithBond(
				actor,
				address,
				evidenceHash,
			),
		);
	}

	async resolveDispute(
		actor: string,
		address: string,
		buyerWins: boolean,
		explanationHash: string,
	): Promise<GetEscrowDto> {
		const record = await this.ledger.resolveDisputeWithExplanation(
			actor,
			address,
			buyerWins,
			explanationHash,
		);
		this.logger.log(
			`Dispute on ${record.address} resolved for the ${buyerWins ? "buyer" : "seller"}`,
		);
		return toEscrowDto(record);
	}

	async defaultJudgment(actor: string, address: string): Promise<GetEscrowDto> {
		const record = await this.ledger.defaultJudgment(actor, address);
		this.logger.log(`Default judgment on ${record.address}`);
		return toEscrowDto(record);
	}
}
