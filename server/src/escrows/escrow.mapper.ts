import {
	type DisputeInfo,
	type DisputeSubmission,
	type EscrowRecord,
	type TokenAccount,
	formatAmount,
	toNullable,
} from "@stablecoin-escrow/ledger";
import type {
	DisputeDto,
	DisputeSubmissionDto,
	GetEscrowDto,
	ResolutionDto,
} from "./dto/get-escrow.dto";
import type { GetTokenAccountDto, GetWalletBalanceDto } from "./dto/token-account.dto";

function toSubmissionDto(submission: DisputeSubmission): DisputeSubmissionDto {
	return {
		evidenceHash: submission.evidenceHash,
		bond: submission.bond.toString(),
		submittedAt: submission.submittedAt,
	};
}

function toDisputeDto(dispute: DisputeInfo): DisputeDto {
	const buyer = toNullable(dispute.submissions.buyer);
	const seller = toNullable(dispute.submissions.seller);
	return {
		initiator: dispute.initiator,
		initiatedAt: dispute.initiatedAt,
		responseDeadline: dispute.responseDeadline,
		arbitrationDeadline: toNullable(dispute.arbitrationDeadline),
		buyer: buyer && toSubmissionDto(buyer),
		seller: seller && toSubmissionDto(seller),
	};
}

export function toEscrowDto(record: EscrowRecord): GetEscrowDto {
	const { phase } = record;

	let dispute: DisputeDto | null = null;
	let resolution: ResolutionDto | null = null;
	if (phase.state === "disputed" || phase.state === "resolved") {
		dispute = toDisputeDto(phase.dispute);
	}
	if (phase.state === "resolved") {
		resolution = {
			kind: phase.resolution.kind,
			winner: phase.resolution.winner,
			explanationHash:
				phase.resolution.kind === "arbitrated"
					? phase.resolution.explanationHash
					: null,
			resolvedAt: phase.resolution.resolvedAt,
		};
	}

	return {
		address: record.address,
		escrowId: record.escrowId.toString(),
		tradeId: record.tradeId.toString(),
		seller: record.seller,
		buyer: record.buyer,
		arbitrator: record.arbitrator,
		amount: record.amount.toString(),
		fee: record.fee.toString(),
		state: phase.state,
		depositDeadline: record.depositDeadline,
		fiatDeadline: record.fiatDeadline,
		sequential: record.sequential.kind === "sequential",
		sequentialAddress:
			record.sequential.kind === "sequential"
				? toNullable(record.sequential.next)
				: null,
		fiatPaid: record.fiatPaid,
		counter: record.counter,
		trackedBalance: record.trackedBalance.toString(),
		autoCancelled: phase.state === "cancelled" ? phase.automatic : null,
		dispute,
		resolution,
		createdAt: record.createdAt,
		updatedAt: record.updatedAt,
	};
}

export function toTokenAccountDto(account: TokenAccount): GetTokenAccountDto {
	return {
		address: account.address,
		owner: account.owner,
		kind: account.kind,
		escrow: toNullable(account.escrow),
		balance: account.balance.toString(),
	};
}

export function toWalletBalanceDto(address: string, balance: bigint): GetWalletBalanceDto {
	return {
		address,
		balance: balance.toString(),
		formatted: formatAmount(balance),
	};
}
