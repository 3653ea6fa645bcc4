import { ApiProperty } from "@nestjs/swagger";
import type { EscrowState, PartyRole } from "@stablecoin-escrow/ledger";

export const ESCROW_STATES = [
	"created",
	"funded",
	"released",
	"cancelled",
	"disputed",
	"resolved",
] as const satisfies readonly EscrowState[];

export const PARTY_ROLES = ["buyer", "seller"] as const satisfies readonly PartyRole[];

const AMOUNT_DESCRIPTION = "Base units with 6 implied decimals, as a decimal string";

export class DisputeSubmissionDto {
	@ApiProperty({ description: "32-byte evidence hash, hex" })
	evidenceHash!: string;

	@ApiProperty({ description: AMOUNT_DESCRIPTION, example: "50000" })
	bond!: string;

	@ApiProperty({ description: "Unix epoch in seconds" })
	submittedAt!: number;
}

export class DisputeDto {
	@ApiProperty({ enum: PARTY_ROLES })
	initiator!: PartyRole;

	@ApiProperty({ description: "Unix epoch in seconds" })
	initiatedAt!: number;

	@ApiProperty({ description: "Unix epoch in seconds" })
	responseDeadline!: number;

	@ApiProperty({
		description: "Unix epoch in seconds; set once the respondent posts",
		nullable: true,
		type: Number,
	})
	arbitrationDeadline!: number | null;

	@ApiProperty({ type: DisputeSubmissionDto, nullable: true })
	buyer!: DisputeSubmissionDto | null;

	@ApiProperty({ type: DisputeSubmissionDto, nullable: true })
	seller!: DisputeSubmissionDto | null;
}

export class ResolutionDto {
	@ApiProperty({ enum: ["arbitrated", "default-judgment"] })
	kind!: "arbitrated" | "default-judgment";

	@ApiProperty({ enum: PARTY_ROLES })
	winner!: PartyRole;

	@ApiProperty({ description: "Arbitrated only", nullable: true, type: String })
	explanationHash!: string | null;

	@ApiProperty({ description: "Unix epoch in seconds" })
	resolvedAt!: number;
}

export class GetEscrowDto {
	@ApiProperty({ description: "Record address derived from (escrowId, tradeId)" })
	address!: string;

	@ApiProperty({ example: "1" })
	escrowId!: string;

	@ApiProperty({ example: "42" })
	tradeId!: string;

	@ApiProperty({ description: "Seller x-only public key" })
	seller!: string;

	@ApiProperty({ description: "Buyer x-only public key" })
	buyer!: string;

	@ApiProperty({ description: "Arbitrator x-only public key" })
	arbitrator!: string;

	@ApiProperty({ description: AMOUNT_DESCRIPTION, example: "1000000" })
	amount!: string;

	@ApiProperty({ description: AMOUNT_DESCRIPTION, example: "10000" })
	fee!: string;

	@ApiProperty({ enum: ESCROW_STATES })
	state!: EscrowState;

	@ApiProperty({ description: "Unix epoch in seconds" })
	depositDeadline!: number;

	@ApiProperty({ description: "Unix epoch in seconds; 0 until funded" })
	fiatDeadline!: number;

	@ApiProperty()
	sequential!: boolean;

	@ApiProperty({ nullable: true, type: String })
	sequentialAddress!: string | null;

	@ApiProperty()
	fiatPaid!: boolean;

	@ApiProperty({ description: "Incremented on every value-moving transition" })
	counter!: number;

	@ApiProperty({ description: AMOUNT_DESCRIPTION })
	trackedBalance!: string;

	@ApiProperty({
		description: "Cancelled by the arbitrator after a missed deadline",
		nullable: true,
		type: Boolean,
	})
	autoCancelled!: boolean | null;

	@ApiProperty({ type: DisputeDto, nullable: true })
	dispute!: DisputeDto | null;

	@ApiProperty({ type: ResolutionDto, nullable: true })
	resolution!: ResolutionDto | null;

	@ApiProperty({ description: "Unix epoch in seconds" })
	createdAt!: number;

	@ApiProperty({ description: "Unix epoch in seconds" })
	updatedAt!: number;
}
