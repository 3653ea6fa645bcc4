import { ApiProperty } from "@nestjs/swagger";

export class EscrowStatsDto {
	@ApiProperty()
	total!: number;

	@ApiProperty({ description: "Created or funded" })
	active!: number;

	@ApiProperty({ description: "Disputed, awaiting a response or a ruling" })
	disputed!: number;

	@ApiProperty({ description: "Released, cancelled or resolved" })
	settled!: number;
}

export default class GetAdminStatsDto {
	@ApiProperty({ type: EscrowStatsDto, description: "Escrow counts by lifecycle stage" })
	escrows!: EscrowStatsDto;
}
