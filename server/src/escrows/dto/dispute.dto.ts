import { ApiProperty } from "@nestjs/swagger";
import { IsBoolean, Matches } from "class-validator";
import { HEX_32 } from "./create-escrow.dto";

export class SubmitEvidenceInDto {
	@ApiProperty({ description: "32-byte hash of the off-chain evidence, hex" })
	@Matches(HEX_32, { message: "evidenceHash must be 32 bytes of hex" })
	evidenceHash!: string;
}

export class ResolveDisputeInDto {
	@ApiProperty({ description: "true awards the buyer, false the seller" })
	@IsBoolean()
	buyerWins!: boolean;

	@ApiProperty({ description: "32-byte hash of the arbitrator's explanation, hex" })
	@Matches(HEX_32, { message: "explanationHash must be 32 bytes of hex" })
	explanationHash!: string;
}
