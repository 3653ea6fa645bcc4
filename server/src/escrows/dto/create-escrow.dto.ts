import { ApiProperty, ApiPropertyOptional } from "@nestjs/swagger";
import { IsBoolean, IsOptional, Matches } from "class-validator";

export const HEX_32 = /^[0-9a-fA-F]{64}$/;
export const U64_STRING = /^\d{1,20}$/;
export const AMOUNT_STRING = /^\d{1,20}$/;

export class CreateEscrowInDto {
	@ApiProperty({ example: "1", description: "u64 escrow identifier, decimal" })
	@Matches(U64_STRING, { message: "escrowId must be a decimal u64" })
	escrowId!: string;

	@ApiProperty({ example: "42", description: "u64 trade identifier, decimal" })
	@Matches(U64_STRING, { message: "tradeId must be a decimal u64" })
	tradeId!: string;

	@ApiProperty({ description: "Buyer x-only public key, hex" })
	@Matches(HEX_32, { message: "buyer must be a 32-byte hex key" })
	buyer!: string;

	@ApiProperty({
		example: "1000000",
		description: "Base units with 6 implied decimals (1000000 = 1.0)",
	})
	@Matches(AMOUNT_STRING, { message: "amount must be a decimal integer string" })
	amount!: string;

	@ApiProperty({ description: "Forward principal to a downstream escrow" })
	@IsBoolean()
	sequential!: boolean;

	@ApiPropertyOptional({ description: "Downstream escrow address, hex" })
	@IsOptional()
	@Matches(HEX_32, { message: "sequentialAddress must be 32 bytes of hex" })
	sequentialAddress?: string;
}

export class UpdateSequentialAddressInDto {
	@ApiProperty({ description: "Downstream escrow address, hex" })
	@Matches(HEX_32, { message: "sequentialAddress must be 32 bytes of hex" })
	sequentialAddress!: string;
}
