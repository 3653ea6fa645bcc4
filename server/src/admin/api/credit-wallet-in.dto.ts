import { ApiProperty } from "@nestjs/swagger";
import { Matches } from "class-validator";
import { AMOUNT_STRING } from "../../escrows/dto/create-escrow.dto";

export class CreditWalletInDto {
	@ApiProperty({
		example: "2000000",
		description: "Base units to mint into the wallet",
	})
	@Matches(AMOUNT_STRING, { message: "amount must be a decimal integer string" })
	amount!: string;
}
