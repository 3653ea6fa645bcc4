import { ApiProperty } from "@nestjs/swagger";
import type { AccountKind } from "@stablecoin-escrow/ledger";

export class GetTokenAccountDto {
	@ApiProperty()
	address!: string;

	@ApiProperty({ description: "Wallet holder, or the escrow record for a vault" })
	owner!: string;

	@ApiProperty({
		enum: ["wallet", "principal-vault", "buyer-bond-vault", "seller-bond-vault"],
	})
	kind!: AccountKind;

	@ApiProperty({ nullable: true, type: String })
	escrow!: string | null;

	@ApiProperty({ description: "Base units, decimal string", example: "1010000" })
	balance!: string;
}

export class GetWalletBalanceDto {
	@ApiProperty()
	address!: string;

	@ApiProperty({ description: "Base units, decimal string; 0 for unknown wallets" })
	balance!: string;

	@ApiProperty({ description: "Balance with 6 decimals", example: "1.010000" })
	formatted!: string;
}
