import { ApiProperty } from "@nestjs/swagger";
import type { EscrowState, VaultKind } from "@stablecoin-escrow/ledger";
import { ESCROW_STATES } from "../../escrows/dto/get-escrow.dto";

export const VAULT_KINDS = [
	"principal-vault",
	"buyer-bond-vault",
	"seller-bond-vault",
] as const satisfies readonly VaultKind[];

export class VaultReportDto {
	@ApiProperty({ enum: VAULT_KINDS })
	kind!: VaultKind;

	@ApiProperty()
	address!: string;

	@ApiProperty({ enum: ["open", "closed"] })
	status!: "open" | "closed";

	@ApiProperty({ description: "Actual balance, base units" })
	balance!: string;

	@ApiProperty({ description: "Balance implied by the escrow record" })
	expected!: string;

	@ApiProperty()
	mismatch!: boolean;
}

export class GetReconciliationDto {
	@ApiProperty()
	address!: string;

	@ApiProperty()
	escrowId!: string;

	@ApiProperty()
	tradeId!: string;

	@ApiProperty({ enum: ESCROW_STATES })
	state!: EscrowState;

	@ApiProperty()
	counter!: number;

	@ApiProperty()
	trackedBalance!: string;

	@ApiProperty({ description: "Stored address re-derives from its identifiers" })
	addressMatches!: boolean;

	@ApiProperty({ type: [VaultReportDto] })
	vaults!: VaultReportDto[];

	@ApiProperty({ description: "Sum of all vault balances" })
	lockedFunds!: string;

	@ApiProperty()
	mismatch!: boolean;
}
