import { Controller, Get, Param, Post } from "@nestjs/common";
import {
	ApiCreatedResponse,
	ApiExtraModels,
	ApiOkResponse,
	ApiOperation,
	ApiParam,
	ApiTags,
} from "@nestjs/swagger";
import { Signed, Signer } from "../auth/signer.decorator";
import {
	type ApiEnvelope,
	envelope,
	getSchemaPathForDto,
} from "../common/dto/envelopes";
import { GetWalletBalanceDto } from "./dto/token-account.dto";
import { EscrowsService } from "./escrows.service";

@ApiTags("3 - Wallets")
@ApiExtraModels(GetWalletBalanceDto)
@Controller("api/v1/wallets")
export class WalletsController {
	constructor(private readonly service: EscrowsService) {}

	@Post("")
	@Signed()
	@ApiOperation({
		summary: "Open the signer's wallet so it can receive forwarded principal",
	})
	@ApiCreatedResponse({ schema: getSchemaPathForDto(GetWalletBalanceDto) })
	async open(@Signer() signer: string): Promise<ApiEnvelope<GetWalletBalanceDto>> {
		return envelope(await this.service.openWallet(signer));
	}

	@Get(":address")
	@ApiOperation({ summary: "Token balance of a party wallet" })
	@ApiParam({ name: "address", description: "x-only public key, hex" })
	@ApiOkResponse({ schema: getSchemaPathForDto(GetWalletBalanceDto) })
	async balance(
		@Param("address") address: string,
	): Promise<ApiEnvelope<GetWalletBalanceDto>> {
		return envelope(await this.service.walletBalance(address));
	}
}
