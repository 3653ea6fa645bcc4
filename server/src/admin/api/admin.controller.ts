import {
	Body,
	Controller,
	Get,
	HttpCode,
	HttpStatus,
	Param,
	Post,
	Sse,
} from "@nestjs/common";
import {
	ApiBasicAuth,
	ApiBody,
	ApiExtraModels,
	ApiNotFoundResponse,
	ApiOkResponse,
	ApiOperation,
	ApiTags,
} from "@nestjs/swagger";
import type { Observable } from "rxjs";
import {
	type ApiEnvelope,
	ApiEnvelopeShellDto,
	envelope,
	getSchemaPathForDto,
} from "../../common/dto/envelopes";
import {
	ServerSentEventsService,
	type SseEvent,
} from "../../common/server-sent-events.service";
import { GetTokenAccountDto } from "../../escrows/dto/token-account.dto";
import { AdminService } from "./admin.service";
import { CreditWalletInDto } from "./credit-wallet-in.dto";
import GetAdminStatsDto from "./get-admin-stats";
import { GetReconciliationDto } from "./get-reconciliation.dto";

@ApiTags("Admin")
@ApiBasicAuth()
@ApiExtraModels(
	ApiEnvelopeShellDto,
	GetAdminStatsDto,
	GetReconciliationDto,
	GetTokenAccountDto,
)
@Controller("api/admin/v1")
export class AdminController {
	constructor(
		private readonly service: AdminService,
		private readonly sseService: ServerSentEventsService,
	) {}

	@Get("stats")
	@ApiOperation({ summary: "Escrow counts by lifecycle stage" })
	@ApiOkResponse({ schema: getSchemaPathForDto(GetAdminStatsDto) })
	async getStats(): Promise<ApiEnvelope<GetAdminStatsDto>> {
		return envelope({ escrows: await this.service.getEscrowStats() });
	}

	@Post("wallets/:address/credit")
	@HttpCode(HttpStatus.OK)
	@ApiOperation({ summary: "Mint tokens into a party wallet" })
	@ApiBody({ type: CreditWalletInDto })
	@ApiOkResponse({ schema: getSchemaPathForDto(GetTokenAccountDto) })
	async creditWallet(
		@Param("address") address: string,
		@Body() dto: CreditWalletInDto,
	): Promise<ApiEnvelope<GetTokenAccountDto>> {
		return envelope(await this.service.creditWallet(address, dto.amount));
	}

	@Get("escrows/:address/reconciliation")
	@ApiOperation({ summary: "Compare vault balances with the escrow's accounting" })
	@ApiOkResponse({ schema: getSchemaPathForDto(GetReconciliationDto) })
	@ApiNotFoundResponse({ description: "Escrow not found" })
	async reconcile(
		@Param("address") address: string,
	): Promise<ApiEnvelope<GetReconciliationDto>> {
		return envelope(await this.service.reconcile(address));
	}

	@Sse("sse")
	@ApiOperation({ summary: "Stream every ledger event" })
	events(): Observable<SseEvent> {
		return this.sseService.adminEvents;
	}
}
