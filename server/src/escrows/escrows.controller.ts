import {
	Body,
	Controller,
	DefaultValuePipe,
	Get,
	HttpCode,
	HttpStatus,
	Param,
	ParseIntPipe,
	Patch,
	Post,
	Query,
	Sse,
} from "@nestjs/common";
import {
	ApiBadRequestResponse,
	ApiBody,
	ApiConflictResponse,
	ApiCreatedResponse,
	ApiExtraModels,
	ApiForbiddenResponse,
	ApiNotFoundResponse,
	ApiOkResponse,
	ApiOperation,
	ApiParam,
	ApiQuery,
	ApiTags,
	ApiUnprocessableEntityResponse,
} from "@nestjs/swagger";
import type { EscrowState } from "@stablecoin-escrow/ledger";
import type { Observable } from "rxjs";
import { Signed, Signer } from "../auth/signer.decorator";
import {
	type ApiEnvelope,
	ApiEnvelopeShellDto,
	type ApiPaginatedEnvelope,
	ApiPaginatedEnvelopeShellDto,
	envelope,
	getSchemaPathForDto,
	getSchemaPathForPaginatedDto,
	paginatedEnvelope,
} from "../common/dto/envelopes";
import { ParseEscrowStatePipe } from "../common/pipes/escrow-state.pipe";
import { ParseU64StringPipe } from "../common/pipes/u64.pipe";
import {
	ServerSentEventsService,
	type SseEvent,
} from "../common/server-sent-events.service";
import {
	CreateEscrowInDto,
	UpdateSequentialAddressInDto,
} from "./dto/create-escrow.dto";
import { ESCROW_STATES, GetEscrowDto } from "./dto/get-escrow.dto";
import { EscrowsService } from "./escrows.service";

@ApiTags("1 - Escrows")
@ApiExtraModels(ApiEnvelopeShellDto, ApiPaginatedEnvelopeShellDto, GetEscrowDto)
@Controller("api/v1/escrows")
export class EscrowsController {
	constructor(
		private readonly service: EscrowsService,
		private readonly sseService: ServerSentEventsService,
	) {}

	@Get("")
	@ApiOperation({ summary: "List escrows" })
	@ApiQuery({
		name: "limit",
		required: false,
		description: "Max items to return (1-100)",
		schema: { type: "integer", minimum: 1, maximum: 100, example: 20 },
	})
	@ApiQuery({
		name: "offset",
		required: false,
		schema: { type: "integer", minimum: 0, example: 0 },
	})
	@ApiQuery({
		name: "state",
		required: false,
		description: "Filter by state",
		schema: { type: "string", enum: ESCROW_STATES.slice(0) },
	})
	@ApiQuery({
		name: "party",
		required: false,
		description: "Filter by seller or buyer key",
		schema: { type: "string" },
	})
	@ApiOkResponse({
		description: "A page of escrows, newest first",
		schema: getSchemaPathForPaginatedDto(GetEscrowDto),
	})
	async list(
		@Query("limit", new DefaultValuePipe(20), ParseIntPipe) limit: number,
		@Query("offset", new DefaultValuePipe(0), ParseIntPipe) offset: number,
		@Query("state", ParseEscrowStatePipe) state?: EscrowState,
		@Query("party") party?: string,
	): Promise<ApiPaginatedEnvelope<GetEscrowDto[]>> {
		const page = Math.min(Math.max(limit, 1), 100);
		const skip = Math.max(offset, 0);
		const { items, total, hasMore } = await this.service.list(
			{ state, party },
			page,
			skip,
		);
		return paginatedEnvelope(items, { total, limit: page, offset: skip, hasMore });
	}

	@Post("")
	@Signed()
	@ApiOperation({ summary: "Create an escrow; the signer is the seller" })
	@ApiBody({ type: CreateEscrowInDto })
	@ApiCreatedResponse({
		description: "Escrow created",
		schema: getSchemaPathForDto(GetEscrowDto),
	})
	@ApiBadRequestResponse({ description: "Invalid amount, parties or identifiers" })
	@ApiConflictResponse({ description: "An active escrow exists for these identifiers" })
	async create(
		@Signer() signer: string,
		@Body() dto: CreateEscrowInDto,
	): Promise<ApiEnvelope<GetEscrowDto>> {
		return envelope(await this.service.create(signer, dto));
	}

	@Get("lookup/:escrowId/:tradeId")
	@ApiOperation({ summary: "Find an escrow by its public identifiers" })
	@ApiParam({ name: "escrowId", description: "u64, decimal" })
	@ApiParam({ name: "tradeId", description: "u64, decimal" })
	@ApiOkResponse({ schema: getSchemaPathForDto(GetEscrowDto) })
	@ApiNotFoundResponse({ description: "No escrow at the derived address" })
	async lookup(
		@Param("escrowId", ParseU64StringPipe) escrowId: string,
		@Param("tradeId", ParseU64StringPipe) tradeId: string,
	): Promise<ApiEnvelope<GetEscrowDto>> {
		return envelope(await this.service.lookup(BigInt(escrowId), BigInt(tradeId)));
	}

	@Get(":address")
	@ApiOperation({ summary: "Retrieve an escrow by address" })
	@ApiParam({ name: "address", description: "Escrow record address" })
	@ApiOkResponse({ schema: getSchemaPathForDto(GetEscrowDto) })
	@ApiNotFoundResponse({ description: "Escrow not found" })
	async getOne(
		@Param("address") address: string,
	): Promise<ApiEnvelope<GetEscrowDto>> {
		return envelope(await this.service.getOne(address));
	}

	@Sse(":address/events")
	@ApiOperation({ summary: "Subscribe to the events of one escrow" })
	events(@Param("address") address: string): Observable<SseEvent> {
		return this.sseService.escrowEvents(address);
	}

	@Post(":address/fund")
	@Signed()
	@HttpCode(HttpStatus.OK)
	@ApiOperation({ summary: "Deposit amount plus fee into the principal vault (seller)" })
	@ApiOkResponse({ schema: getSchemaPathForDto(GetEscrowDto) })
	@ApiForbiddenResponse({ description: "Signer is not the seller" })
	@ApiUnprocessableEntityResponse({ description: "Deposit deadline passed or funds too low" })
	async fund(
		@Signer() signer: string,
		@Param("address") address: string,
	): Promise<ApiEnvelope<GetEscrowDto>> {
		return envelope(await this.service.fund(signer, address));
	}

	@Post(":address/fiat-paid")
	@Signed()
	@HttpCode(HttpStatus.OK)
	@ApiOperation({ summary: "Confirm the off-ledger fiat payment (buyer)" })
	@ApiOkResponse({ schema: getSchemaPathForDto(GetEscrowDto) })
	@ApiUnprocessableEntityResponse({ description: "Fiat deadline passed" })
	async markFiatPaid(
		@Signer() signer: string,
		@Param("address") address: string,
	): Promise<ApiEnvelope<GetEscrowDto>> {
		return envelope(await this.service.markFiatPaid(signer, address));
	}

	@Patch(":address/sequential-address")
	@Signed()
	@ApiOperation({ summary: "Set the downstream escrow of a sequential trade (buyer)" })
	@ApiBody({ type: UpdateSequentialAddressInDto })
	@ApiOkResponse({ schema: getSchemaPathForDto(GetEscrowDto) })
	async updateSequentialAddress(
		@Signer() signer: string,
		@Param("address") address: string,
		@Body() dto: UpdateSequentialAddressInDto,
	): Promise<ApiEnvelope<GetEscrowDto>> {
		return envelope(
			await this.service.updateSequentialAddress(signer, address, dto.sequentialAddress),
		);
	}

	@Post(":address/release")
	@Signed()
	@HttpCode(HttpStatus.OK)
	@ApiOperation({ summary: "Pay the fee and release principal (seller or arbitrator)" })
	@ApiOkResponse({ schema: getSchemaPathForDto(GetEscrowDto) })
	@ApiConflictResponse({ description: "Not funded or fiat not confirmed" })
	async release(
		@Signer() signer: string,
		@Param("address") address: string,
	): Promise<ApiEnvelope<GetEscrowDto>> {
		return envelope(await this.service.release(signer, address));
	}

	@Post(":address/cancel")
	@Signed()
	@HttpCode(HttpStatus.OK)
	@ApiOperation({ summary: "Cancel and refund the seller (seller or arbitrator)" })
	@ApiOkResponse({ schema: getSchemaPathForDto(GetEscrowDto) })
	@ApiConflictResponse({ description: "Fiat already confirmed or escrow closed" })
	async cancel(
		@Signer() signer: string,
		@Param("address") address: string,
	): Promise<ApiEnvelope<GetEscrowDto>> {
		return envelope(await this.service.cancel(signer, address));
	}

	@Post(":address/auto-cancel")
	@Signed()
	@HttpCode(HttpStatus.OK)
	@ApiOperation({ summary: "Cancel after a missed deadline (arbitrator)" })
	@ApiOkResponse({ schema: getSchemaPathForDto(GetEscrowDto) })
	@ApiUnprocessableEntityResponse({ description: "Deadline not reached" })
	async autoCancel(
		@Signer() signer: string,
		@Param("address") address: string,
	): Promise<ApiEnvelope<GetEscrowDto>> {
		return envelope(await this.service.autoCancel(signer, address));
	}
}
