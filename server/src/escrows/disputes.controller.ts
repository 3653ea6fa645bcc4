import {
	Body,
	Controller,
	HttpCode,
	HttpStatus,
	Param,
	ParseEnumPipe,
	Post,
} from "@nestjs/common";
import {
	ApiBody,
	ApiConflictResponse,
	ApiExtraModels,
	ApiForbiddenResponse,
	ApiOkResponse,
	ApiOperation,
	ApiParam,
	ApiTags,
	ApiUnprocessableEntityResponse,
} from "@nestjs/swagger";
import type { PartyRole } from "@stablecoin-escrow/ledger";
import { Signed, Signer } from "../auth/signer.decorator";
import {
	type ApiEnvelope,
	envelope,
	getSchemaPathForDto,
} from "../common/dto/envelopes";
import { ResolveDisputeInDto, SubmitEvidenceInDto } from "./dto/dispute.dto";
import { GetEscrowDto, PARTY_ROLES } from "./dto/get-escrow.dto";
import { GetTokenAccountDto } from "./dto/token-account.dto";
import { EscrowsService } from "./escrows.service";

const PARTY_ROLE_ENUM = { buyer: "buyer", seller: "seller" } as const satisfies Record<
	PartyRole,
	PartyRole
>;

@ApiTags("2 - Disputes")
@ApiExtraModels(GetEscrowDto, GetTokenAccountDto)
@Controller("api/v1/escrows/:address")
export class DisputesController {
	constructor(private readonly service: EscrowsService) {}

	@Post("bond-accounts/:role")
	@Signed()
	@HttpCode(HttpStatus.OK)
	@ApiOperation({ summary: "Create the signer's bond vault ahead of a dispute" })
	@ApiParam({ name: "role", enum: PARTY_ROLES })
	@ApiOkResponse({ schema: getSchemaPathForDto(GetTokenAccountDto) })
	@ApiForbiddenResponse({ description: "Signer is not the party of this role" })
	@ApiConflictResponse({ description: "Vault already holds a bond" })
	async initializeBondAccount(
		@Signer() signer: string,
		@Param("address") address: string,
		@Param("role", new ParseEnumPipe(PARTY_ROLE_ENUM)) role: PartyRole,
	): Promise<ApiEnvelope<GetTokenAccountDto>> {
		return envelope(await this.service.initializeBondAccount(signer, address, role));
	}

	@Post("dispute")
	@Signed()
	@HttpCode(HttpStatus.OK)
	@ApiOperation({ summary: "Open a dispute, posting evidence and a 5% bond" })
	@ApiBody({ type: SubmitEvidenceInDto })
	@ApiOkResponse({ schema: getSchemaPathForDto(GetEscrowDto) })
	@ApiConflictResponse({ description: "Fiat not confirmed or escrow not funded" })
	async open(
		@Signer() signer: string,
		@Param("address") address: string,
		@Body() dto: SubmitEvidenceInDto,
	): Promise<ApiEnvelope<GetEscrowDto>> {
		return envelope(await this.service.openDispute(signer, address, dto.evidenceHash));
	}

	@Post("dispute/response")
	@Signed()
	@HttpCode(HttpStatus.OK)
	@ApiOperation({ summary: "Answer a dispute with evidence and an equal bond" })
	@ApiBody({ type: SubmitEvidenceInDto })
	@ApiOkResponse({ schema: getSchemaPathForDto(GetEscrowDto) })
	@ApiUnprocessableEntityResponse({ description: "Response window closed" })
	async respond(
		@Signer() signer: string,
		@Param("address") address: string,
		@Body() dto: SubmitEvidenceInDto,
	): Promise<ApiEnvelope<GetEscrowDto>> {
		return envelope(
			await this.service.respondToDispute(signer, address, dto.evidenceHash),
		);
	}

	@Post("dispute/resolution")
	@Signed()
	@HttpCode(HttpStatus.OK)
	@ApiOperation({ summary: "Settle a contested dispute (arbitrator)" })
	@ApiBody({ type: ResolveDisputeInDto })
	@ApiOkResponse({ schema: getSchemaPathForDto(GetEscrowDto) })
	@ApiConflictResponse({ description: "Evidence from both parties is required" })
	async resolve(
		@Signer() signer: string,
		@Param("address") address: string,
		@Body() dto: ResolveDisputeInDto,
	): Promise<ApiEnvelope<GetEscrowDto>> {
		return envelope(
			await this.service.resolveDispute(
				signer,
				address,
				dto.buyerWins,
				dto.explanationHash,
			),
		);
	}

	@Post("dispute/default-judgment")
	@Signed()
	@HttpCode(HttpStatus.OK)
	@ApiOperation({ summary: "Award an unanswered dispute to its initiator (arbitrator)" })
	@ApiOkResponse({ schema: getSchemaPathForDto(GetEscrowDto) })
	@ApiUnprocessableEntityResponse({ description: "Response window still open" })
	async defaultJudgment(
		@Signer() signer: string,
		@Param("address") address: string,
	): Promise<ApiEnvelope<GetEscrowDto>> {
		return envelope(await this.service.defaultJudgment(signer, address));
	}
}
