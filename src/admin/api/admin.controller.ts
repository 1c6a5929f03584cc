import {
	Body,
	Controller,
	Get,
	Param,
	Post,
	Put,
	Sse,
} from "@nestjs/common";
import {
	ApiBasicAuth,
	ApiBody,
	ApiCreatedResponse,
	ApiExtraModels,
	ApiOkResponse,
	ApiOperation,
	ApiTags,
} from "@nestjs/swagger";
import { map, type Observable } from "rxjs";
import { parseU64 } from "../../common/amounts";
import {
	type ApiEnvelope,
	ApiEnvelopeShellDto,
	envelope,
	getSchemaPathForDto,
} from "../../common/dto/envelopes";
import {
	type LedgerSse,
	ServerSentEventsService,
	type SseEvent,
} from "../../common/server-sent-events.service";
import { AdminService } from "./admin.service";
import GetAdminStatsDto from "./get-admin-stats";
import {
	CreateCollateralPoolInDto,
	CreateCreditLineInDto,
	CreateGovernanceInDto,
	CreateInstitutionalPoolInDto,
	CreateLendingPoolInDto,
	CreatedRecordOutDto,
	MintTokensInDto,
	ReputationOutDto,
	SetReputationInDto,
	TokenAccountOutDto,
} from "./provisioning-in.dto";

@ApiTags("Admin")
@ApiBasicAuth()
@ApiExtraModels(
	ApiEnvelopeShellDto,
	CreatedRecordOutDto,
	GetAdminStatsDto,
	ReputationOutDto,
	TokenAccountOutDto,
)
@Controller("api/admin/v1")
export class AdminController {
	constructor(
		private readonly adminService: AdminService,
		private readonly sseService: ServerSentEventsService,
	) {}

	@ApiOperation({ summary: "Record counts across all protocols" })
	@ApiOkResponse({ schema: getSchemaPathForDto(GetAdminStatsDto) })
	@Get("stats")
	async stats(): Promise<ApiEnvelope<GetAdminStatsDto>> {
		return envelope(await this.adminService.getStats());
	}

	@Sse("events")
	sse(): Observable<SseEvent<LedgerSse>> {
		return this.sseService.ledgerEvents().pipe(
			map((event) => ({
				data: event,
			})),
		);
	}

	@ApiOperation({ summary: "Create a lending pool" })
	@ApiBody({ type: CreateLendingPoolInDto })
	@ApiCreatedResponse({ schema: getSchemaPathForDto(CreatedRecordOutDto) })
	@Post("lending-pools")
	async createLendingPool(
		@Body() dto: CreateLendingPoolInDto,
	): Promise<ApiEnvelope<CreatedRecordOutDto>> {
		return envelope(await this.adminService.createLendingPool(dto));
	}

	@ApiOperation({ summary: "Create a collateral pool" })
	@ApiBody({ type: CreateCollateralPoolInDto })
	@ApiCreatedResponse({ schema: getSchemaPathForDto(CreatedRecordOutDto) })
	@Post("collateral-pools")
	async createCollateralPool(
		@Body() dto: CreateCollateralPoolInDto,
	): Promise<ApiEnvelope<CreatedRecordOutDto>> {
		return envelope(await this.adminService.createCollateralPool(dto));
	}

	@ApiOperation({ summary: "Create an institutional pool and its whitelist" })
	@ApiBody({ type: CreateInstitutionalPoolInDto })
	@ApiCreatedResponse({ schema: getSchemaPathForDto(CreatedRecordOutDto) })
	@Post("institutional-pools")
	async createInstitutionalPool(
		@Body() dto: CreateInstitutionalPoolInDto,
	): Promise<ApiEnvelope<CreatedRecordOutDto>> {
		return envelope(await this.adminService.createInstitutionalPool(dto));
	}

	@ApiOperation({ summary: "Grant a delegated credit line" })
	@ApiBody({ type: CreateCreditLineInDto })
	@ApiCreatedResponse({ schema: getSchemaPathForDto(CreatedRecordOutDto) })
	@Post("credit-lines")
	async createCreditLine(
		@Body() dto: CreateCreditLineInDto,
	): Promise<ApiEnvelope<CreatedRecordOutDto>> {
		const data = await this.adminService.createCreditLine({
			protocolId: dto.protocolId,
			delegator: dto.delegator,
			delegate: dto.delegate,
			maxBorrowAmount: parseU64(dto.maxBorrowAmount, "maxBorrowAmount"),
		});
		return envelope(data);
	}

	@ApiOperation({ summary: "Create a governance record" })
	@ApiBody({ type: CreateGovernanceInDto })
	@ApiCreatedResponse({ schema: getSchemaPathForDto(CreatedRecordOutDto) })
	@Post("governance")
	async createGovernance(
		@Body() dto: CreateGovernanceInDto,
	): Promise<ApiEnvelope<CreatedRecordOutDto>> {
		return envelope(await this.adminService.createGovernance(dto.protocolId));
	}

	@ApiOperation({ summary: "Set a borrower's reputation score" })
	@ApiBody({ type: SetReputationInDto })
	@ApiOkResponse({ schema: getSchemaPathForDto(ReputationOutDto) })
	@Put("reputations/:borrower")
	async setReputation(
		@Param("borrower") borrower: string,
		@Body() dto: SetReputationInDto,
	): Promise<ApiEnvelope<ReputationOutDto>> {
		const data = await this.adminService.setReputation(
			borrower,
			parseU64(dto.reputationScore, "reputationScore"),
		);
		return envelope(data);
	}

	@ApiOperation({ summary: "Mint tokens into a participant wallet" })
	@ApiBody({ type: MintTokensInDto })
	@ApiCreatedResponse({ schema: getSchemaPathForDto(TokenAccountOutDto) })
	@Post("mints")
	async mint(
		@Body() dto: MintTokensInDto,
	): Promise<ApiEnvelope<TokenAccountOutDto>> {
		const data = await this.adminService.mintTokens({
			owner: dto.owner,
			assetMint: dto.assetMint,
			amount: parseU64(dto.amount, "amount"),
		});
		return envelope(data);
	}

	@ApiOperation({ summary: "Balance of a custodial token account" })
	@ApiOkResponse({ schema: getSchemaPathForDto(TokenAccountOutDto) })
	@Get("token-accounts/:address")
	async tokenAccount(
		@Param("address") address: string,
	): Promise<ApiEnvelope<TokenAccountOutDto>> {
		return envelope(await this.adminService.getTokenAccount(address));
	}
}
