import {
	Body,
	Controller,
	Get,
	HttpCode,
	HttpStatus,
	Param,
	Post,
	UseGuards,
} from "@nestjs/common";
import {
	ApiBody,
	ApiExtraModels,
	ApiForbiddenResponse,
	ApiHeader,
	ApiNotFoundResponse,
	ApiOkResponse,
	ApiOperation,
	ApiTags,
	ApiUnprocessableEntityResponse,
} from "@nestjs/swagger";
import { Signer } from "../../auth/signer.decorator";
import { SIGNER_HEADER, SignerGuard } from "../../auth/signer.guard";
import { parseU64 } from "../../common/amounts";
import {
	type ApiEnvelope,
	ApiEnvelopeShellDto,
	envelope,
	getSchemaPathForDto,
} from "../../common/dto/envelopes";
import {
	GovernanceDto,
	ProposeChangeInDto,
	VoteInDto,
} from "./dto/governance.dto";
import { GovernanceService } from "./governance.service";

@ApiTags("6 - Governance")
@ApiExtraModels(ApiEnvelopeShellDto, GovernanceDto)
@Controller("api/v1/governance/:governanceId")
export class GovernanceController {
	constructor(private readonly governanceService: GovernanceService) {}

	@Get("")
	@ApiOperation({ summary: "Live proposal and its tally" })
	@ApiOkResponse({ schema: getSchemaPathForDto(GovernanceDto) })
	@ApiNotFoundResponse({ description: "Governance record not found" })
	async getOne(
		@Param("governanceId") governanceId: string,
	): Promise<ApiEnvelope<GovernanceDto>> {
		return envelope(await this.governanceService.getGovernance(governanceId));
	}

	@Post("proposals")
	@HttpCode(HttpStatus.OK)
	@UseGuards(SignerGuard)
	@ApiHeader({ name: SIGNER_HEADER, required: true })
	@ApiBody({ type: ProposeChangeInDto })
	@ApiOperation({ summary: "Replace the live proposal" })
	@ApiOkResponse({ schema: getSchemaPathForDto(GovernanceDto) })
	async propose(
		@Param("governanceId") governanceId: string,
		@Body() dto: ProposeChangeInDto,
		@Signer() signer: string,
	): Promise<ApiEnvelope<GovernanceDto>> {
		const data = await this.governanceService.proposeChange(
			governanceId,
			signer,
			dto.proposalType,
			parseU64(dto.newValue, "newValue"),
		);
		return envelope(data);
	}

	@Post("votes")
	@HttpCode(HttpStatus.OK)
	@UseGuards(SignerGuard)
	@ApiHeader({ name: SIGNER_HEADER, required: true })
	@ApiBody({ type: VoteInDto })
	@ApiOperation({ summary: "Vote for or against the live proposal" })
	@ApiOkResponse({ schema: getSchemaPathForDto(GovernanceDto) })
	@ApiForbiddenResponse({ description: "Signer is not whitelisted" })
	@ApiUnprocessableEntityResponse({ description: "Stale proposal id" })
	async vote(
		@Param("governanceId") governanceId: string,
		@Body() dto: VoteInDto,
		@Signer() signer: string,
	): Promise<ApiEnvelope<GovernanceDto>> {
		const data = await this.governanceService.vote(
			governanceId,
			dto.institutionalPoolId,
			signer,
			parseU64(dto.proposalId, "proposalId"),
			dto.vote,
		);
		return envelope(data);
	}
}
