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
	ApiHeader,
	ApiNotFoundResponse,
	ApiOkResponse,
	ApiOperation,
	ApiTags,
} from "@nestjs/swagger";
import { Signer } from "../../auth/signer.decorator";
import { SIGNER_HEADER, SignerGuard } from "../../auth/signer.guard";
import { decodeProof, parseU64 } from "../../common/amounts";
import {
	type ApiEnvelope,
	ApiEnvelopeShellDto,
	envelope,
	getSchemaPathForDto,
} from "../../common/dto/envelopes";
import {
	BorrowerPositionDto,
	RebalanceCollateralInDto,
	StakeCollateralInDto,
} from "./dto/positions.dto";
import { PositionsService } from "./positions.service";

@ApiTags("3 - Positions")
@ApiExtraModels(ApiEnvelopeShellDto, BorrowerPositionDto)
@Controller("api/v1/protocols/:protocolId")
export class PositionsController {
	constructor(private readonly positionsService: PositionsService) {}

	@Post("collateral/stake")
	@HttpCode(HttpStatus.OK)
	@UseGuards(SignerGuard)
	@ApiHeader({ name: SIGNER_HEADER, required: true })
	@ApiBody({ type: StakeCollateralInDto })
	@ApiOperation({
		summary: "Stake collateral; opens the signer's account on first use",
	})
	@ApiOkResponse({ schema: getSchemaPathForDto(BorrowerPositionDto) })
	async stake(
		@Param("protocolId") protocolId: string,
		@Body() dto: StakeCollateralInDto,
		@Signer() signer: string,
	): Promise<ApiEnvelope<BorrowerPositionDto>> {
		const data = await this.positionsService.stakeCollateral(
			protocolId,
			signer,
			dto.collateralPoolId,
			parseU64(dto.amount, "amount"),
			decodeProof(dto.proof),
		);
		return envelope(data);
	}

	@Post("collateral/rebalance")
	@HttpCode(HttpStatus.OK)
	@UseGuards(SignerGuard)
	@ApiHeader({ name: SIGNER_HEADER, required: true })
	@ApiBody({ type: RebalanceCollateralInDto })
	@ApiOperation({ summary: "Add to the signer's recorded collateral" })
	@ApiOkResponse({ schema: getSchemaPathForDto(BorrowerPositionDto) })
	@ApiNotFoundResponse({ description: "Signer has no borrower account" })
	async rebalance(
		@Param("protocolId") protocolId: string,
		@Body() dto: RebalanceCollateralInDto,
		@Signer() signer: string,
	): Promise<ApiEnvelope<BorrowerPositionDto>> {
		const data = await this.positionsService.rebalanceCollateral(
			protocolId,
			signer,
			parseU64(dto.delta, "delta"),
			decodeProof(dto.proof),
		);
		return envelope(data);
	}

	@Get("positions/:owner")
	@ApiOperation({ summary: "Sealed collateral and debt of a borrower" })
	@ApiOkResponse({ schema: getSchemaPathForDto(BorrowerPositionDto) })
	@ApiNotFoundResponse({ description: "Borrower account not found" })
	async getPosition(
		@Param("protocolId") protocolId: string,
		@Param("owner") owner: string,
	): Promise<ApiEnvelope<BorrowerPositionDto>> {
		return envelope(
			await this.positionsService.getPosition(protocolId, owner.toLowerCase()),
		);
	}
}
