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
	CollateralPoolDto,
	LendingPoolDto,
	SupplyLiquidityInDto,
} from "./dto/pools.dto";
import { PoolsService } from "./pools.service";

@ApiTags("2 - Pools")
@ApiExtraModels(ApiEnvelopeShellDto, LendingPoolDto, CollateralPoolDto)
@Controller("api/v1/protocols/:protocolId")
export class PoolsController {
	constructor(private readonly poolsService: PoolsService) {}

	@Post("liquidity")
	@HttpCode(HttpStatus.OK)
	@UseGuards(SignerGuard)
	@ApiHeader({ name: SIGNER_HEADER, required: true })
	@ApiBody({ type: SupplyLiquidityInDto })
	@ApiOperation({ summary: "Supply tokens to a lending pool" })
	@ApiOkResponse({ schema: getSchemaPathForDto(LendingPoolDto) })
	@ApiUnprocessableEntityResponse({ description: "Transfer or math failure" })
	async supplyLiquidity(
		@Param("protocolId") protocolId: string,
		@Body() dto: SupplyLiquidityInDto,
		@Signer() signer: string,
	): Promise<ApiEnvelope<LendingPoolDto>> {
		const data = await this.poolsService.supplyLiquidity(
			protocolId,
			dto.lendingPoolId,
			signer,
			parseU64(dto.amount, "amount"),
		);
		return envelope(data);
	}

	@Get("lending-pools/:lendingPoolId")
	@ApiOperation({ summary: "Lending pool aggregates" })
	@ApiOkResponse({ schema: getSchemaPathForDto(LendingPoolDto) })
	@ApiNotFoundResponse({ description: "Lending pool not found" })
	async getLendingPool(
		@Param("protocolId") protocolId: string,
		@Param("lendingPoolId") lendingPoolId: string,
	): Promise<ApiEnvelope<LendingPoolDto>> {
		return envelope(
			await this.poolsService.getLendingPool(protocolId, lendingPoolId),
		);
	}

	@Get("collateral-pools/:collateralPoolId")
	@ApiOperation({ summary: "Collateral pool aggregates" })
	@ApiOkResponse({ schema: getSchemaPathForDto(CollateralPoolDto) })
	@ApiNotFoundResponse({ description: "Collateral pool not found" })
	async getCollateralPool(
		@Param("protocolId") protocolId: string,
		@Param("collateralPoolId") collateralPoolId: string,
	): Promise<ApiEnvelope<CollateralPoolDto>> {
		return envelope(
			await this.poolsService.getCollateralPool(protocolId, collateralPoolId),
		);
	}
}
