import {
	Body,
	Controller,
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
	ApiOkResponse,
	ApiOperation,
	ApiTags,
	ApiUnprocessableEntityResponse,
} from "@nestjs/swagger";
import { Signer } from "../../auth/signer.decorator";
import { SIGNER_HEADER, SignerGuard } from "../../auth/signer.guard";
import { decodeProof } from "../../common/amounts";
import {
	type ApiEnvelope,
	ApiEnvelopeShellDto,
	envelope,
	getSchemaPathForDto,
} from "../../common/dto/envelopes";
import { LiquidateInDto, LiquidationReceiptDto } from "./dto/liquidation.dto";
import { LiquidationService } from "./liquidation.service";

@ApiTags("4 - Loans")
@ApiExtraModels(ApiEnvelopeShellDto, LiquidationReceiptDto)
@Controller("api/v1/protocols/:protocolId/liquidations")
export class LiquidationController {
	constructor(private readonly liquidationService: LiquidationService) {}

	@Post("")
	@HttpCode(HttpStatus.OK)
	@UseGuards(SignerGuard)
	@ApiHeader({ name: SIGNER_HEADER, required: true })
	@ApiBody({ type: LiquidateInDto })
	@ApiOperation({ summary: "Seize half of an under-collateralized position" })
	@ApiOkResponse({ schema: getSchemaPathForDto(LiquidationReceiptDto) })
	@ApiUnprocessableEntityResponse({ description: "Liquidation not allowed" })
	async liquidate(
		@Param("protocolId") protocolId: string,
		@Body() dto: LiquidateInDto,
		@Signer() signer: string,
	): Promise<ApiEnvelope<LiquidationReceiptDto>> {
		const data = await this.liquidationService.liquidate(
			protocolId,
			dto.borrower.toLowerCase(),
			dto.collateralPoolId,
			signer,
			decodeProof(dto.proof),
		);
		return envelope(data);
	}
}
