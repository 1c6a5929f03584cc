import { Controller, Get, Param, Post } from "@nestjs/common";
import {
	ApiCreatedResponse,
	ApiExtraModels,
	ApiNotFoundResponse,
	ApiOkResponse,
	ApiOperation,
	ApiTags,
} from "@nestjs/swagger";
import {
	type ApiEnvelope,
	ApiEnvelopeShellDto,
	envelope,
	getSchemaPathForDto,
} from "../../common/dto/envelopes";
import { ProtocolDto, ProtocolTreasuryDto } from "./dto/protocol.dto";
import { ProtocolService } from "./protocol.service";

@ApiTags("1 - Protocol")
@ApiExtraModels(ApiEnvelopeShellDto, ProtocolDto, ProtocolTreasuryDto)
@Controller("api/v1/protocols")
export class ProtocolController {
	constructor(private readonly protocolService: ProtocolService) {}

	@Post("")
	@ApiOperation({ summary: "Create a protocol state and its treasury" })
	@ApiCreatedResponse({
		description: "Protocol initialized",
		schema: getSchemaPathForDto(ProtocolDto),
	})
	async initialize(): Promise<ApiEnvelope<ProtocolDto>> {
		return envelope(await this.protocolService.initialize());
	}

	@Get(":protocolId")
	@ApiOperation({ summary: "Protocol aggregates and treasury" })
	@ApiOkResponse({ schema: getSchemaPathForDto(ProtocolDto) })
	@ApiNotFoundResponse({ description: "Protocol not found" })
	async getOne(
		@Param("protocolId") protocolId: string,
	): Promise<ApiEnvelope<ProtocolDto>> {
		return envelope(await this.protocolService.getProtocol(protocolId));
	}
}
