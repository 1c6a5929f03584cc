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
	ApiOkResponse,
	ApiOperation,
	ApiTags,
	ApiUnprocessableEntityResponse,
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
import { type BorrowCommand, BorrowingService } from "./borrowing.service";
import {
	BorrowInDto,
	BorrowReceiptDto,
	DelegatedBorrowInDto,
	InstitutionalBorrowInDto,
	RepayInDto,
	RepayReceiptDto,
	RepaymentQuoteDto,
} from "./dto/loans.dto";
import { RepaymentService } from "./repayment.service";

const toCommand = (
	protocolId: string,
	dto: BorrowInDto,
	signer: string,
): BorrowCommand => ({
	protocolId,
	lendingPoolId: dto.lendingPoolId,
	signer,
	amount: parseU64(dto.amount, "amount"),
	proof: decodeProof(dto.proof),
});

@ApiTags("4 - Loans")
@ApiExtraModels(
	ApiEnvelopeShellDto,
	BorrowReceiptDto,
	RepayReceiptDto,
	RepaymentQuoteDto,
)
@ApiHeader({ name: SIGNER_HEADER, required: true })
@UseGuards(SignerGuard)
@Controller("api/v1/protocols/:protocolId/loans")
export class LoansController {
	constructor(
		private readonly borrowing: BorrowingService,
		private readonly repayment: RepaymentService,
	) {}

	@Post("borrow")
	@HttpCode(HttpStatus.OK)
	@ApiBody({ type: BorrowInDto })
	@ApiOperation({ summary: "Borrow against the signer's collateral" })
	@ApiOkResponse({ schema: getSchemaPathForDto(BorrowReceiptDto) })
	@ApiUnprocessableEntityResponse({
		description: "Lock time, collateral, transfer or math failure",
	})
	async borrow(
		@Param("protocolId") protocolId: string,
		@Body() dto: BorrowInDto,
		@Signer() signer: string,
	): Promise<ApiEnvelope<BorrowReceiptDto>> {
		return envelope(
			await this.borrowing.borrow(toCommand(protocolId, dto, signer)),
		);
	}

	@Post("institutional-borrow")
	@HttpCode(HttpStatus.OK)
	@ApiBody({ type: InstitutionalBorrowInDto })
	@ApiOperation({ summary: "Borrow as a whitelisted institution" })
	@ApiOkResponse({ schema: getSchemaPathForDto(BorrowReceiptDto) })
	@ApiForbiddenResponse({ description: "Signer is not whitelisted" })
	async institutionalBorrow(
		@Param("protocolId") protocolId: string,
		@Body() dto: InstitutionalBorrowInDto,
		@Signer() signer: string,
	): Promise<ApiEnvelope<BorrowReceiptDto>> {
		return envelope(
			await this.borrowing.institutionalBorrow(
				toCommand(protocolId, dto, signer),
				dto.institutionalPoolId,
			),
		);
	}

	@Post("delegated-borrow")
	@HttpCode(HttpStatus.OK)
	@ApiBody({ type: DelegatedBorrowInDto })
	@ApiOperation({
		summary: "Borrow on a credit line against the delegator's collateral",
	})
	@ApiOkResponse({ schema: getSchemaPathForDto(BorrowReceiptDto) })
	@ApiForbiddenResponse({ description: "Signer is not the credit line delegate" })
	async delegatedBorrow(
		@Param("protocolId") protocolId: string,
		@Body() dto: DelegatedBorrowInDto,
		@Signer() signer: string,
	): Promise<ApiEnvelope<BorrowReceiptDto>> {
		return envelope(
			await this.borrowing.delegatedBorrow(
				toCommand(protocolId, dto, signer),
				dto.delegatedBorrowerId,
			),
		);
	}

	@Get("quote")
	@ApiOperation({ summary: "Amount the signer must repay right now" })
	@ApiOkResponse({ schema: getSchemaPathForDto(RepaymentQuoteDto) })
	async quote(
		@Param("protocolId") protocolId: string,
		@Signer() signer: string,
	): Promise<ApiEnvelope<RepaymentQuoteDto>> {
		return envelope(await this.repayment.quote(protocolId, signer));
	}

	@Post("repay")
	@HttpCode(HttpStatus.OK)
	@ApiBody({ type: RepayInDto })
	@ApiOperation({ summary: "Repay the signer's whole debt with interest" })
	@ApiOkResponse({ schema: getSchemaPathForDto(RepayReceiptDto) })
	@ApiUnprocessableEntityResponse({
		description: "Amount below principal plus interest",
	})
	async repay(
		@Param("protocolId") protocolId: string,
		@Body() dto: RepayInDto,
		@Signer() signer: string,
	): Promise<ApiEnvelope<RepayReceiptDto>> {
		const data = await this.repayment.repay(
			protocolId,
			dto.lendingPoolId,
			signer,
			parseU64(dto.amount, "amount"),
		);
		return envelope(data);
	}
}
