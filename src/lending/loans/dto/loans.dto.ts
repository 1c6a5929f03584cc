import { ApiProperty } from "@nestjs/swagger";
import { IsBase64, IsNumberString, IsString, Length } from "class-validator";

export class BorrowInDto {
	@ApiProperty({ example: "q3f7p9n4z81k6c0b" })
	@IsString()
	@Length(16, 16)
	lendingPoolId!: string;

	@ApiProperty({ example: "400", description: "u64 as a decimal string" })
	@IsNumberString({ no_symbols: true })
	amount!: string;

	@ApiProperty({ example: "cHJvb2Y=", description: "Base64 proof bytes" })
	@IsBase64()
	proof!: string;
}

export class InstitutionalBorrowInDto extends BorrowInDto {
	@ApiProperty({ example: "c0bq3f7p9n4z81k6" })
	@IsString()
	@Length(16, 16)
	institutionalPoolId!: string;
}

export class DelegatedBorrowInDto extends BorrowInDto {
	@ApiProperty({ example: "p9n4z81k6c0bq3f7" })
	@IsString()
	@Length(16, 16)
	delegatedBorrowerId!: string;
}

export class RepayInDto {
	@ApiProperty({ example: "q3f7p9n4z81k6c0b" })
	@IsString()
	@Length(16, 16)
	lendingPoolId!: string;

	@ApiProperty({ example: "420", description: "u64 as a decimal string" })
	@IsNumberString({ no_symbols: true })
	amount!: string;
}

export class BorrowReceiptDto {
	@ApiProperty()
	protocolId!: string;

	@ApiProperty()
	lendingPoolId!: string;

	@ApiProperty({ enum: ["open", "institutional", "delegated"] })
	policy!: "open" | "institutional" | "delegated";

	@ApiProperty({ description: "Account whose debt grew" })
	positionOwner!: string;

	@ApiProperty({ description: "Key the net amount was paid to" })
	recipient!: string;

	@ApiProperty({ example: "400" })
	amount!: string;

	@ApiProperty({ example: "4" })
	fee!: string;

	@ApiProperty({ example: "396" })
	netAmount!: string;

	@ApiProperty({ example: 1_700_000_000 })
	borrowTimestamp!: number;
}

export class RepaymentQuoteDto {
	@ApiProperty()
	owner!: string;

	@ApiProperty({ example: "400" })
	principal!: string;

	@ApiProperty({ example: "20" })
	interest!: string;

	@ApiProperty({ example: "420" })
	totalDue!: string;

	@ApiProperty({ example: 31_536_000 })
	elapsedSeconds!: number;
}

export class RepayReceiptDto {
	@ApiProperty()
	protocolId!: string;

	@ApiProperty()
	lendingPoolId!: string;

	@ApiProperty()
	owner!: string;

	@ApiProperty({ example: "420" })
	amountPaid!: string;

	@ApiProperty({ example: "4" })
	lenderReward!: string;
}
