import { ApiProperty } from "@nestjs/swagger";
import { IsBase64, IsNumberString, IsString, Length } from "class-validator";

export class StakeCollateralInDto {
	@ApiProperty({ example: "z81k6c0bq3f7p9n4" })
	@IsString()
	@Length(16, 16)
	collateralPoolId!: string;

	@ApiProperty({ example: "1000", description: "u64 as a decimal string" })
	@IsNumberString({ no_symbols: true })
	amount!: string;

	@ApiProperty({ example: "cHJvb2Y=", description: "Base64 proof bytes" })
	@IsBase64()
	proof!: string;
}

export class RebalanceCollateralInDto {
	@ApiProperty({ example: "250", description: "u64 as a decimal string" })
	@IsNumberString({ no_symbols: true })
	delta!: string;

	@ApiProperty({ example: "cHJvb2Y=", description: "Base64 proof bytes" })
	@IsBase64()
	proof!: string;
}

export class BorrowerPositionDto {
	@ApiProperty()
	protocolId!: string;

	@ApiProperty()
	owner!: string;

	@ApiProperty({
		example: "enc:v1:AAAAAAAAA+g=",
		description: "Opaque sealed collateral",
	})
	sealedCollateral!: string;

	@ApiProperty({
		example: "enc:v1:AAAAAAAAAZA=",
		description: "Opaque sealed debt",
	})
	sealedBorrowed!: string;

	@ApiProperty({ example: 1_700_000_000, description: "0 when no position is open" })
	borrowTimestamp!: number;

	@ApiProperty({
		type: String,
		nullable: true,
		example: "q3f7p9n4z81k6c0b",
		description: "Pool the open position was borrowed from",
	})
	lendingPoolId!: string | null;

	@ApiProperty()
	hasOpenPosition!: boolean;
}
