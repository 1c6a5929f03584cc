import { ApiProperty } from "@nestjs/swagger";
import { IsBase64, IsHexadecimal, IsString, Length } from "class-validator";

export class LiquidateInDto {
	@ApiProperty({ description: "Public key of the borrower being liquidated" })
	@IsHexadecimal()
	@Length(64, 66)
	borrower!: string;

	@ApiProperty({ example: "z81k6c0bq3f7p9n4" })
	@IsString()
	@Length(16, 16)
	collateralPoolId!: string;

	@ApiProperty({ example: "cHJvb2Y=", description: "Base64 proof bytes" })
	@IsBase64()
	proof!: string;
}

export class LiquidationReceiptDto {
	@ApiProperty()
	protocolId!: string;

	@ApiProperty()
	borrower!: string;

	@ApiProperty()
	collateralPoolId!: string;

	@ApiProperty({ example: "enc:v1:AAAAAAAAAAA=" })
	sealedCollateral!: string;

	@ApiProperty({ example: "0", description: "Pool total after the seizure" })
	poolTotalCollateral!: string;
}
