import { ApiProperty } from "@nestjs/swagger";
import { IsNumberString, IsString, Length } from "class-validator";

export class SupplyLiquidityInDto {
	@ApiProperty({ example: "q3f7p9n4z81k6c0b" })
	@IsString()
	@Length(16, 16)
	lendingPoolId!: string;

	@ApiProperty({ example: "10000", description: "u64 as a decimal string" })
	@IsNumberString({ no_symbols: true })
	amount!: string;
}

export class LendingPoolDto {
	@ApiProperty({ example: "q3f7p9n4z81k6c0b" })
	lendingPoolId!: string;

	@ApiProperty()
	protocolId!: string;

	@ApiProperty()
	poolAuthority!: string;

	@ApiProperty({ example: "usdc" })
	assetMint!: string;

	@ApiProperty({ example: "9600" })
	totalLiquidity!: string;

	@ApiProperty({ example: "400" })
	totalLoans!: string;

	@ApiProperty({ example: 5 })
	baseInterestRate!: number;

	@ApiProperty({ example: "4" })
	utilizationRate!: string;

	@ApiProperty({ example: "4" })
	lenderRewards!: string;
}

export class CollateralPoolDto {
	@ApiProperty({ example: "z81k6c0bq3f7p9n4" })
	collateralPoolId!: string;

	@ApiProperty()
	protocolId!: string;

	@ApiProperty({ example: "sol" })
	assetMint!: string;

	@ApiProperty({ example: "1000" })
	totalCollateral!: string;
}
