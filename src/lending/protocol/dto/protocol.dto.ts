import { ApiProperty } from "@nestjs/swagger";

export class ProtocolTreasuryDto {
	@ApiProperty({ example: "4" })
	totalFeesCollected!: string;

	@ApiProperty({ example: "0" })
	governanceFund!: string;
}

export class ProtocolDto {
	@ApiProperty({ example: "q3f7p9n4z81k6c0b" })
	protocolId!: string;

	@ApiProperty({ example: "0", description: "u64 as a decimal string" })
	totalCollateral!: string;

	@ApiProperty({ example: "400" })
	totalLoans!: string;

	@ApiProperty({ example: "9600" })
	totalLiquidity!: string;

	@ApiProperty({ example: 5, description: "Annual rate in percent" })
	baseInterestRate!: number;

	@ApiProperty({
		example: "4",
		description: "floor(totalLoans * 100 / totalLiquidity), may exceed 100",
	})
	utilizationRate!: string;

	@ApiProperty({ example: 600 })
	minCollateralLockTime!: number;

	@ApiProperty({ type: () => ProtocolTreasuryDto })
	treasury!: ProtocolTreasuryDto;
}
