import { ApiProperty } from "@nestjs/swagger";

type PositionStats = {
	accounts: number;
	open: number;
};

export default class GetAdminStatsDto {
	@ApiProperty({ example: 2 })
	protocols!: number;

	@ApiProperty({ description: "Borrower accounts and open positions" })
	positions!: PositionStats;

	@ApiProperty({ example: 3 })
	lendingPools!: number;
}
