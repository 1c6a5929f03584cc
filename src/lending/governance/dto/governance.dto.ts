import { ApiProperty } from "@nestjs/swagger";
import {
	IsBoolean,
	IsInt,
	IsNumberString,
	IsString,
	Length,
	Max,
	Min,
} from "class-validator";

export class ProposeChangeInDto {
	@ApiProperty({ minimum: 0, maximum: 255, example: 1 })
	@IsInt()
	@Min(0)
	@Max(255)
	proposalType!: number;

	@ApiProperty({ example: "7", description: "u64 as a decimal string" })
	@IsNumberString({ no_symbols: true })
	newValue!: string;
}

export class VoteInDto {
	@ApiProperty({
		example: "c0bq3f7p9n4z81k6",
		description: "Institutional pool whose whitelist grants the vote",
	})
	@IsString()
	@Length(16, 16)
	institutionalPoolId!: string;

	@ApiProperty({ example: "1" })
	@IsNumberString({ no_symbols: true })
	proposalId!: string;

	@ApiProperty({ description: "true to vote for, false to vote against" })
	@IsBoolean()
	vote!: boolean;
}

export class GovernanceDto {
	@ApiProperty({ example: "k6c0bq3f7p9n4z81" })
	governanceId!: string;

	@ApiProperty()
	protocolId!: string;

	@ApiProperty({ example: "1" })
	proposalId!: string;

	@ApiProperty({ example: 1 })
	proposalType!: number;

	@ApiProperty({ example: "7" })
	newValue!: string;

	@ApiProperty({ example: "-1", description: "Signed tally" })
	votes!: string;
}
