import { ApiProperty } from "@nestjs/swagger";
import {
	ArrayMaxSize,
	IsArray,
	IsHexadecimal,
	IsInt,
	IsNotEmpty,
	IsNumberString,
	IsString,
	Length,
	Max,
	MaxLength,
	Min,
} from "class-validator";

const PUBKEY_EXAMPLE =
	"aa5bde6a0a7ef6c04d1f0de1b7c3fb45e5e44b1c0b6a7f3f1f84b6e8e23c4d01";

class ProtocolScopedInDto {
	@ApiProperty({ example: "q3f7p9n4z81k6c0b" })
	@IsString()
	@Length(16, 16)
	protocolId!: string;
}

export class CreateLendingPoolInDto extends ProtocolScopedInDto {
	@ApiProperty({ example: PUBKEY_EXAMPLE })
	@IsHexadecimal()
	@Length(64, 66)
	poolAuthority!: string;

	@ApiProperty({ example: "usdc" })
	@IsString()
	@IsNotEmpty()
	@MaxLength(64)
	assetMint!: string;
}

export class CreateCollateralPoolInDto extends ProtocolScopedInDto {
	@ApiProperty({ example: "sol" })
	@IsString()
	@IsNotEmpty()
	@MaxLength(64)
	assetMint!: string;
}

export class CreateInstitutionalPoolInDto extends ProtocolScopedInDto {
	@ApiProperty({ example: PUBKEY_EXAMPLE })
	@IsHexadecimal()
	@Length(64, 66)
	poolOwner!: string;

	@ApiProperty({ minimum: 0, maximum: 255, example: 3 })
	@IsInt()
	@Min(0)
	@Max(255)
	fixedInterestRate!: number;

	@ApiProperty({ type: [String], example: [PUBKEY_EXAMPLE] })
	@IsArray()
	@ArrayMaxSize(256)
	@IsHexadecimal({ each: true })
	@Length(64, 66, { each: true })
	whitelist!: string[];
}

export class CreateCreditLineInDto extends ProtocolScopedInDto {
	@ApiProperty({ example: PUBKEY_EXAMPLE })
	@IsHexadecimal()
	@Length(64, 66)
	delegator!: string;

	@ApiProperty({ example: PUBKEY_EXAMPLE })
	@IsHexadecimal()
	@Length(64, 66)
	delegate!: string;

	@ApiProperty({ example: "250", description: "u64 as a decimal string" })
	@IsNumberString({ no_symbols: true })
	maxBorrowAmount!: string;
}

export class CreateGovernanceInDto extends ProtocolScopedInDto {}

export class SetReputationInDto {
	@ApiProperty({ example: "700", description: "u64 as a decimal string" })
	@IsNumberString({ no_symbols: true })
	reputationScore!: string;
}

export class MintTokensInDto {
	@ApiProperty({ example: PUBKEY_EXAMPLE })
	@IsHexadecimal()
	@Length(64, 66)
	owner!: string;

	@ApiProperty({ example: "usdc" })
	@IsString()
	@IsNotEmpty()
	@MaxLength(64)
	assetMint!: string;

	@ApiProperty({ example: "1000", description: "u64 as a decimal string" })
	@IsNumberString({ no_symbols: true })
	amount!: string;
}

export class CreatedRecordOutDto {
	@ApiProperty({ example: "q3f7p9n4z81k6c0b" })
	externalId!: string;
}

export class TokenAccountOutDto {
	@ApiProperty({ example: "wallet:<owner>:usdc" })
	address!: string;

	@ApiProperty({ example: "1000" })
	balance!: string;
}

export class ReputationOutDto {
	@ApiProperty()
	borrower!: string;

	@ApiProperty({ example: "700" })
	reputationScore!: string;
}
