import { Module } from "@nestjs/common";
import { ConfigModule, type ConfigType } from "@nestjs/config";
import { TypeOrmModule } from "@nestjs/typeorm";
import ledgerConfig from "../config/ledger.config";
import { AtomicTransaction } from "./atomic-transaction.service";
import { SystemClock } from "./clock";
import { createProofVerifier } from "./proof-verifier";
import { CLOCK, PROOF_VERIFIER, TOKEN_TRANSFER } from "./runtime.constants";
import { TokenAccount } from "./token-account.entity";
import { LedgerTokenTransfer } from "./token-transfer.service";

@Module({
	imports: [
		TypeOrmModule.forFeature([TokenAccount]),
		ConfigModule.forFeature(ledgerConfig),
	],
	providers: [
		AtomicTransaction,
		LedgerTokenTransfer,
		{ provide: TOKEN_TRANSFER, useExisting: LedgerTokenTransfer },
		{ provide: CLOCK, useClass: SystemClock },
		{
			provide: PROOF_VERIFIER,
			inject: [ledgerConfig.KEY],
			useFactory: (cfg: ConfigType<typeof ledgerConfig>) =>
				createProofVerifier(cfg.proofVerifier),
		},
	],
	exports: [
		AtomicTransaction,
		LedgerTokenTransfer,
		TOKEN_TRANSFER,
		CLOCK,
		PROOF_VERIFIER,
	],
})
export class RuntimeModule {}
