import { Module } from "@nestjs/common";
import { ConfigModule } from "@nestjs/config";
import ledgerConfig from "./config/ledger.config";
import { HealthController } from "./health.controller";

@Module({
	imports: [ConfigModule.forFeature(ledgerConfig)],
	controllers: [HealthController],
})
export class HealthModule {}
