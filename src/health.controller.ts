import { Controller, Get, Inject, Logger } from "@nestjs/common";
import { ApiOkResponse, ApiOperation, ApiProperty, ApiTags } from "@nestjs/swagger";
import { ConfigService, type ConfigType } from "@nestjs/config";
import { InjectDataSource } from "@nestjs/typeorm";
import type { DataSource } from "typeorm";
import { toError } from "./common/errors";
import ledgerConfig from "./config/ledger.config";

export class LedgerSettingsDto {
	@ApiProperty({ example: "non-empty" })
	proofVerifier!: string;

	@ApiProperty({ example: 5 })
	baseInterestRate!: number;

	@ApiProperty({ example: 600 })
	minCollateralLockTime!: number;
}

export class HealthDto {
	@ApiProperty({ enum: ["ok", "degraded"] })
	status!: "ok" | "degraded";

	@ApiProperty({ example: "2025-08-26T10:00:00.000Z" })
	timestamp!: string;

	@ApiProperty({ example: 12345 })
	uptime!: number;

	@ApiProperty({ example: "production" })
	environment!: string;

	@ApiProperty({ enum: ["up", "down"] })
	database!: "up" | "down";

	@ApiProperty({ type: () => LedgerSettingsDto })
	ledger!: LedgerSettingsDto;
}

@ApiTags("Health")
@Controller("api/v1/health")
export class HealthController {
	private readonly logger = new Logger(HealthController.name);

	constructor(
		private readonly configService: ConfigService,
		@Inject(ledgerConfig.KEY)
		private readonly ledger: ConfigType<typeof ledgerConfig>,
		@InjectDataSource() private readonly dataSource: DataSource,
	) {}

	@Get()
	@ApiOperation({ summary: "Liveness, database reachability and ledger settings" })
	@ApiOkResponse({ type: HealthDto })
	async healthCheck(): Promise<HealthDto> {
		const database = await this.pingDatabase();
		return {
			status: database === "up" ? "ok" : "degraded",
			timestamp: new Date().toISOString(),
			uptime: process.uptime(),
			environment: this.configService.get("NODE_ENV", "development"),
			database,
			ledger: {
				proofVerifier: this.ledger.proofVerifier,
				baseInterestRate: this.ledger.baseInterestRate,
				minCollateralLockTime: this.ledger.minCollateralLockTime,
			},
		};
	}

	private async pingDatabase(): Promise<"up" | "down"> {
		try {
			await this.dataSource.query("SELECT 1");
			return "up";
		} catch (e) {
			this.logger.warn(`Database ping failed: ${toError(e).message}`);
			return "down";
		}
	}
}
