import { ConfigModule } from "@nestjs/config";
import {
	MiddlewareConsumer,
	Module,
	NestModule,
	RequestMethod,
} from "@nestjs/common";
import { TypeOrmModule } from "@nestjs/typeorm";
import { EventEmitterModule } from "@nestjs/event-emitter";

import { HealthModule } from "./health.module";
import { LendingModule } from "./lending/lending.module";
import { AdminModule } from "./admin/api/admin.module";
import { RequestLoggingMiddleware } from "./common/middlewares/request-logging.middleware";
import { BasicAuthMiddleware } from "./basic-auth.middleware";

const isTest = process.env.NODE_ENV === "test";

@Module({
	imports: [
		EventEmitterModule.forRoot(),
		ConfigModule.forRoot({ isGlobal: true }),
		TypeOrmModule.forRootAsync({
			useFactory: () => ({
				type: "better-sqlite3",
				database: isTest
					? ":memory:"
					: (process.env.SQLITE_DB_PATH ?? "data/ledger.sqlite"),
				synchronize: true,
				autoLoadEntities: true,
			}),
		}),
		LendingModule,
		AdminModule,
		HealthModule,
	],
})
export class AppModule implements NestModule {
	configure(consumer: MiddlewareConsumer) {
		consumer
			.apply(BasicAuthMiddleware)
			.forRoutes({ path: "api/admin/*", method: RequestMethod.ALL });

		consumer
			.apply(RequestLoggingMiddleware)
			.exclude({ path: "api/v1/health", method: RequestMethod.ALL })
			.forRoutes({ path: "*", method: RequestMethod.ALL });
	}
}
