import { type INestApplication, ValidationPipe } from "@nestjs/common";
import { LedgerExceptionFilter } from "./common/filters/ledger-exception.filter";

/** Global pipes and filters shared by the server and the e2e tests. */
export function configureApp(app: INestApplication): INestApplication {
	app.useGlobalPipes(
		new ValidationPipe({
			whitelist: true,
			forbidNonWhitelisted: true,
			transform: true,
		}),
	);
	app.useGlobalFilters(new LedgerExceptionFilter());
	app.enableCors();
	return app;
}
