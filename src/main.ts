import "reflect-metadata";
import { Logger } from "@nestjs/common";
import { NestFactory } from "@nestjs/core";
import { DocumentBuilder, SwaggerModule } from "@nestjs/swagger";
import * as dotenv from "dotenv";
import { AppModule } from "./app.module";
import { configureApp } from "./app.setup";

dotenv.config();

async function bootstrap() {
	const app = configureApp(await NestFactory.create(AppModule));

	const config = new DocumentBuilder()
		.setTitle("Confidential Lending Ledger API")
		.setDescription(
			"Participant routes identify the caller with the `x-signer-pubkey` header",
		)
		.setVersion("0.1.0")
		.addBasicAuth()
		.build();
	const doc = SwaggerModule.createDocument(app, config);
	SwaggerModule.setup("api/v1/docs", app, doc, {
		swaggerOptions: {
			tagsSorter: "alpha",
			operationsSorter: "alpha",
		},
	});

	const port = parseInt(process.env.PORT ?? "3000", 10);
	await app.listen(port, "0.0.0.0");
	Logger.log(`API listening on http://0.0.0.0:${port}`, "Bootstrap");
}

bootstrap().catch((err: unknown) => {
	Logger.error(
		"Failed to start",
		err instanceof Error ? err.stack : String(err),
		"Bootstrap",
	);
	process.exit(1);
});
