import { Logger } from "@nestjs/common";
import { NestFactory } from "@nestjs/core";
import { DocumentBuilder, SwaggerModule } from "@nestjs/swagger";
import * as dotenv from "dotenv";

dotenv.config();

async function bootstrap() {
	// Imported after dotenv so the environment is validated with .env applied
	const { AppModule } = await import("./app.module");
	const app = await NestFactory.create(AppModule);
	app.enableCors();

	const config = new DocumentBuilder()
		.setTitle("Stablecoin Escrow API")
		.setDescription(
			"Signed requests: `x-signer` (x-only key), `x-timestamp` (ms) and " +
				"`x-signature`, a BIP-340 signature over " +
				"sha256(`{timestamp}:{METHOD}:{path}:{body}`).",
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
	Logger.error(err instanceof Error ? (err.stack ?? err.message) : String(err), "Bootstrap");
	process.exit(1);
});
