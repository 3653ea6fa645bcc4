import {
	type MiddlewareConsumer,
	Module,
	type NestModule,
	ValidationPipe,
} from "@nestjs/common";
import { ConfigModule } from "@nestjs/config";
import { APP_FILTER, APP_PIPE } from "@nestjs/core";
import { EventEmitterModule } from "@nestjs/event-emitter";
import { TypeOrmModule } from "@nestjs/typeorm";

import { AdminController } from "./admin/api/admin.controller";
import { AdminModule } from "./admin/api/admin.module";
import { AuthModule } from "./auth/auth.module";
import { BasicAuthMiddleware } from "./basic-auth.middleware";
import { LedgerExceptionFilter } from "./common/filters/ledger-exception.filter";
import { RequestLoggingMiddleware } from "./common/middlewares/request-logging.middleware";
import { validate } from "./config/env.validation";
import { DisputesController } from "./escrows/disputes.controller";
import { EscrowsController } from "./escrows/escrows.controller";
import { EscrowsModule } from "./escrows/escrows.module";
import { WalletsController } from "./escrows/wallets.controller";
import { HealthModule } from "./health.module";

const isTest = process.env.NODE_ENV === "test";

@Module({
	imports: [
		ConfigModule.forRoot({ isGlobal: true, validate, ignoreEnvFile: isTest }),
		EventEmitterModule.forRoot({ wildcard: true, delimiter: "." }),
		TypeOrmModule.forRootAsync({
			useFactory: () => ({
				type: "better-sqlite3",
				database: isTest
					? ":memory:"
					: (process.env.SQLITE_DB_PATH ?? "escrow.sqlite"),
				synchronize: true,
				autoLoadEntities: true,
			}),
		}),
		AuthModule,
		EscrowsModule,
		AdminModule,
		HealthModule,
	],
	providers: [
		{
			provide: APP_PIPE,
			useValue: new ValidationPipe({
				whitelist: true,
				forbidNonWhitelisted: true,
				transform: true,
			}),
		},
		{ provide: APP_FILTER, useClass: LedgerExceptionFilter },
	],
})
export class AppModule implements NestModule {
	configure(consumer: MiddlewareConsumer) {
		consumer.apply(BasicAuthMiddleware).forRoutes(AdminController);

		consumer
			.apply(RequestLoggingMiddleware)
			.forRoutes(EscrowsController, DisputesController, WalletsController, AdminController);
	}
}
