import { Logger, Module } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { TypeOrmModule } from "@nestjs/typeorm";
import {
	type Clock,
	EscrowLedger,
	SystemClock,
} from "@stablecoin-escrow/ledger";
import { DataSource } from "typeorm";
import { ledgerConfig } from "../config/ledger.config";
import { EscrowRecordEntity } from "./entities/escrow-record.entity";
import { TokenAccountEntity } from "./entities/token-account.entity";
import { LedgerEventsBridge } from "./ledger-events.bridge";
import { LEDGER, LEDGER_CLOCK, LEDGER_STORAGE } from "./ledger.tokens";
import { TypeOrmLedgerStorage } from "./typeorm-ledger-storage";

@Module({
	imports: [TypeOrmModule.forFeature([EscrowRecordEntity, TokenAccountEntity])],
	providers: [
		{ provide: LEDGER_CLOCK, useValue: new SystemClock() },
		{
			provide: LEDGER_STORAGE,
			inject: [DataSource],
			useFactory: (dataSource: DataSource) => new TypeOrmLedgerStorage(dataSource),
		},
		{
			provide: LEDGER,
			inject: [ConfigService, LEDGER_STORAGE, LEDGER_CLOCK],
			useFactory: (
				config: ConfigService,
				storage: TypeOrmLedgerStorage,
				clock: Clock,
			) => {
				const settings = ledgerConfig(config);
				const logger = new Logger(EscrowLedger.name);
				logger.log(
					`Ledger ${settings.programId} arbitrated by ${settings.arbitrator} (${settings.arbitrationDeadlinePolicy} on late resolution)`,
				);
				return new EscrowLedger({ ...settings, storage, clock, logger });
			},
		},
		LedgerEventsBridge,
	],
	exports: [LEDGER, LEDGER_CLOCK],
})
export class LedgerModule {}
