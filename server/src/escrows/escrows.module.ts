import { Module } from "@nestjs/common";
import { AuthModule } from "../auth/auth.module";
import { EventsModule } from "../common/events.module";
import { LedgerModule } from "../ledger/ledger.module";
import { DisputesController } from "./disputes.controller";
import { EscrowsController } from "./escrows.controller";
import { EscrowsService } from "./escrows.service";
import { WalletsController } from "./wallets.controller";

@Module({
	imports: [LedgerModule, AuthModule, EventsModule],
	providers: [EscrowsService],
	controllers: [EscrowsController, DisputesController, WalletsController],
	exports: [EscrowsService],
})
export class EscrowsModule {}
