import { Module } from "@nestjs/common";
import { EventsModule } from "../../common/events.module";
import { LedgerModule } from "../../ledger/ledger.module";
import { AdminController } from "./admin.controller";
import { AdminService } from "./admin.service";

@Module({
	imports: [LedgerModule, EventsModule],
	controllers: [AdminController],
	providers: [AdminService],
})
export class AdminModule {}
