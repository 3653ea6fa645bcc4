import { Module } from "@nestjs/common";
import { ServerSentEventsService } from "./server-sent-events.service";

@Module({
	providers: [ServerSentEventsService],
	exports: [ServerSentEventsService],
})
export class EventsModule {}
