import { Injectable } from "@nestjs/common";
import { OnEvent } from "@nestjs/event-emitter";
import { filter, map, type Observable, Subject } from "rxjs";
import { ESCROW_EVENT_WILDCARD, type EscrowEventEnvelope } from "./escrow.event";
import { toJson } from "./json";

export type SseEvent = {
	id: string;
	data: string;
};

function toSseEvent(envelope: EscrowEventEnvelope): SseEvent {
	return { id: envelope.eventId, data: toJson(envelope) };
}

@Injectable()
export class ServerSentEventsService {
	private readonly events$ = new Subject<EscrowEventEnvelope>();

	get adminEvents(): Observable<SseEvent> {
		return this.events$.pipe(map(toSseEvent));
	}

	escrowEvents(address: string): Observable<SseEvent> {
		const target = address.toLowerCase();
		return this.events$.pipe(
			filter((e) => e.escrowAddress === target),
			map(toSseEvent),
		);
	}

	@OnEvent(ESCROW_EVENT_WILDCARD)
	onEscrowEvent(evt: EscrowEventEnvelope) {
		this.events$.next(evt);
	}
}
