import {
	Inject,
	Injectable,
	Logger,
	type OnModuleDestroy,
	type OnModuleInit,
} from "@nestjs/common";
import { EventEmitter2 } from "@nestjs/event-emitter";
import { EscrowLedger, type LedgerEvent } from "@stablecoin-escrow/ledger";
import { nanoid } from "nanoid";
import { ESCROW_EVENT_IDS, type EscrowEventEnvelope } from "../common/escrow.event";
import { LEDGER } from "./ledger.tokens";

/**
 * Re-emits committed ledger events on the application's EventEmitter2 as
 * `escrow.<kind>`.
 */
@Injectable()
export class LedgerEventsBridge implements OnModuleInit, OnModuleDestroy {
	private readonly logger = new Logger(LedgerEventsBridge.name);
	private unsubscribe?: () => void;

	constructor(
		@Inject(LEDGER) private readonly ledger: EscrowLedger,
		private readonly events: EventEmitter2,
	) {}

	onModuleInit() {
		this.unsubscribe = this.ledger.subscribe((event) => this.forward(event));
	}

	onModuleDestroy() {
		this.unsubscribe?.();
	}

	forward(event: LedgerEvent) {
		const name = ESCROW_EVENT_IDS[event.type];
		this.events.emit(name, {
			eventId: nanoid(16),
			name,
			escrowAddress: event.escrowAddress,
			emittedAt: new Date().toISOString(),
			event,
		} satisfies EscrowEventEnvelope);
		this.logger.debug(`${name} ${event.escrowAddress} #${event.counter}`);
	}
}
