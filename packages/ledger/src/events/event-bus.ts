/**
 * Synchronous fan-out of committed ledger events.
 */

import type { LedgerLogger } from "../logger.js";
import type { LedgerEvent, LedgerEventListener } from "./types.js";

export class LedgerEventBus {
	private readonly listeners = new Set<LedgerEventListener>();

	constructor(private readonly logger: LedgerLogger) {}

	/**
	 * @returns Unsubscribe function
	 */
	subscribe(listener: LedgerEventListener): () => void {
		this.listeners.add(listener);
		return () => {
			this.listeners.delete(listener);
		};
	}

	/**
	 * A failing listener is logged and does not stop delivery to the others;
	 * the operation that produced the event has already committed.
	 */
	publish(event: LedgerEvent): void {
		for (const listener of this.listeners) {
			try {
				listener(event);
			} catch (err) {
				const error = err instanceof Error ? err : new Error(String(err));
				this.logger.error(
					`Listener failed on ${event.type} for ${event.escrowAddress}: ${error.message}`,
					error.stack,
				);
			}
		}
	}

	get size(): number {
		return this.listeners.size;
	}
}
