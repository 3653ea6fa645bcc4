/**
 * Escrow State Machine Configuration
 *
 * Defines the state machine for the escrow record lifecycle.
 */

import {
	ContractError,
	type Edge,
	TransitionTable,
	defineState,
	edge,
} from "../../contracts/index.js";
import { LedgerError } from "../../core/errors.js";
import type { EscrowAction, EscrowState } from "./types.js";

/** Sequential address updates are accepted in every open state */
const keep = (state: EscrowState): Edge<EscrowState, EscrowAction> =>
	edge("update-sequential-address", state);

/**
 * Escrow lifecycle.
 *
 * States:
 * - created: record exists, waiting for the seller's deposit
 * - funded: principal and fee held in the principal vault
 * - disputed: bonded evidence exchange in progress
 * - released: principal paid out to the buyer side (terminal)
 * - cancelled: deposit refunded or never made (terminal)
 * - resolved: dispute settled by the arbitrator (terminal)
 */
export const ESCROW_STATE_MACHINE = new TransitionTable<EscrowState, EscrowAction>({
	initial: "created",
	states: [
		defineState<EscrowState, EscrowAction>(
			"created",
			[
				edge("fund", "funded"),
				edge("cancel", "cancelled"),
				edge("auto-cancel", "cancelled"),
				keep("created"),
			],
			{ description: "Escrow created, waiting for the seller's deposit" },
		),
		defineState<EscrowState, EscrowAction>(
			"funded",
			[
				edge("mark-fiat-paid", "funded"),
				edge("release", "released"),
				edge("cancel", "cancelled"),
				edge("auto-cancel", "cancelled"),
				edge("open-dispute", "disputed"),
				keep("funded"),
			],
			{ description: "Deposit held, waiting for fiat confirmation" },
		),
		defineState<EscrowState, EscrowAction>(
			"disputed",
			[
				edge("respond-dispute", "disputed"),
				edge("resolve-dispute", "resolved"),
				edge("default-judgment", "resolved"),
				keep("disputed"),
			],
			{ description: "Bonded dispute in progress" },
		),
		defineState<EscrowState, EscrowAction>("released", [], {
			final: true,
			description: "Principal released and fee collected",
		}),
		defineState<EscrowState, EscrowAction>("cancelled", [], {
			final: true,
			description: "Escrow cancelled, any deposit refunded",
		}),
		defineState<EscrowState, EscrowAction>("resolved", [], {
			final: true,
			description: "Dispute resolved by the arbitrator",
		}),
	],
});

/**
 * Resolve the target state of `action` from `state`, or throw INVALID_STATE.
 */
export function nextEscrowState(
	state: EscrowState,
	action: EscrowAction,
): EscrowState {
	try {
		return ESCROW_STATE_MACHINE.next(state, action);
	} catch (err) {
		if (err instanceof ContractError) {
			throw new LedgerError("INVALID_STATE", err.message, {
				state,
				action,
				allowedActions: ESCROW_STATE_MACHINE.allowedActions(state),
			});
		}
		throw err;
	}
}

/**
 * Check if a state is a terminal state.
 */
export function isFinalState(state: EscrowState): boolean {
	return ESCROW_STATE_MACHINE.isFinal(state);
}

/**
 * Check if a state means the escrow still holds or awaits funds.
 */
export function isActiveState(state: EscrowState): boolean {
	return !isFinalState(state);
}

/**
 * Get the allowed actions for a state.
 */
export function getAllowedActions(state: EscrowState): EscrowAction[] {
	return ESCROW_STATE_MACHINE.allowedActions(state);
}
