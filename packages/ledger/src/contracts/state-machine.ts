/**
 * Transition Table
 *
 * A stateless lookup over a lifecycle definition. Records carry their own
 * state; the table only answers where an action leads from a given state.
 * The definition is checked once, at construction.
 */

import {
	ContractError,
	type Edge,
	type StateSpec,
	type TransitionTableConfig,
} from "./types.js";

/**
 * @example
 * ```typescript
 * type Door = "closed" | "open" | "removed";
 * type DoorAction = "open" | "close" | "remove";
 *
 * const door = new TransitionTable<Door, DoorAction>({
 *   initial: "closed",
 *   states: [
 *     defineState<Door, DoorAction>("closed", [edge("open", "open")]),
 *     defineState<Door, DoorAction>("open", [edge("remove", "removed")]),
 *     defineState<Door, DoorAction>("removed", [], { final: true }),
 *   ],
 * });
 *
 * door.next("closed", "open"); // "open"
 * ```
 */
export class TransitionTable<TState extends string, TAction extends string> {
	readonly initial: TState;
	private readonly specs = new Map<TState, StateSpec<TState, TAction>>();
	private readonly edges = new Map<TState, Map<TAction, TState>>();

	constructor(config: TransitionTableConfig<TState, TAction>) {
		for (const spec of config.states) {
			if (this.specs.has(spec.name)) {
				throw new ContractError(`State "${spec.name}" defined twice`, "DUPLICATE_STATE");
			}
			if (spec.final && spec.edges.length > 0) {
				throw new ContractError(
					`Final state "${spec.name}" cannot accept actions`,
					"FINAL_STATE_HAS_EDGES",
				);
			}
			const out = new Map<TAction, TState>();
			for (const { action, to } of spec.edges) {
				if (out.has(action)) {
					throw new ContractError(
						`Action "${action}" defined twice on "${spec.name}"`,
						"DUPLICATE_EDGE",
					);
				}
				out.set(action, to);
			}
			this.specs.set(spec.name, spec);
			this.edges.set(spec.name, out);
		}

		for (const [from, out] of this.edges) {
			for (const to of out.values()) {
				this.assertKnown(to, { from });
			}
		}
		this.assertKnown(config.initial);
		this.initial = config.initial;
	}

	/**
	 * Target state of `action` taken in `from`.
	 *
	 * @throws ContractError `ACTION_NOT_ALLOWED` when `from` does not accept it
	 */
	next(from: TState, action: TAction): TState {
		const to = this.outgoing(from).get(action);
		if (to === undefined) {
			throw new ContractError(
				`Action "${action}" is not allowed from state "${from}"`,
				"ACTION_NOT_ALLOWED",
				{ action, state: from, allowedActions: this.allowedActions(from) },
			);
		}
		return to;
	}

	can(from: TState, action: TAction): boolean {
		return this.edges.get(from)?.has(action) ?? false;
	}

	allowedActions(state: TState): TAction[] {
		return Array.from(this.outgoing(state).keys());
	}

	isFinal(state: TState): boolean {
		return this.spec(state).final;
	}

	/** States in definition order */
	states(): TState[] {
		return Array.from(this.specs.keys());
	}

	finalStates(): TState[] {
		return this.states().filter((s) => this.isFinal(s));
	}

	describe(state: TState): string | undefined {
		return this.spec(state).description;
	}

	private spec(state: TState): StateSpec<TState, TAction> {
		const spec = this.specs.get(state);
		if (!spec) {
			throw new ContractError(`Unknown state: ${state}`, "UNKNOWN_STATE", { state });
		}
		return spec;
	}

	private outgoing(state: TState): Map<TAction, TState> {
		const out = this.edges.get(state);
		if (!out) {
			throw new ContractError(`Unknown state: ${state}`, "UNKNOWN_STATE", { state });
		}
		return out;
	}

	private assertKnown(state: TState, details?: object): void {
		if (!this.specs.has(state)) {
			throw new ContractError(`Unknown state: ${state}`, "UNKNOWN_STATE", {
				state,
				...details,
			});
		}
	}
}

export function edge<TState extends string, TAction extends string>(
	action: TAction,
	to: TState,
): Edge<TState, TAction> {
	return { action, to };
}

export function defineState<TState extends string, TAction extends string>(
	name: TState,
	edges: Edge<TState, TAction>[],
	options: { final?: boolean; description?: string } = {},
): StateSpec<TState, TAction> {
	return {
		name,
		edges,
		final: options.final ?? false,
		description: options.description,
	};
}
