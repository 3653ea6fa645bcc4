/**
 * Lifecycle tables: states, the actions each accepts and where they lead.
 */

export interface Edge<TState extends string, TAction extends string> {
	action: TAction;
	to: TState;
}

export interface StateSpec<TState extends string, TAction extends string> {
	name: TState;
	/** Every action accepted in this state; an empty list means none */
	edges: Edge<TState, TAction>[];
	/** Terminal states accept no further action */
	final: boolean;
	description?: string;
}

export interface TransitionTableConfig<
	TState extends string,
	TAction extends string,
> {
	initial: TState;
	states: StateSpec<TState, TAction>[];
}

export type ContractErrorCode =
	| "ACTION_NOT_ALLOWED"
	| "UNKNOWN_STATE"
	| "DUPLICATE_STATE"
	| "DUPLICATE_EDGE"
	| "FINAL_STATE_HAS_EDGES"
	| (string & {});

/**
 * Base error for lifecycle violations. Domain errors extend it with their
 * own code tables.
 */
export class ContractError extends Error {
	constructor(
		message: string,
		public readonly code?: ContractErrorCode,
		public readonly details?: unknown,
	) {
		super(message);
		this.name = "ContractError";
	}
}
