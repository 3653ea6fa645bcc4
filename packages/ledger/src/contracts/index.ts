/**
 * Contracts module - lifecycle tables and their errors
 */

export type {
	ContractErrorCode,
	Edge,
	StateSpec,
	TransitionTableConfig,
} from "./types.js";

export { ContractError } from "./types.js";

export { TransitionTable, defineState, edge } from "./state-machine.js";
