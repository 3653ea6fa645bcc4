/**
 * Deadline enforcement
 *
 * Stateless checks of the current time against a record's stored
 * deadlines. Nothing runs on a timer; a lapsed deadline only matters when
 * someone next submits an operation.
 */

import { LedgerError } from "../../core/errors.js";
import type { LedgerLogger } from "../../logger.js";
import type {
	ArbitrationDeadlinePolicy,
	DisputeInfo,
	EscrowRecord,
} from "./types.js";

const MINUTE = 60;
const HOUR = 60 * MINUTE;

export const DEPOSIT_WINDOW_SECONDS = 15 * MINUTE;
export const FIAT_WINDOW_SECONDS = 30 * MINUTE;
export const DISPUTE_RESPONSE_WINDOW_SECONDS = 72 * HOUR;
export const ARBITRATION_WINDOW_SECONDS = 168 * HOUR;

export function assertDepositWindowOpen(record: EscrowRecord, now: number): void {
	if (now >= record.depositDeadline) {
		throw new LedgerError(
			"DEPOSIT_DEADLINE_EXPIRED",
			`Deposit deadline passed at ${record.depositDeadline}`,
			{ deadline: record.depositDeadline, now },
		);
	}
}

export function assertFiatWindowOpen(record: EscrowRecord, now: number): void {
	if (now >= record.fiatDeadline) {
		throw new LedgerError(
			"FIAT_DEADLINE_EXPIRED",
			`Fiat confirmation deadline passed at ${record.fiatDeadline}`,
			{ deadline: record.fiatDeadline, now },
		);
	}
}

export function assertResponseWindowOpen(dispute: DisputeInfo, now: number): void {
	if (now >= dispute.responseDeadline) {
		throw new LedgerError(
			"RESPONSE_DEADLINE_EXPIRED",
			`Dispute response deadline passed at ${dispute.responseDeadline}`,
			{ deadline: dispute.responseDeadline, now },
		);
	}
}

export function assertResponseWindowElapsed(
	dispute: DisputeInfo,
	now: number,
): void {
	if (now <= dispute.responseDeadline) {
		throw new LedgerError(
			"RESPONSE_DEADLINE_NOT_REACHED",
			`Dispute response window is open until ${dispute.responseDeadline}`,
			{ deadline: dispute.responseDeadline, now },
		);
	}
}

/**
 * (created ∧ deposit deadline passed) ∨ (funded ∧ fiat deadline passed ∧
 * fiat not paid)
 */
export function isAutoCancelEligible(record: EscrowRecord, now: number): boolean {
	switch (record.phase.state) {
		case "created":
			return now > record.depositDeadline;
		case "funded":
			return !record.fiatPaid && now > record.fiatDeadline;
		default:
			return false;
	}
}

/**
 * The arbitration window is recorded when the respondent posts. Under
 * "warn" a late resolution is logged and allowed; under "enforce" it is
 * rejected.
 *
 * @returns whether the resolution is late
 */
export function checkArbitrationDeadline(
	dispute: DisputeInfo,
	now: number,
	policy: ArbitrationDeadlinePolicy,
	logger: LedgerLogger,
	escrowAddress: string,
): boolean {
	if (dispute.arbitrationDeadline.kind === "none") return false;
	const deadline = dispute.arbitrationDeadline.value;
	if (now <= deadline) return false;

	if (policy === "enforce") {
		throw new LedgerError(
			"ARBITRATION_DEADLINE_EXPIRED",
			`Arbitration deadline passed at ${deadline}`,
			{ deadline, now },
		);
	}
	logger.warn(
		`Resolving ${escrowAddress} ${now - deadline}s after the arbitration deadline`,
	);
	return true;
}
