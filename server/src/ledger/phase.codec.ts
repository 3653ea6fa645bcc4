import {
	type DisputeInfo,
	type DisputeSubmission,
	type EscrowPhase,
	type Maybe,
	type Resolution,
	none,
	some,
} from "@stablecoin-escrow/ledger";

type StoredSubmission = Omit<DisputeSubmission, "bond"> & { bond: string };

type StoredDispute = Omit<DisputeInfo, "submissions"> & {
	submissions: { buyer: Maybe<StoredSubmission>; seller: Maybe<StoredSubmission> };
};

type StoredPhase =
	| { state: "created" }
	| { state: "funded" }
	| { state: "released" }
	| { state: "cancelled"; automatic: boolean }
	| { state: "disputed"; dispute: StoredDispute }
	| { state: "resolved"; dispute: StoredDispute; resolution: Resolution };

function mapMaybe<A, B>(value: Maybe<A>, fn: (a: A) => B): Maybe<B> {
	return value.kind === "some" ? some(fn(value.value)) : none();
}

function encodeDispute(dispute: DisputeInfo): StoredDispute {
	const encode = (s: DisputeSubmission): StoredSubmission => ({
		...s,
		bond: s.bond.toString(),
	});
	return {
		...dispute,
		submissions: {
			buyer: mapMaybe(dispute.submissions.buyer, encode),
			seller: mapMaybe(dispute.submissions.seller, encode),
		},
	};
}

function decodeDispute(stored: StoredDispute): DisputeInfo {
	const decode = (s: StoredSubmission): DisputeSubmission => ({
		...s,
		bond: BigInt(s.bond),
	});
	return {
		...stored,
		submissions: {
			buyer: mapMaybe(stored.submissions.buyer, decode),
			seller: mapMaybe(stored.submissions.seller, decode),
		},
	};
}

export function encodePhase(phase: EscrowPhase): string {
	let stored: StoredPhase;
	switch (phase.state) {
		case "disputed":
			stored = { state: "disputed", dispute: encodeDispute(phase.dispute) };
			break;
		case "resolved":
			stored = {
				state: "resolved",
				dispute: encodeDispute(phase.dispute),
				resolution: phase.resolution,
			};
			break;
		default:
			stored = phase;
	}
	return JSON.stringify(stored);
}

export function decodePhase(text: string): EscrowPhase {
	const stored: StoredPhase = JSON.parse(text);
	switch (stored.state) {
		case "disputed":
			return { state: "disputed", dispute: decodeDispute(stored.dispute) };
		case "resolved":
			return {
				state: "resolved",
				dispute: decodeDispute(stored.dispute),
				resolution: stored.resolution,
			};
		default:
			return stored;
	}
}
