import { Custody } from "../../custody/custody.js";
import {
	ARBITRATOR,
	BUYER,
	BUYER_EVIDENCE,
	EXPLANATION,
	FORWARD_WALLET,
	OUTSIDER,
	PROGRAM_ID,
	SELLER,
	SELLER_EVIDENCE,
	START,
	WALLET_FUNDS,
	type LedgerHarness,
	createEscrow,
	createHarness,
	createPaidEscrow,
} from "../../test-utils.js";
import type { EscrowRecord } from "./types.js";

const HOUR = 60 * 60;

describe("EscrowLedger disputes", () => {
	let h: LedgerHarness;
	let escrow: EscrowRecord;

	beforeEach(async () => {
		h = await createHarness();
		escrow = await createPaidEscrow(h.ledger);
	});

	const vaults = () => h.ledger.deriveAddresses(1n, 7n);

	describe("end-to-end arbitration", () => {
		it("opens, responds and resolves for the buyer", async () => {
			const opened = await h.ledger.openDisputeWithBond(
				BUYER,
				escrow.address,
				BUYER_EVIDENCE,
			);
			expect(await h.ledger.balanceOf(vaults().buyerBondVault)).toBe(50_000n);
			expect(await h.ledger.balanceOf(BUYER)).toBe(WALLET_FUNDS - 50_000n);
			expect(opened.phase).toEqual({
				state: "disputed",
				dispute: {
					initiator: "buyer",
					initiatedAt: START,
					responseDeadline: START + 72 * HOUR,
					arbitrationDeadline: { kind: "none" },
					submissions: {
						buyer: {
							kind: "some",
							value: { evidenceHash: BUYER_EVIDENCE, bond: 50_000n, submittedAt: START },
						},
						seller: { kind: "none" },
					},
				},
			});

			h.clock.advance(HOUR);
			const responded = await h.ledger.respondToDisputeWithBond(
				SELLER,
				escrow.address,
				SELLER_EVIDENCE,
			);
			expect(await h.ledger.balanceOf(vaults().sellerBondVault)).toBe(50_000n);
			if (responded.phase.state !== "disputed") throw new Error("not disputed");
			expect(responded.phase.dispute.arbitrationDeadline).toEqual({
				kind: "some",
				value: START + HOUR + 168 * HOUR,
			});

			const buyerBefore = await h.ledger.balanceOf(BUYER);
			const resolved = await h.ledger.resolveDisputeWithExplanation(
				ARBITRATOR,
				escrow.address,
				true,
				EXPLANATION,
			);

			expect((await h.ledger.balanceOf(BUYER)) - buyerBefore).toBe(1_050_000n);
			expect(await h.ledger.balanceOf(ARBITRATOR)).toBe(60_000n);
			expect(await h.ledger.balanceOf(SELLER)).toBe(WALLET_FUNDS - 1_010_000n - 50_000n);
			expect(await h.ledger.balanceOf(vaults().buyerBondVault)).toBe(0n);
			expect(await h.ledger.balanceOf(vaults().sellerBondVault)).toBe(0n);
			expect(await h.ledger.getAccount(vaults().principalVault)).toBeNull();
			expect(await h.ledger.getAccount(vaults().buyerBondVault)).toBeNull();
			expect(await h.ledger.getAccount(vaults().sellerBondVault)).toBeNull();

			expect(resolved.counter).toBe(2);
			expect(resolved.trackedBalance).toBe(0n);
			if (resolved.phase.state !== "resolved") throw new Error("not resolved");
			expect(resolved.phase.resolution).toEqual({
				kind: "arbitrated",
				winner: "buyer",
				explanationHash: EXPLANATION,
				resolvedAt: START + HOUR,
			});
		});

		it("pays the seller when the seller wins", async () => {
			await h.ledger.openDisputeWithBond(BUYER, escrow.address, BUYER_EVIDENCE);
			await h.ledger.respondToDisputeWithBond(SELLER, escrow.address, SELLER_EVIDENCE);
			const sellerBefore = await h.ledger.balanceOf(SELLER);

			await h.ledger.resolveDisputeWithExplanation(
				ARBITRATOR,
				escrow.address,
				false,
				EXPLANATION,
			);

			expect((await h.ledger.balanceOf(SELLER)) - sellerBefore).toBe(1_060_000n);
			expect(await h.ledger.balanceOf(ARBITRATOR)).toBe(50_000n);
			expect(await h.ledger.balanceOf(BUYER)).toBe(WALLET_FUNDS - 50_000n);
			expect(h.events.at(-1)).toMatchObject({
				type: "DisputeResolved",
				winner: "seller",
				counter: 2,
				explanationHash: EXPLANATION,
			});
		});

		it("forwards a buyer award to the sequential address", async () => {
			const sequential = await createPaidEscrow(h.ledger, {
				tradeId: 8n,
				sequential: true,
				sequentialAddress: FORWARD_WALLET,
			});
			await h.ledger.openDisputeWithBond(SELLER, sequential.address, SELLER_EVIDENCE);
			await h.ledger.respondToDisputeWithBond(BUYER, sequential.address, BUYER_EVIDENCE);

			await h.ledger.resolveDisputeWithExplanation(
				ARBITRATOR,
				sequential.address,
				true,
				EXPLANATION,
			);

			expect(await h.ledger.balanceOf(FORWARD_WALLET)).toBe(1_000_000n);
			// bond returns to the buyer's own wallet
			expect(await h.ledger.balanceOf(BUYER)).toBe(WALLET_FUNDS);
		});

		it("settles amounts whose fee and bond round to zero", async () => {
			const tiny = await createPaidEscrow(h.ledger, { tradeId: 9n, amount: 10n });
			expect(tiny.fee).toBe(0n);

			await h.ledger.openDisputeWithBond(BUYER, tiny.address, BUYER_EVIDENCE);
			await h.ledger.respondToDisputeWithBond(SELLER, tiny.address, SELLER_EVIDENCE);
			await h.ledger.resolveDisputeWithExplanation(
				ARBITRATOR,
				tiny.address,
				true,
				EXPLANATION,
			);

			expect(await h.ledger.balanceOf(BUYER)).toBe(WALLET_FUNDS + 10n);
			expect(await h.ledger.balanceOf(ARBITRATOR)).toBe(0n);
			const tinyVaults = h.ledger.deriveAddresses(1n, 9n);
			expect(await h.ledger.getAccount(tinyVaults.buyerBondVault)).toBeNull();
		});
	});

	describe("openDisputeWithBond", () => {
		it("requires fiat to be paid", async () => {
			const unpaid = await createEscrow(h.ledger, { tradeId: 8n });
			await h.ledger.fundEscrow(SELLER, unpaid.address);

			await expect(
				h.ledger.openDisputeWithBond(BUYER, unpaid.address, BUYER_EVIDENCE),
			).rejects.toMatchObject({ code: "FIAT_NOT_PAID", kind: "state" });
		});

		it("cannot be opened twice", async () => {
			await h.ledger.openDisputeWithBond(BUYER, escrow.address, BUYER_EVIDENCE);
			await expect(
				h.ledger.openDisputeWithBond(SELLER, escrow.address, SELLER_EVIDENCE),
			).rejects.toMatchObject({ code: "INVALID_STATE", kind: "state" });
		});

		it("is limited to the trading parties", async () => {
			await expect(
				h.ledger.openDisputeWithBond(OUTSIDER, escrow.address, BUYER_EVIDENCE),
			).rejects.toMatchObject({ code: "UNAUTHORIZED", kind: "authorization" });
			await expect(
				h.ledger.openDisputeWithBond(ARBITRATOR, escrow.address, BUYER_EVIDENCE),
			).rejects.toMatchObject({ code: "UNAUTHORIZED" });
		});

		it("validates the evidence hash length", async () => {
			await expect(
				h.ledger.openDisputeWithBond(BUYER, escrow.address, "0b".repeat(31)),
			).rejects.toMatchObject({ code: "INVALID_HASH", kind: "validation" });
		});

		it("rolls back when the bond cannot be paid", async () => {
			await new Custody(h.storage, PROGRAM_ID).transfer(BUYER, FORWARD_WALLET, WALLET_FUNDS, {
				kind: "owner",
				address: BUYER,
			});

			await expect(
				h.ledger.openDisputeWithBond(BUYER, escrow.address, BUYER_EVIDENCE),
			).rejects.toMatchObject({ code: "INSUFFICIENT_FUNDS", kind: "funds" });
			expect(await h.ledger.getAccount(vaults().buyerBondVault)).toBeNull();
			expect((await h.ledger.getEscrow(escrow.address)).phase.state).toBe("funded");
		});

		it("publishes the bond and response deadline", async () => {
			await h.ledger.openDisputeWithBond(SELLER, escrow.address, SELLER_EVIDENCE);

			expect(h.events.at(-1)).toMatchObject({
				type: "DisputeOpened",
				initiator: "seller",
				party: SELLER,
				evidenceHash: SELLER_EVIDENCE,
				bond: 50_000n,
				responseDeadline: START + 72 * HOUR,
				counter: 1,
			});
		});
	});

	describe("respondToDisputeWithBond", () => {
		beforeEach(async () => {
			await h.ledger.openDisputeWithBond(BUYER, escrow.address, BUYER_EVIDENCE);
		});

		it("is reserved to the other party", async () => {
			await expect(
				h.ledger.respondToDisputeWithBond(BUYER, escrow.address, SELLER_EVIDENCE),
			).rejects.toMatchObject({ code: "UNAUTHORIZED" });
		});

		it("accepts one response only", async () => {
			await h.ledger.respondToDisputeWithBond(SELLER, escrow.address, SELLER_EVIDENCE);
			await expect(
				h.ledger.respondToDisputeWithBond(SELLER, escrow.address, "0d".repeat(32)),
			).rejects.toMatchObject({ code: "ALREADY_RESPONDED", kind: "state" });
		});

		it("requires distinct evidence", async () => {
			await expect(
				h.ledger.respondToDisputeWithBond(SELLER, escrow.address, BUYER_EVIDENCE),
			).rejects.toMatchObject({ code: "DUPLICATE_EVIDENCE", kind: "validation" });
		});

		it("closes at the response deadline", async () => {
			h.clock.advance(72 * HOUR);
			await expect(
				h.ledger.respondToDisputeWithBond(SELLER, escrow.address, SELLER_EVIDENCE),
			).rejects.toMatchObject({ code: "RESPONSE_DEADLINE_EXPIRED", kind: "deadline" });
		});

		it("requires an open dispute", async () => {
			const other = await createPaidEscrow(h.ledger, { tradeId: 8n });
			await expect(
				h.ledger.respondToDisputeWithBond(SELLER, other.address, SELLER_EVIDENCE),
			).rejects.toMatchObject({ code: "INVALID_STATE" });
		});
	});

	describe("resolveDisputeWithExplanation", () => {
		it("needs both bonds and evidence", async () => {
			await h.ledger.openDisputeWithBond(BUYER, escrow.address, BUYER_EVIDENCE);
			await expect(
				h.ledger.resolveDisputeWithExplanation(ARBITRATOR, escrow.address, true, EXPLANATION),
			).rejects.toMatchObject({ code: "EVIDENCE_INCOMPLETE", kind: "state" });
		});

		it("is reserved to the arbitrator", async () => {
			await h.ledger.openDisputeWithBond(BUYER, escrow.address, BUYER_EVIDENCE);
			await h.ledger.respondToDisputeWithBond(SELLER, escrow.address, SELLER_EVIDENCE);
			await expect(
				h.ledger.resolveDisputeWithExplanation(SELLER, escrow.address, false, EXPLANATION),
			).rejects.toMatchObject({ code: "UNAUTHORIZED" });
		});

		it("warns on late resolution by default", async () => {
			await h.ledger.openDisputeWithBond(BUYER, escrow.address, BUYER_EVIDENCE);
			await h.ledger.respondToDisputeWithBond(SELLER, escrow.address, SELLER_EVIDENCE);
			h.clock.advance(168 * HOUR + 1);

			const resolved = await h.ledger.resolveDisputeWithExplanation(
				ARBITRATOR,
				escrow.address,
				true,
				EXPLANATION,
			);

			expect(resolved.phase.state).toBe("resolved");
			expect(h.logger.warnings).toEqual([
				`Resolving ${escrow.address} 1s after the arbitration deadline`,
			]);
		});

		it("blocks late resolution when enforced", async () => {
			const strict = await createHarness({ arbitrationDeadlinePolicy: "enforce" });
			const late = await createPaidEscrow(strict.ledger);
			await strict.ledger.openDisputeWithBond(BUYER, late.address, BUYER_EVIDENCE);
			await strict.ledger.respondToDisputeWithBond(SELLER, late.address, SELLER_EVIDENCE);
			strict.clock.advance(168 * HOUR + 1);

			await expect(
				strict.ledger.resolveDisputeWithExplanation(
					ARBITRATOR,
					late.address,
					true,
					EXPLANATION,
				),
			).rejects.toMatchObject({ code: "ARBITRATION_DEADLINE_EXPIRED", kind: "deadline" });
		});
	});

	describe("defaultJudgment", () => {
		it("awards a buyer initiator principal and bond", async () => {
			await h.ledger.openDisputeWithBond(BUYER, escrow.address, BUYER_EVIDENCE);
			h.clock.advance(72 * HOUR + 1);

			const resolved = await h.ledger.defaultJudgment(ARBITRATOR, escrow.address);

			expect(await h.ledger.balanceOf(BUYER)).toBe(WALLET_FUNDS + 1_000_000n);
			expect(await h.ledger.balanceOf(ARBITRATOR)).toBe(10_000n);
			expect(await h.ledger.balanceOf(SELLER)).toBe(WALLET_FUNDS - 1_010_000n);
			expect(await h.ledger.getAccount(vaults().buyerBondVault)).toBeNull();
			expect(resolved.counter).toBe(2);
			if (resolved.phase.state !== "resolved") throw new Error("not resolved");
			expect(resolved.phase.resolution).toEqual({
				kind: "default-judgment",
				winner: "buyer",
				resolvedAt: START + 72 * HOUR + 1,
			});
			expect(h.events.at(-1)).toMatchObject({
				type: "DisputeDefaultJudgment",
				winner: "buyer",
			});
		});

		it("awards a seller initiator principal, fee and bond", async () => {
			await h.ledger.openDisputeWithBond(SELLER, escrow.address, SELLER_EVIDENCE);
			h.clock.advance(72 * HOUR + 1);

			await h.ledger.defaultJudgment(ARBITRATOR, escrow.address);

			expect(await h.ledger.balanceOf(SELLER)).toBe(WALLET_FUNDS);
			expect(await h.ledger.balanceOf(BUYER)).toBe(WALLET_FUNDS);
			expect(await h.ledger.balanceOf(ARBITRATOR)).toBe(0n);
		});

		it("waits until the response window has passed", async () => {
			await h.ledger.openDisputeWithBond(BUYER, escrow.address, BUYER_EVIDENCE);
			h.clock.advance(72 * HOUR);

			await expect(
				h.ledger.defaultJudgment(ARBITRATOR, escrow.address),
			).rejects.toMatchObject({ code: "RESPONSE_DEADLINE_NOT_REACHED", kind: "deadline" });
		});

		it("does not apply once both parties posted", async () => {
			await h.ledger.openDisputeWithBond(BUYER, escrow.address, BUYER_EVIDENCE);
			await h.ledger.respondToDisputeWithBond(SELLER, escrow.address, SELLER_EVIDENCE);
			h.clock.advance(72 * HOUR + 1);

			await expect(
				h.ledger.defaultJudgment(ARBITRATOR, escrow.address),
			).rejects.toMatchObject({ code: "ALREADY_RESPONDED", kind: "state" });
		});

		it("is reserved to the arbitrator", async () => {
			await h.ledger.openDisputeWithBond(BUYER, escrow.address, BUYER_EVIDENCE);
			h.clock.advance(72 * HOUR + 1);

			await expect(h.ledger.defaultJudgment(BUYER, escrow.address)).rejects.toMatchObject({
				code: "UNAUTHORIZED",
			});
		});
	});

	describe("initializeBondAccount", () => {
		it("creates the vault once and is idempotent while empty", async () => {
			const first = await h.ledger.initializeBondAccount(BUYER, escrow.address, "buyer");
			const second = await h.ledger.initializeBondAccount(BUYER, escrow.address, "buyer");

			expect(first).toEqual({
				address: vaults().buyerBondVault,
				owner: escrow.address,
				kind: "buyer-bond-vault",
				escrow: { kind: "some", value: escrow.address },
				balance: 0n,
			});
			expect(second).toEqual(first);
			expect(
				h.events.filter((e) => e.type === "BondAccountInitialized"),
			).toHaveLength(1);
		});

		it("is used by a later dispute", async () => {
			await h.ledger.initializeBondAccount(SELLER, escrow.address, "seller");
			await h.ledger.openDisputeWithBond(SELLER, escrow.address, SELLER_EVIDENCE);

			expect(await h.ledger.balanceOf(vaults().sellerBondVault)).toBe(50_000n);
		});

		it("refuses to reinitialize a populated vault", async () => {
			await h.ledger.openDisputeWithBond(BUYER, escrow.address, BUYER_EVIDENCE);

			await expect(
				h.ledger.initializeBondAccount(BUYER, escrow.address, "buyer"),
			).rejects.toMatchObject({ code: "ALREADY_INITIALIZED", kind: "reinitialization" });
		});

		it("only lets the payer initialize", async () => {
			await expect(
				h.ledger.initializeBondAccount(SELLER, escrow.address, "buyer"),
			).rejects.toMatchObject({ code: "UNAUTHORIZED" });
		});

		it("closes an unused bond vault on release", async () => {
			await h.ledger.initializeBondAccount(BUYER, escrow.address, "buyer");
			await h.ledger.releaseEscrow(SELLER, escrow.address);

			expect(await h.ledger.getAccount(vaults().buyerBondVault)).toBeNull();
			await expect(
				h.ledger.initializeBondAccount(BUYER, escrow.address, "buyer"),
			).rejects.toMatchObject({ code: "INVALID_STATE" });
		});

		it("closes bond vaults opened before funding when the escrow is cancelled", async () => {
			const unfunded = await createEscrow(h.ledger, { tradeId: 11n });
			const unfundedVaults = h.ledger.deriveAddresses(1n, 11n);
			await h.ledger.initializeBondAccount(BUYER, unfunded.address, "buyer");
			await h.ledger.initializeBondAccount(SELLER, unfunded.address, "seller");

			const cancelled = await h.ledger.cancelEscrow(SELLER, unfunded.address);

			expect(cancelled.phase).toEqual({ state: "cancelled", automatic: false });
			expect(await h.ledger.getAccount(unfundedVaults.buyerBondVault)).toBeNull();
			expect(await h.ledger.getAccount(unfundedVaults.sellerBondVault)).toBeNull();
			expect(h.events.at(-1)).toMatchObject({ type: "EscrowCancelled", refunded: 0n });
		});
	});
});
