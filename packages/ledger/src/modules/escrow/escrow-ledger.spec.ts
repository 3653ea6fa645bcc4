import { Custody } from "../../custody/custody.js";
import {
	ARBITRATOR,
	BUYER,
	FORWARD_WALLET,
	OUTSIDER,
	PROGRAM_ID,
	SELLER,
	START,
	WALLET_FUNDS,
	type LedgerHarness,
	createEscrow,
	createHarness,
	createPaidEscrow,
} from "../../test-utils.js";
import { ESCROW_STATE_MACHINE } from "./escrow-state-machine.js";

describe("EscrowLedger", () => {
	let h: LedgerHarness;

	beforeEach(async () => {
		h = await createHarness();
	});

	describe("end-to-end release", () => {
		it("creates, funds, confirms and releases", async () => {
			// A: create
			const created = await createEscrow(h.ledger, { amount: 1_000_000n });
			expect(created.fee).toBe(10_000n);
			expect(created.phase).toEqual({ state: "created" });
			expect(created.depositDeadline).toBe(START + 15 * 60);
			expect(created.fiatDeadline).toBe(0);
			expect(created.counter).toBe(0);

			// B: fund
			const vaults = h.ledger.deriveAddresses(1n, 7n);
			const funded = await h.ledger.fundEscrow(SELLER, created.address);
			expect(await h.ledger.balanceOf(SELLER)).toBe(WALLET_FUNDS - 1_010_000n);
			expect(await h.ledger.balanceOf(vaults.principalVault)).toBe(1_010_000n);
			expect(funded.trackedBalance).toBe(1_010_000n);
			expect(funded.phase).toEqual({ state: "funded" });
			expect(funded.fiatDeadline).toBe(START + 30 * 60);
			expect(funded.counter).toBe(1);

			// C: mark fiat paid
			const paid = await h.ledger.markFiatPaid(BUYER, created.address);
			expect(paid.fiatPaid).toBe(true);
			expect(paid.counter).toBe(1);

			// D: release
			const released = await h.ledger.releaseEscrow(SELLER, created.address);
			expect(await h.ledger.balanceOf(BUYER)).toBe(WALLET_FUNDS + 1_000_000n);
			expect(await h.ledger.balanceOf(ARBITRATOR)).toBe(10_000n);
			expect(released.phase).toEqual({ state: "released" });
			expect(released.counter).toBe(2);
			expect(released.trackedBalance).toBe(0n);
			expect(await h.ledger.getAccount(vaults.principalVault)).toBeNull();
		});

		it("lands in the state the transition table names for each action", async () => {
			const created = await createEscrow(h.ledger);
			expect(created.phase.state).toBe(ESCROW_STATE_MACHINE.initial);

			const funded = await h.ledger.fundEscrow(SELLER, created.address);
			expect(funded.phase.state).toBe(ESCROW_STATE_MACHINE.next("created", "fund"));

			const paid = await h.ledger.markFiatPaid(BUYER, created.address);
			expect(paid.phase.state).toBe(ESCROW_STATE_MACHINE.next("funded", "mark-fiat-paid"));

			const released = await h.ledger.releaseEscrow(SELLER, created.address);
			expect(released.phase.state).toBe(ESCROW_STATE_MACHINE.next("funded", "release"));
		});

		it("emits one event per operation with the running counter", async () => {
			const escrow = await createPaidEscrow(h.ledger);
			await h.ledger.releaseEscrow(SELLER, escrow.address);

			expect(h.events.map((e) => [e.type, e.counter])).toEqual([
				["EscrowCreated", 0],
				["FundsDeposited", 1],
				["FiatMarkedPaid", 1],
				["EscrowReleased", 2],
			]);
			const release = h.events[3];
			expect(release).toMatchObject({
				escrowAddress: escrow.address,
				escrowId: 1n,
				tradeId: 7n,
				timestamp: START,
				releasedBy: SELLER,
				recipient: BUYER,
			});
			if (release?.type !== "EscrowReleased") throw new Error("unexpected event");
			expect(release.payouts).toEqual([
				{
					from: h.ledger.deriveAddresses(1n, 7n).principalVault,
					to: ARBITRATOR,
					amount: 10_000n,
					reason: "fee",
				},
				{
					from: h.ledger.deriveAddresses(1n, 7n).principalVault,
					to: BUYER,
					amount: 1_000_000n,
					reason: "principal",
				},
			]);
		});

		it("lets the arbitrator release", async () => {
			const escrow = await createPaidEscrow(h.ledger);
			const released = await h.ledger.releaseEscrow(ARBITRATOR, escrow.address);
			expect(released.phase.state).toBe("released");
		});

		it("stops delivering events after unsubscribe", async () => {
			const seen: string[] = [];
			const unsubscribe = h.ledger.subscribe((e) => seen.push(e.type));
			await createEscrow(h.ledger);
			unsubscribe();
			await createEscrow(h.ledger, { tradeId: 8n });

			expect(seen).toEqual(["EscrowCreated"]);
		});
	});

	describe("createEscrow", () => {
		it("rejects zero and oversized amounts", async () => {
			await expect(createEscrow(h.ledger, { amount: 0n })).rejects.toMatchObject({
				code: "INVALID_AMOUNT",
				kind: "validation",
			});
			await expect(
				createEscrow(h.ledger, { amount: 100_000_001n }),
			).rejects.toMatchObject({ code: "AMOUNT_TOO_LARGE" });
		});

		it("requires a forwarding address for sequential escrows", async () => {
			await expect(
				createEscrow(h.ledger, { sequential: true }),
			).rejects.toMatchObject({ code: "MISSING_SEQUENTIAL_ADDRESS", kind: "validation" });
		});

		it("rejects a forwarding address on a direct escrow", async () => {
			await expect(
				createEscrow(h.ledger, { sequentialAddress: FORWARD_WALLET }),
			).rejects.toMatchObject({ code: "NOT_SEQUENTIAL" });
		});

		it("rejects overlapping parties", async () => {
			await expect(
				h.ledger.createEscrow(SELLER, {
					escrowId: 1n,
					tradeId: 7n,
					buyer: SELLER,
					amount: 1_000n,
					sequential: false,
				}),
			).rejects.toMatchObject({ code: "INVALID_PARTIES" });
			await expect(
				h.ledger.createEscrow(SELLER, {
					escrowId: 1n,
					tradeId: 7n,
					buyer: ARBITRATOR,
					amount: 1_000n,
					sequential: false,
				}),
			).rejects.toMatchObject({ code: "INVALID_PARTIES" });
		});

		it("places the record at its derived address", async () => {
			const escrow = await createEscrow(h.ledger, { escrowId: 3n, tradeId: 4n });
			expect(escrow.address).toBe(h.ledger.deriveAddresses(3n, 4n).record);
			expect(await h.ledger.findEscrow(3n, 4n)).toEqual(escrow);
			expect(await h.ledger.findEscrow(3n, 5n)).toBeNull();
		});

		it("refuses a second active escrow with the same identifiers", async () => {
			await createEscrow(h.ledger);
			await expect(createEscrow(h.ledger)).rejects.toMatchObject({
				code: "ESCROW_EXISTS",
				kind: "reinitialization",
			});
		});

		it("reuses identifiers once the previous escrow is terminal", async () => {
			const first = await createEscrow(h.ledger);
			await h.ledger.cancelEscrow(SELLER, first.address);

			const second = await createEscrow(h.ledger, { amount: 2_000n });
			expect(second.address).toBe(first.address);
			expect(second.phase).toEqual({ state: "created" });
			expect(second.counter).toBe(0);
			expect(second.amount).toBe(2_000n);
		});
	});

	describe("fundEscrow", () => {
		it("only accepts the seller", async () => {
			const escrow = await createEscrow(h.ledger);
			await expect(h.ledger.fundEscrow(BUYER, escrow.address)).rejects.toMatchObject({
				code: "UNAUTHORIZED",
				kind: "authorization",
			});
		});

		it("closes at the deposit deadline", async () => {
			const escrow = await createEscrow(h.ledger);
			h.clock.advance(15 * 60);

			await expect(h.ledger.fundEscrow(SELLER, escrow.address)).rejects.toMatchObject({
				code: "DEPOSIT_DEADLINE_EXPIRED",
				kind: "deadline",
			});
		});

		it("accepts a deposit one second before the deadline", async () => {
			const escrow = await createEscrow(h.ledger);
			h.clock.advance(15 * 60 - 1);

			const funded = await h.ledger.fundEscrow(SELLER, escrow.address);
			expect(funded.fiatDeadline).toBe(START + 15 * 60 - 1 + 30 * 60);
		});

		it("fails on a second deposit without touching balances", async () => {
			const escrow = await createEscrow(h.ledger);
			await h.ledger.fundEscrow(SELLER, escrow.address);
			const vault = h.ledger.deriveAddresses(1n, 7n).principalVault;

			await expect(h.ledger.fundEscrow(SELLER, escrow.address)).rejects.toMatchObject({
				code: "INVALID_STATE",
				kind: "state",
			});
			expect(await h.ledger.balanceOf(SELLER)).toBe(WALLET_FUNDS - 1_010_000n);
			expect(await h.ledger.balanceOf(vault)).toBe(1_010_000n);
			expect((await h.ledger.getEscrow(escrow.address)).counter).toBe(1);
		});

		it("rolls back the vault when the seller cannot pay", async () => {
			const escrow = await createEscrow(h.ledger, { amount: 100_000_000n });
			const vault = h.ledger.deriveAddresses(1n, 7n).principalVault;

			await expect(h.ledger.fundEscrow(SELLER, escrow.address)).rejects.toMatchObject({
				code: "INSUFFICIENT_FUNDS",
				kind: "funds",
			});
			expect(await h.ledger.getAccount(vault)).toBeNull();
			expect((await h.ledger.getEscrow(escrow.address)).phase.state).toBe("created");
			expect(h.events.map((e) => e.type)).toEqual(["EscrowCreated"]);
		});

		it("refuses to reinitialize an existing principal vault", async () => {
			const escrow = await createEscrow(h.ledger);
			const vaults = h.ledger.deriveAddresses(1n, 7n);
			await new Custody(h.storage, PROGRAM_ID).openVault({
				address: vaults.principalVault,
				kind: "principal-vault",
				authority: vaults.record,
				escrow: vaults.record,
			});

			await expect(h.ledger.fundEscrow(SELLER, escrow.address)).rejects.toMatchObject({
				code: "ALREADY_INITIALIZED",
				kind: "reinitialization",
			});
			expect(await h.ledger.balanceOf(SELLER)).toBe(WALLET_FUNDS);
		});

		it("fails on an unknown escrow", async () => {
			await expect(
				h.ledger.fundEscrow(SELLER, "ff".repeat(32)),
			).rejects.toMatchObject({ code: "ESCROW_NOT_FOUND", kind: "not-found" });
		});

		it("serializes concurrent deposits", async () => {
			const escrow = await createEscrow(h.ledger);

			const results = await Promise.allSettled([
				h.ledger.fundEscrow(SELLER, escrow.address),
				h.ledger.fundEscrow(SELLER, escrow.address),
			]);

			expect(results.map((r) => r.status)).toEqual(["fulfilled", "rejected"]);
			expect(await h.ledger.balanceOf(SELLER)).toBe(WALLET_FUNDS - 1_010_000n);
		});
	});

	describe("markFiatPaid", () => {
		it("only accepts the buyer", async () => {
			const escrow = await createEscrow(h.ledger);
			await h.ledger.fundEscrow(SELLER, escrow.address);

			await expect(h.ledger.markFiatPaid(SELLER, escrow.address)).rejects.toMatchObject({
				code: "UNAUTHORIZED",
			});
		});

		it("requires a funded escrow", async () => {
			const escrow = await createEscrow(h.ledger);
			await expect(h.ledger.markFiatPaid(BUYER, escrow.address)).rejects.toMatchObject({
				code: "INVALID_STATE",
			});
		});

		it("can only be set once", async () => {
			const escrow = await createPaidEscrow(h.ledger);
			await expect(h.ledger.markFiatPaid(BUYER, escrow.address)).rejects.toMatchObject({
				code: "FIAT_ALREADY_PAID",
				kind: "state",
			});
		});

		it("closes at the fiat deadline", async () => {
			const escrow = await createEscrow(h.ledger);
			await h.ledger.fundEscrow(SELLER, escrow.address);
			h.clock.advance(30 * 60);

			await expect(h.ledger.markFiatPaid(BUYER, escrow.address)).rejects.toMatchObject({
				code: "FIAT_DEADLINE_EXPIRED",
				kind: "deadline",
			});
		});
	});

	describe("releaseEscrow", () => {
		it("requires fiat payment", async () => {
			const escrow = await createEscrow(h.ledger);
			await h.ledger.fundEscrow(SELLER, escrow.address);

			await expect(h.ledger.releaseEscrow(SELLER, escrow.address)).rejects.toMatchObject({
				code: "FIAT_NOT_PAID",
				kind: "state",
			});
		});

		it("refuses the buyer", async () => {
			const escrow = await createPaidEscrow(h.ledger);
			await expect(h.ledger.releaseEscrow(BUYER, escrow.address)).rejects.toMatchObject({
				code: "UNAUTHORIZED",
			});
		});

		it("cannot release twice", async () => {
			const escrow = await createPaidEscrow(h.ledger);
			await h.ledger.releaseEscrow(SELLER, escrow.address);

			await expect(h.ledger.releaseEscrow(SELLER, escrow.address)).rejects.toMatchObject({
				code: "INVALID_STATE",
			});
			expect(await h.ledger.balanceOf(BUYER)).toBe(WALLET_FUNDS + 1_000_000n);
		});

		it("refunds a residual vault balance to the seller and logs it", async () => {
			const escrow = await createEscrow(h.ledger);
			await h.ledger.fundEscrow(SELLER, escrow.address);
			const vault = h.ledger.deriveAddresses(1n, 7n).principalVault;
			await new Custody(h.storage, PROGRAM_ID).transfer(SELLER, vault, 5n, {
				kind: "owner",
				address: SELLER,
			});
			await h.ledger.markFiatPaid(BUYER, escrow.address);

			await h.ledger.releaseEscrow(SELLER, escrow.address);

			expect(await h.ledger.balanceOf(SELLER)).toBe(WALLET_FUNDS - 1_010_000n);
			expect(await h.ledger.getAccount(vault)).toBeNull();
			expect(h.logger.warnings).toEqual([
				`Vault ${vault} of escrow ${escrow.address} held 5 beyond its accounting; refunded to ${SELLER}`,
			]);
		});
	});

	describe("sequential escrows", () => {
		it("forwards principal to the buyer's forwarding wallet", async () => {
			const escrow = await createPaidEscrow(h.ledger, {
				sequential: true,
				sequentialAddress: FORWARD_WALLET,
			});
			expect(escrow.sequential).toEqual({
				kind: "sequential",
				next: { kind: "some", value: FORWARD_WALLET },
			});

			await h.ledger.releaseEscrow(SELLER, escrow.address);

			expect(await h.ledger.balanceOf(FORWARD_WALLET)).toBe(1_000_000n);
			expect(await h.ledger.balanceOf(BUYER)).toBe(WALLET_FUNDS);
			expect(await h.ledger.balanceOf(ARBITRATOR)).toBe(10_000n);
		});

		it("lets the buyer replace the forwarding address", async () => {
			const escrow = await createPaidEscrow(h.ledger, {
				sequential: true,
				sequentialAddress: FORWARD_WALLET,
			});

			await h.ledger.openWallet(OUTSIDER);
			const updated = await h.ledger.updateSequentialAddress(
				BUYER,
				escrow.address,
				OUTSIDER,
			);
			expect(updated.sequential).toEqual({
				kind: "sequential",
				next: { kind: "some", value: OUTSIDER },
			});
			expect(h.events.at(-1)).toMatchObject({
				type: "SequentialAddressUpdated",
				sequentialAddress: OUTSIDER,
			});

			await h.ledger.releaseEscrow(SELLER, escrow.address);
			expect(await h.ledger.balanceOf(OUTSIDER)).toBe(1_000_000n);
			expect(await h.ledger.balanceOf(FORWARD_WALLET)).toBe(0n);
		});

		it("refuses to forward into an address with no wallet", async () => {
			const victim = h.ledger.deriveAddresses(99n, 99n);

			await expect(
				createEscrow(h.ledger, {
					sequential: true,
					sequentialAddress: victim.principalVault,
				}),
			).rejects.toMatchObject({ code: "INVALID_ADDRESS", kind: "validation" });
			expect(await h.ledger.getAccount(victim.principalVault)).toBeNull();

			const other = await createEscrow(h.ledger, { escrowId: 99n, tradeId: 99n });
			const funded = await h.ledger.fundEscrow(SELLER, other.address);
			expect(funded.phase).toEqual({ state: "funded" });
			expect(await h.ledger.balanceOf(victim.principalVault)).toBe(1_010_000n);
		});

		it("refuses to forward into another escrow's vault", async () => {
			const other = await createEscrow(h.ledger, { escrowId: 2n });
			await h.ledger.fundEscrow(SELLER, other.address);
			const otherVault = h.ledger.deriveAddresses(2n, 7n).principalVault;
			const escrow = await createPaidEscrow(h.ledger, {
				sequential: true,
				sequentialAddress: FORWARD_WALLET,
			});

			await expect(
				h.ledger.updateSequentialAddress(BUYER, escrow.address, otherVault),
			).rejects.toMatchObject({
				code: "INVALID_ADDRESS",
				details: { address: otherVault, kind: "principal-vault" },
			});
			await expect(
				h.ledger.updateSequentialAddress(
					BUYER,
					escrow.address,
					h.ledger.deriveAddresses(3n, 7n).principalVault,
				),
			).rejects.toMatchObject({ code: "INVALID_ADDRESS" });
			expect((await h.ledger.getEscrow(escrow.address)).sequential).toEqual({
				kind: "sequential",
				next: { kind: "some", value: FORWARD_WALLET },
			});
		});

		it("rejects updates from anyone but the buyer", async () => {
			const escrow = await createEscrow(h.ledger, {
				sequential: true,
				sequentialAddress: FORWARD_WALLET,
			});
			await expect(
				h.ledger.updateSequentialAddress(SELLER, escrow.address, OUTSIDER),
			).rejects.toMatchObject({ code: "UNAUTHORIZED" });
		});

		it("rejects updates on direct escrows", async () => {
			const escrow = await createEscrow(h.ledger);
			await expect(
				h.ledger.updateSequentialAddress(BUYER, escrow.address, OUTSIDER),
			).rejects.toMatchObject({ code: "NOT_SEQUENTIAL", kind: "validation" });
		});

		it("rejects updates once terminal", async () => {
			const escrow = await createPaidEscrow(h.ledger, {
				sequential: true,
				sequentialAddress: FORWARD_WALLET,
			});
			await h.ledger.releaseEscrow(SELLER, escrow.address);

			await expect(
				h.ledger.updateSequentialAddress(BUYER, escrow.address, OUTSIDER),
			).rejects.toMatchObject({ code: "INVALID_STATE" });
		});
	});

	describe("cancelEscrow", () => {
		it("cancels an unfunded escrow", async () => {
			const escrow = await createEscrow(h.ledger);
			const cancelled = await h.ledger.cancelEscrow(SELLER, escrow.address);

			expect(cancelled.phase).toEqual({ state: "cancelled", automatic: false });
			expect(cancelled.counter).toBe(1);
			expect(await h.ledger.balanceOf(SELLER)).toBe(WALLET_FUNDS);
			expect(h.events.at(-1)).toMatchObject({
				type: "EscrowCancelled",
				cancelledBy: SELLER,
				automatic: false,
				refunded: 0n,
			});
		});

		it("refunds principal and fee when funded", async () => {
			const escrow = await createEscrow(h.ledger);
			await h.ledger.fundEscrow(SELLER, escrow.address);

			const cancelled = await h.ledger.cancelEscrow(ARBITRATOR, escrow.address);

			expect(cancelled.counter).toBe(2);
			expect(cancelled.trackedBalance).toBe(0n);
			expect(await h.ledger.balanceOf(SELLER)).toBe(WALLET_FUNDS);
			expect(
				await h.ledger.getAccount(h.ledger.deriveAddresses(1n, 7n).principalVault),
			).toBeNull();
			expect(h.events.at(-1)).toMatchObject({ refunded: 1_010_000n });
		});

		it("is blocked once fiat is paid", async () => {
			const escrow = await createPaidEscrow(h.ledger);
			await expect(h.ledger.cancelEscrow(SELLER, escrow.address)).rejects.toMatchObject({
				code: "FIAT_ALREADY_PAID",
				kind: "state",
			});
		});

		it("refuses the buyer", async () => {
			const escrow = await createEscrow(h.ledger);
			await expect(h.ledger.cancelEscrow(BUYER, escrow.address)).rejects.toMatchObject({
				code: "UNAUTHORIZED",
			});
		});
	});

	describe("autoCancel", () => {
		it("waits until the deposit deadline has passed", async () => {
			const escrow = await createEscrow(h.ledger);
			h.clock.advance(15 * 60);

			await expect(h.ledger.autoCancel(ARBITRATOR, escrow.address)).rejects.toMatchObject({
				code: "DEADLINE_NOT_REACHED",
				kind: "deadline",
			});

			h.clock.advance(1);
			const cancelled = await h.ledger.autoCancel(ARBITRATOR, escrow.address);
			expect(cancelled.phase).toEqual({ state: "cancelled", automatic: true });
		});

		it("refunds a funded escrow whose fiat window lapsed", async () => {
			const escrow = await createEscrow(h.ledger);
			await h.ledger.fundEscrow(SELLER, escrow.address);
			h.clock.advance(30 * 60 + 1);

			const cancelled = await h.ledger.autoCancel(ARBITRATOR, escrow.address);

			expect(cancelled.counter).toBe(2);
			expect(await h.ledger.balanceOf(SELLER)).toBe(WALLET_FUNDS);
			expect(h.events.at(-1)).toMatchObject({
				type: "EscrowCancelled",
				cancelledBy: ARBITRATOR,
				automatic: true,
				refunded: 1_010_000n,
			});
		});

		it("does not cancel a paid escrow", async () => {
			const escrow = await createPaidEscrow(h.ledger);
			h.clock.advance(30 * 60 + 1);

			await expect(h.ledger.autoCancel(ARBITRATOR, escrow.address)).rejects.toMatchObject({
				code: "FIAT_ALREADY_PAID",
			});
		});

		it("is reserved to the arbitrator", async () => {
			const escrow = await createEscrow(h.ledger);
			h.clock.advance(15 * 60 + 1);

			await expect(h.ledger.autoCancel(SELLER, escrow.address)).rejects.toMatchObject({
				code: "UNAUTHORIZED",
			});
		});

		it("rejects terminal escrows", async () => {
			const escrow = await createEscrow(h.ledger);
			await h.ledger.cancelEscrow(SELLER, escrow.address);
			h.clock.advance(15 * 60 + 1);

			await expect(h.ledger.autoCancel(ARBITRATOR, escrow.address)).rejects.toMatchObject({
				code: "INVALID_STATE",
			});
		});
	});

	describe("reads", () => {
		it("lists escrows by party", async () => {
			await createEscrow(h.ledger, { tradeId: 1n });
			await createEscrow(h.ledger, { tradeId: 2n });

			const result = await h.ledger.listEscrows({ party: BUYER });
			expect(result.total).toBe(2);
			expect(await h.ledger.listEscrows({ party: OUTSIDER })).toEqual({
				items: [],
				total: 0,
				hasMore: false,
			});
		});

		it("credits wallets", async () => {
			const wallet = await h.ledger.depositToWallet(OUTSIDER, 42n);
			expect(wallet.balance).toBe(42n);
			await expect(h.ledger.depositToWallet(OUTSIDER, 0n)).rejects.toMatchObject({
				code: "INVALID_AMOUNT",
			});
		});
	});
});
