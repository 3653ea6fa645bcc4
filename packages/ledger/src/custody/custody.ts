/**
 * Custody
 *
 * Moves value between token accounts inside a storage transaction.
 * Vaults only release funds to a derived signer whose seeds re-derive to
 * the vault owner.
 */

import { deriveAddress, type VaultKind } from "../addressing/derive.js";
import { type Amount, checkedAdd, checkedSub } from "../core/amounts.js";
import { LedgerError } from "../core/errors.js";
import { none, some } from "../core/maybe.js";
import type { Address } from "../core/types.js";
import type { LedgerStorage } from "../storage/types.js";
import type { TokenAccount, TransferSigner } from "./types.js";

export interface VaultSpec {
	address: Address;
	kind: VaultKind;
	/** The record address; it alone may authorize withdrawals */
	authority: Address;
	escrow: Address;
}

export class Custody {
	constructor(
		private readonly store: LedgerStorage,
		private readonly programId: Address,
	) {}

	async getAccount(address: Address): Promise<TokenAccount | null> {
		return this.store.loadAccount(address);
	}

	async balanceOf(address: Address): Promise<Amount> {
		const account = await this.store.loadAccount(address);
		return account?.balance ?? 0n;
	}

	/**
	 * Open an empty wallet for `owner`, or return the one it already has.
	 */
	async openWallet(owner: Address): Promise<TokenAccount> {
		const existing = await this.store.loadAccount(owner);
		if (existing) {
			return requireWallet(existing);
		}
		const wallet = newWallet(owner);
		await this.store.saveAccount(wallet);
		return wallet;
	}

	/**
	 * Deposit external funds into a wallet, creating it if needed.
	 * Operator path only; payouts never create accounts.
	 */
	async credit(address: Address, amount: Amount): Promise<TokenAccount> {
		const account = requireWallet(
			(await this.store.loadAccount(address)) ?? newWallet(address),
		);
		account.balance = checkedAdd(account.balance, amount);
		await this.store.saveAccount(account);
		return account;
	}

	/**
	 * Create a vault that must not exist yet.
	 */
	async openVault(spec: VaultSpec): Promise<TokenAccount> {
		const existing = await this.store.loadAccount(spec.address);
		if (existing) {
			throw new LedgerError(
				"ALREADY_INITIALIZED",
				`Account ${spec.address} is already initialized`,
				{ address: spec.address, kind: existing.kind },
			);
		}
		const vault: TokenAccount = {
			address: spec.address,
			owner: spec.authority,
			kind: spec.kind,
			escrow: some(spec.escrow),
			balance: 0n,
		};
		await this.store.saveAccount(vault);
		return vault;
	}

	/**
	 * Create a vault, or accept an existing one with the same configuration
	 * and a zero balance. Anything else is a reinitialization attempt.
	 *
	 * @returns the vault and whether this call created it
	 */
	async ensureVault(
		spec: VaultSpec,
	): Promise<{ vault: TokenAccount; created: boolean }> {
		const existing = await this.store.loadAccount(spec.address);
		if (!existing) {
			return { vault: await this.openVault(spec), created: true };
		}
		const sameConfig =
			existing.kind === spec.kind &&
			existing.owner === spec.authority &&
			existing.escrow.kind === "some" &&
			existing.escrow.value === spec.escrow;
		if (!sameConfig || existing.balance !== 0n) {
			throw new LedgerError(
				"ALREADY_INITIALIZED",
				`Account ${spec.address} is already initialized`,
				{
					address: spec.address,
					kind: existing.kind,
					balance: existing.balance.toString(),
				},
			);
		}
		return { vault: existing, created: false };
	}

	/**
	 * Move `amount` from one account to another. Both must exist. Zero
	 * transfers are no-ops.
	 */
	async transfer(
		from: Address,
		to: Address,
		amount: Amount,
		signer: TransferSigner,
	): Promise<void> {
		if (amount === 0n) return;

		const source = await this.store.loadAccount(from);
		if (!source) {
			throw new LedgerError(
				"INSUFFICIENT_FUNDS",
				`Insufficient funds in ${from}: need ${amount}, have 0`,
				{ address: from, required: amount.toString(), available: "0" },
			);
		}
		this.authorize(source, signer);
		if (source.balance < amount) {
			throw new LedgerError(
				"INSUFFICIENT_FUNDS",
				`Insufficient funds in ${from}: need ${amount}, have ${source.balance}`,
				{
					address: from,
					required: amount.toString(),
					available: source.balance.toString(),
				},
			);
		}
		if (from === to) return;

		const target = await this.store.loadAccount(to);
		if (!target) {
			throw new LedgerError(
				"INVALID_ADDRESS",
				`Recipient account ${to} does not exist`,
				{ address: to },
			);
		}
		source.balance = checkedSub(source.balance, amount);
		target.balance = checkedAdd(target.balance, amount);

		await this.store.saveAccount(source);
		await this.store.saveAccount(target);
	}

	/**
	 * Close a vault and reclaim its storage. Any balance left over is swept
	 * to `refundTo` first.
	 *
	 * @returns the amount swept, zero when the vault was already empty
	 */
	async closeVault(
		address: Address,
		signer: TransferSigner,
		refundTo: Address,
	): Promise<Amount> {
		const vault = await this.store.loadAccount(address);
		if (!vault) {
			throw new LedgerError("VAULT_NOT_FOUND", `Vault ${address} not found`, {
				address,
			});
		}
		if (vault.kind === "wallet") {
			throw new LedgerError(
				"INVALID_ADDRESS",
				`Account ${address} is a wallet, not a vault`,
				{ address },
			);
		}
		const residual = vault.balance;
		await this.transfer(address, refundTo, residual, signer);
		// transfer() skips the signer check for zero amounts
		this.authorize(vault, signer);
		await this.store.deleteAccount(address);
		return residual;
	}

	private authorize(account: TokenAccount, signer: TransferSigner): void {
		if (account.kind === "wallet") {
			if (signer.kind === "owner" && signer.address === account.owner) return;
		} else if (
			signer.kind === "derived" &&
			deriveAddress(this.programId, signer.seeds) === account.owner
		) {
			return;
		}
		throw new LedgerError(
			"INVALID_SIGNER",
			`Signer is not the authority of ${account.kind} ${account.address}`,
			{ address: account.address, signer: signer.kind },
		);
	}
}

function requireWallet(account: TokenAccount): TokenAccount {
	if (account.kind !== "wallet") {
		throw new LedgerError(
			"INVALID_ADDRESS",
			`Account ${account.address} is a ${account.kind}, not a wallet`,
			{ address: account.address, kind: account.kind },
		);
	}
	return account;
}

function newWallet(address: Address): TokenAccount {
	return { address, owner: address, kind: "wallet", escrow: none(), balance: 0n };
}
