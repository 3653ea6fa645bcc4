export {
	type Seed,
	type VaultKind,
	type EscrowAddresses,
	MAX_SEED_LENGTH,
	MAX_SEEDS,
	DERIVATION_MARKER,
	SEED_TAGS,
	deriveAddress,
	encodeU64LE,
	escrowSeeds,
	vaultSeeds,
	bondVaultKind,
	deriveEscrowAddress,
	deriveVaultAddress,
	deriveEscrowAddresses,
} from "./derive.js";
