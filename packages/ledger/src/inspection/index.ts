export {
	type VaultReport,
	type EscrowInspection,
	expectedVaultBalances,
	inspectEscrow,
} from "./reconciliation.js";
