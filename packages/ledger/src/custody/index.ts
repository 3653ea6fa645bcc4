export type { AccountKind, TokenAccount, TransferSigner } from "./types.js";
export { Custody, type VaultSpec } from "./custody.js";
