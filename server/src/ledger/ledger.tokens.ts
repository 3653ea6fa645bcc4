export const LEDGER = "LEDGER";
export const LEDGER_CLOCK = "LEDGER_CLOCK";
export const LEDGER_STORAGE = "LEDGER_STORAGE";
