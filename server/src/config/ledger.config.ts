import type { ConfigService } from "@nestjs/config";
import type { Address, ArbitrationDeadlinePolicy } from "@stablecoin-escrow/ledger";

export const DEFAULT_SIGNATURE_MAX_SKEW_MS = 5 * 60 * 1000;

export type LedgerConfig = {
	programId: Address;
	arbitrator: Address;
	arbitrationDeadlinePolicy: ArbitrationDeadlinePolicy;
};

export function ledgerConfig(config: ConfigService): LedgerConfig {
	const policy = config.get<string>("ARBITRATION_DEADLINE_POLICY");
	return {
		programId: config.getOrThrow<string>("LEDGER_PROGRAM_ID").toLowerCase(),
		arbitrator: config.getOrThrow<string>("ARBITRATOR_PUB_KEY").toLowerCase(),
		arbitrationDeadlinePolicy: policy === "enforce" ? "enforce" : "warn",
	};
}

export function signatureMaxSkewMs(config: ConfigService): number {
	const raw = config.get<string | number>("SIGNATURE_MAX_SKEW_MS");
	const value = raw === undefined ? Number.NaN : Number(raw);
	return Number.isFinite(value) && value > 0 ? value : DEFAULT_SIGNATURE_MAX_SKEW_MS;
}
