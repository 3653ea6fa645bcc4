import { plainToInstance } from "class-transformer";
import {
	IsIn,
	IsInt,
	IsNotEmpty,
	IsOptional,
	IsString,
	Matches,
	Max,
	Min,
	validateSync,
} from "class-validator";

const HEX_32 = /^[0-9a-fA-F]{64}$/;

export const ARBITRATION_DEADLINE_POLICIES = ["warn", "enforce"] as const;

export class EnvironmentVariables {
	@IsOptional()
	@IsIn(["development", "production", "test"])
	NODE_ENV?: string;

	@IsOptional()
	@IsInt()
	@Min(1)
	@Max(65535)
	PORT?: number;

	@IsOptional()
	@IsString()
	SQLITE_DB_PATH?: string;

	@Matches(HEX_32, { message: "ARBITRATOR_PUB_KEY must be a 32-byte hex key" })
	ARBITRATOR_PUB_KEY!: string;

	@Matches(HEX_32, { message: "LEDGER_PROGRAM_ID must be 32 bytes of hex" })
	LEDGER_PROGRAM_ID!: string;

	@IsOptional()
	@IsIn(ARBITRATION_DEADLINE_POLICIES)
	ARBITRATION_DEADLINE_POLICY?: (typeof ARBITRATION_DEADLINE_POLICIES)[number];

	@IsOptional()
	@IsInt()
	@Min(1000)
	SIGNATURE_MAX_SKEW_MS?: number;

	@IsOptional()
	@IsString()
	@IsNotEmpty()
	BACKOFFICE_BASIC_USER?: string;

	@IsOptional()
	@IsString()
	@IsNotEmpty()
	BACKOFFICE_BASIC_PASS?: string;
}

/**
 * Used by `ConfigModule.forRoot({ validate })`; fails startup on a bad
 * environment.
 */
export function validate(config: Record<string, unknown>): EnvironmentVariables {
	const validated = plainToInstance(EnvironmentVariables, config, {
		enableImplicitConversion: true,
	});
	const errors = validateSync(validated, { skipMissingProperties: false });
	if (errors.length > 0) {
		const details = errors
			.flatMap((e) => Object.values(e.constraints ?? {}))
			.join("; ");
		throw new Error(`Invalid environment: ${details}`);
	}
	return validated;
}
