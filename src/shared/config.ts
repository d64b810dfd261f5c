/**
 * Adapter configuration — schema, defaults and environment overrides.
 *
 * Addresses are validated and checksummed on parse. Fees are integers in
 * hundredths of a bip, `0..1_000_000`; a governance fee of `0` means unset.
 */

import { MAX_FEE } from "../fees/types.js";
import { addressSchema } from "../lib/ethereum/index.js";
import type { __brand } from "../lib/ethereum/types.js";
import { LOG_LEVELS, type LogLevel } from "../lib/logger/index.js";
import { type ValidationError, validate, z } from "../lib/validation/index.js";
import { ConfigError } from "./errors.js";
import type { Address } from "./identifiers.js";
import type { Result } from "./result.js";

export interface AdapterConfig {
	/** The adapter's own address; a pool's key must name it as its hook. */
	readonly address: Address;
	/** Resource manager allowed to invoke lifecycle callbacks. */
	readonly poolManager: Address;
	/** Global policy owner. */
	readonly owner: Address;
	/** Manager of the approved-hook registry; defaults to `owner`. */
	readonly hookManager: Address;
	readonly defaultFee: number;
	readonly governanceFee: number;
	readonly logLevel: LogLevel;
}

export const DEFAULT_ADAPTER_CONFIG = {
	defaultFee: 3_000,
	governanceFee: 0,
	logLevel: "warn",
} as const satisfies Pick<AdapterConfig, "defaultFee" | "governanceFee" | "logLevel">;

const feeSchema = z.number().int().min(0).max(MAX_FEE);

const logLevelSchema = z.enum(LOG_LEVELS);

export const adapterConfigSchema = z
	.object({
		address: addressSchema,
		poolManager: addressSchema,
		owner: addressSchema,
		hookManager: addressSchema.optional(),
		defaultFee: feeSchema.default(DEFAULT_ADAPTER_CONFIG.defaultFee),
		governanceFee: feeSchema.default(DEFAULT_ADAPTER_CONFIG.governanceFee),
		logLevel: logLevelSchema.default(DEFAULT_ADAPTER_CONFIG.logLevel),
	})
	.transform(
		(c): AdapterConfig => ({
			address: c.address,
			poolManager: c.poolManager,
			owner: c.owner,
			hookManager: c.hookManager ?? c.owner,
			defaultFee: c.defaultFee,
			governanceFee: c.governanceFee,
			logLevel: c.logLevel,
		}),
	);

/** Raw configuration accepted by the factories. */
export type AdapterConfigInput = z.input<typeof adapterConfigSchema>;

export function parseAdapterConfig(input: unknown): Result<AdapterConfig, ValidationError> {
	return validate(adapterConfigSchema, input, "adapter config");
}

// ── Environment ──────────────────────────────────────────────────────

/** Values `configFromEnv` can supply; merge over the caller's input. */
export interface EnvConfig {
	defaultFee?: number;
	governanceFee?: number;
	logLevel?: LogLevel;
}

type Env = Readonly<Record<string, string | undefined>>;

/**
 * Reads MULTIHOOK_DEFAULT_FEE, MULTIHOOK_GOVERNANCE_FEE and MULTIHOOK_LOG_LEVEL.
 * Unset or empty variables are skipped.
 * @throws ConfigError if a variable holds an invalid value
 */
export function configFromEnv(env: Env = process.env): EnvConfig {
	const result: EnvConfig = {};

	const defaultFee = parseFeeEnv(env, "MULTIHOOK_DEFAULT_FEE");
	if (defaultFee !== undefined) result.defaultFee = defaultFee;

	const governanceFee = parseFeeEnv(env, "MULTIHOOK_GOVERNANCE_FEE");
	if (governanceFee !== undefined) result.governanceFee = governanceFee;

	// biome-ignore lint/complexity/useLiteralKeys: TS4111 requires bracket access on index signatures
	const level = env["MULTIHOOK_LOG_LEVEL"];
	if (level) {
		const known = LOG_LEVELS.find((l) => l === level.trim());
		if (known === undefined) {
			throw new ConfigError(
				`Invalid MULTIHOOK_LOG_LEVEL: "${level}" must be one of ${LOG_LEVELS.join(", ")}`,
			);
		}
		result.logLevel = known;
	}

	return result;
}

function strictParseInt(raw: string): number {
	const parsed = Number.parseInt(raw, 10);
	if (Number.isNaN(parsed) || String(parsed) !== raw.trim()) {
		return Number.NaN;
	}
	return parsed;
}

function parseFeeEnv(env: Env, key: string): number | undefined {
	const raw = env[key];
	if (!raw) return undefined;
	const parsed = strictParseInt(raw);
	if (Number.isNaN(parsed) || parsed < 0 || parsed > MAX_FEE) {
		throw new ConfigError(`Invalid ${key}: "${raw}" must be an integer in 0..${MAX_FEE}`, {
			key,
		});
	}
	return parsed;
}
