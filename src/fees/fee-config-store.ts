/**
 * FeeConfigStore — adapter-wide and per-pool fee state.
 *
 * `defaultFee` is fixed at construction. `governanceFee` is adapter-wide and
 * live: pools read the current value at resolution time rather than a copy
 * taken when they registered. Pool settings are created lazily on first
 * registration and only ever updated in place. A fee of `0` clears a setting.
 */

import { ConfigError, InvalidFeeError } from "../shared/errors.js";
import type { PoolId } from "../shared/identifiers.js";
import { OK_VOID, type Result, err, ok } from "../shared/result.js";
import { isValidFeeSetting } from "./fee-resolver.js";
import {
	DEFAULT_FEE_METHOD,
	FEE_CALCULATION_METHODS,
	type FeeCalculationMethod,
	type FeeConfiguration,
	type PoolFeeSettings,
	type RegistrationFeeConfig,
} from "./types.js";

const DEFAULT_POOL_SETTINGS: PoolFeeSettings = Object.freeze({
	method: DEFAULT_FEE_METHOD,
	poolSpecificFee: 0,
	poolSpecificFeeSet: false,
});

function checkFee(fee: number, field: string): Result<void, InvalidFeeError> {
	return isValidFeeSetting(fee) ? OK_VOID : err(new InvalidFeeError(fee, { field }));
}

function checkMethod(method: unknown): Result<void, ConfigError> {
	return FEE_CALCULATION_METHODS.some((m) => m === method)
		? OK_VOID
		: err(new ConfigError(`Unknown fee calculation method: ${String(method)}`, { method }));
}

export class FeeConfigStore {
	private readonly defaultFee: number;
	private governanceFee: number;
	private readonly pools: Map<PoolId, PoolFeeSettings>;

	private constructor(defaultFee: number, governanceFee: number) {
		this.defaultFee = defaultFee;
		this.governanceFee = governanceFee;
		this.pools = new Map();
	}

	/**
	 * @param defaultFee - Last-resort fee, `0..MAX_FEE`, immutable afterwards
	 * @param governanceFee - Initial governance fee, `0` for unset
	 */
	static create(defaultFee: number, governanceFee = 0): Result<FeeConfigStore, InvalidFeeError> {
		const checked = checkFee(defaultFee, "defaultFee");
		if (!checked.ok) return checked;
		const gov = checkFee(governanceFee, "governanceFee");
		if (!gov.ok) return gov;
		return ok(new FeeConfigStore(defaultFee, governanceFee));
	}

	// ── Queries ────────────────────────────────────────────────────

	/** Live merge of adapter-wide values and the pool's settings (defaults if unknown). */
	view(poolId: PoolId): FeeConfiguration {
		const pool = this.pools.get(poolId) ?? DEFAULT_POOL_SETTINGS;
		return {
			defaultFee: this.defaultFee,
			governanceFee: this.governanceFee,
			governanceFeeSet: this.governanceFee !== 0,
			method: pool.method,
			poolSpecificFee: pool.poolSpecificFee,
			poolSpecificFeeSet: pool.poolSpecificFeeSet,
		};
	}

	hasPool(poolId: PoolId): boolean {
		return this.pools.has(poolId);
	}

	getDefaultFee(): number {
		return this.defaultFee;
	}

	getGovernanceFee(): number {
		return this.governanceFee;
	}

	// ── Mutations ──────────────────────────────────────────────────

	setGovernanceFee(fee: number): Result<void, InvalidFeeError> {
		const checked = checkFee(fee, "governanceFee");
		if (!checked.ok) return checked;
		this.governanceFee = fee;
		return OK_VOID;
	}

	setPoolSpecificFee(poolId: PoolId, fee: number): Result<void, InvalidFeeError> {
		const checked = checkFee(fee, "poolSpecificFee");
		if (!checked.ok) return checked;
		this.update(poolId, { poolSpecificFee: fee, poolSpecificFeeSet: fee !== 0 });
		return OK_VOID;
	}

	setMethod(poolId: PoolId, method: FeeCalculationMethod): Result<void, ConfigError> {
		const checked = checkMethod(method);
		if (!checked.ok) return checked;
		this.update(poolId, { method });
		return OK_VOID;
	}

	/** Validate registration fee options without touching state. */
	validateRegistration(
		config: RegistrationFeeConfig | undefined,
	): Result<void, InvalidFeeError | ConfigError> {
		if (config?.method !== undefined) {
			const m = checkMethod(config.method);
			if (!m.ok) return m;
		}
		if (config?.poolSpecificFee !== undefined) {
			return checkFee(config.poolSpecificFee, "poolSpecificFee");
		}
		return OK_VOID;
	}

	/**
	 * Create the pool's settings if missing, then apply registration options.
	 * Call `validateRegistration` first; this never fails.
	 */
	initializePool(poolId: PoolId, config: RegistrationFeeConfig | undefined): PoolFeeSettings {
		if (!this.pools.has(poolId)) {
			this.pools.set(poolId, DEFAULT_POOL_SETTINGS);
		}
		if (config?.method !== undefined) {
			this.update(poolId, { method: config.method });
		}
		if (config?.poolSpecificFee !== undefined) {
			const fee = config.poolSpecificFee;
			this.update(poolId, { poolSpecificFee: fee, poolSpecificFeeSet: fee !== 0 });
		}
		return this.pools.get(poolId) ?? DEFAULT_POOL_SETTINGS;
	}

	private update(poolId: PoolId, patch: Partial<PoolFeeSettings>): void {
		const current = this.pools.get(poolId) ?? DEFAULT_POOL_SETTINGS;
		this.pools.set(poolId, { ...current, ...patch });
	}
}
