/**
 * ImmutableMultiHookAdapter — one registration per pool, then frozen.
 *
 * Anyone may register a pool's hooks once, optionally with its fee method
 * and pool-specific fee. Afterwards the hook list and every fee setting of
 * the adapter are fixed; the governance fee can only come from construction.
 */

import type { FeeCalculationMethod, RegistrationFeeConfig } from "../fees/types.js";
import type { PoolKey, SubHook } from "../hooks/types.js";
import { describeHooks } from "../registry/hook-entry.js";
import type { AdapterConfig } from "../shared/config.js";
import {
	type AdapterError,
	ImmutableConfigurationError,
	PoolAlreadyRegisteredError,
} from "../shared/errors.js";
import type { Address, PoolId } from "../shared/identifiers.js";
import { OK_VOID, type Result, err, ok } from "../shared/result.js";
import {
	type AdapterOptions,
	type AdapterParts,
	MultiHookAdapterBase,
	buildAdapterParts,
} from "./adapter-base.js";

export class ImmutableMultiHookAdapter extends MultiHookAdapterBase {
	private constructor(parts: AdapterParts) {
		super(parts);
	}

	static create(
		config: AdapterConfig,
		options: AdapterOptions,
	): Result<ImmutableMultiHookAdapter, AdapterError> {
		const parts = buildAdapterParts(config, options);
		if (!parts.ok) return parts;
		return ok(new ImmutableMultiHookAdapter(parts.value));
	}

	/** Open to any caller, once per pool. An empty list is a valid registration. */
	override registerHooks(
		caller: Address,
		key: PoolKey,
		hooks: readonly SubHook[],
		feeConfig?: RegistrationFeeConfig,
	): Result<void, AdapterError> {
		return this.mutate("registerHooks", (notify) => {
			const pool = this.checkPoolKey(key);
			if (!pool.ok) return pool;
			const poolId = pool.value;
			if (this.registry.isRegistered(poolId)) {
				return err(new PoolAlreadyRegisteredError(poolId));
			}
			const entries = describeHooks(hooks, this.address);
			if (!entries.ok) return entries;
			const fees = this.fees.validateRegistration(feeConfig);
			if (!fees.ok) return fees;

			this.registry.set(poolId, entries.value);
			this.fees.initializePool(poolId, feeConfig);

			const current = this.registry.addresses(poolId);
			this.logger.info({ poolId, caller, hooks: current }, "Hooks registered");
			notify("hooksRegistered", { poolId, caller, change: "register", hooks: current, current });
			if (feeConfig !== undefined) {
				notify("poolFeeConfigurationUpdated", this.feeSettings(poolId));
			}
			return OK_VOID;
		});
	}

	override setPoolSpecificFee(
		_caller: Address,
		_poolId: PoolId,
		_fee: number,
	): Result<void, AdapterError> {
		return err(new ImmutableConfigurationError("setPoolSpecificFee"));
	}

	override setFeeMethod(
		_caller: Address,
		_poolId: PoolId,
		_method: FeeCalculationMethod,
	): Result<void, AdapterError> {
		return err(new ImmutableConfigurationError("setFeeMethod"));
	}

	override setGovernanceFee(_caller: Address, _fee: number): Result<void, AdapterError> {
		return err(new ImmutableConfigurationError("setGovernanceFee"));
	}
}
