/**
 * MultiHookAdapterBase — state and behavior shared by both adapter variants.
 *
 * Owns the hook registry, fee store, transient swap store and the one
 * reentrancy guard that covers lifecycle callbacks and admin calls alike.
 * Lifecycle callbacks go straight to the CallbackDispatcher. Admin calls run
 * through `mutate`, which queues events and emits them only once the call
 * has committed and the guard is released.
 */

import { Ownable } from "../access/ownable.js";
import { CallbackDispatcher } from "../dispatch/callback-dispatcher.js";
import { ReentrancyGuard } from "../dispatch/reentrancy-guard.js";
import { TransientSwapStore } from "../dispatch/transient-store.js";
import type {
	AfterSwapResult,
	BeforeSwapResult,
	DispatchPhase,
	LifecycleHandler,
	LiquidityResult,
} from "../dispatch/types.js";
import { FeeConfigStore } from "../fees/fee-config-store.js";
import { resolveFee } from "../fees/fee-resolver.js";
import type {
	FeeCalculationMethod,
	FeeConfiguration,
	RegistrationFeeConfig,
	WeightedFee,
} from "../fees/types.js";
import { ALL_PERMISSIONS, type HookPermissions } from "../hooks/permissions.js";
import { validatePoolKey } from "../hooks/pool-key.js";
import type {
	AfterInitializeArgs,
	AfterModifyLiquidityArgs,
	AfterSwapArgs,
	BeforeInitializeArgs,
	BeforeModifyLiquidityArgs,
	BeforeSwapArgs,
	DonateArgs,
	HookAck,
	PoolKey,
	SubHook,
} from "../hooks/types.js";
import { type ListenerErrorCallback, TypedEmitter } from "../lib/events/index.js";
import { sameAddress } from "../lib/ethereum/index.js";
import type { Logger } from "../lib/logger/index.js";
import { HookRegistry } from "../registry/hook-registry.js";
import type { AdapterConfig } from "../shared/config.js";
import { type AdapterError, ConfigError } from "../shared/errors.js";
import type { Address, PoolId } from "../shared/identifiers.js";
import { OK_VOID, type Result, err, ok } from "../shared/result.js";
import type { AdapterEvents } from "./events.js";

export interface AdapterOptions {
	readonly logger: Logger;
	/** Called when an event listener throws; by default the error is logged. */
	readonly onListenerError?: ListenerErrorCallback;
}

/** Collaborators built once per adapter and handed to the constructor. */
export interface AdapterParts {
	readonly config: AdapterConfig;
	readonly logger: Logger;
	readonly events: TypedEmitter<AdapterEvents>;
	readonly policy: Ownable;
	readonly registry: HookRegistry;
	readonly fees: FeeConfigStore;
	readonly transient: TransientSwapStore;
	readonly guard: ReentrancyGuard;
}

/** Queue an adapter event for emission after the current call commits. */
export type Notify = <K extends keyof AdapterEvents>(event: K, payload: AdapterEvents[K]) => void;

export function buildAdapterParts(
	config: AdapterConfig,
	options: AdapterOptions,
): Result<AdapterParts, AdapterError> {
	const policy = Ownable.create(config.owner);
	if (!policy.ok) return policy;
	const fees = FeeConfigStore.create(config.defaultFee, config.governanceFee);
	if (!fees.ok) return fees;

	const logger = options.logger.child({ adapter: config.address });
	const onListenerError: ListenerErrorCallback =
		options.onListenerError ??
		((event, error) => {
			logger.error({ event, error: String(error) }, "Adapter event listener threw");
		});

	return ok({
		config,
		logger,
		events: new TypedEmitter<AdapterEvents>(onListenerError),
		policy: policy.value,
		registry: HookRegistry.create(),
		fees: fees.value,
		transient: TransientSwapStore.create(),
		guard: new ReentrancyGuard(),
	});
}

export abstract class MultiHookAdapterBase implements LifecycleHandler {
	readonly address: Address;
	readonly poolManager: Address;
	readonly events: TypedEmitter<AdapterEvents>;

	protected readonly logger: Logger;
	protected readonly policy: Ownable;
	protected readonly registry: HookRegistry;
	protected readonly fees: FeeConfigStore;
	protected readonly transient: TransientSwapStore;
	protected readonly guard: ReentrancyGuard;
	private readonly dispatcher: CallbackDispatcher;

	protected constructor(parts: AdapterParts) {
		this.address = parts.config.address;
		this.poolManager = parts.config.poolManager;
		this.events = parts.events;
		this.logger = parts.logger;
		this.policy = parts.policy;
		this.registry = parts.registry;
		this.fees = parts.fees;
		this.transient = parts.transient;
		this.guard = parts.guard;
		this.dispatcher = CallbackDispatcher.create({
			poolManager: parts.config.poolManager,
			registry: parts.registry,
			fees: parts.fees,
			transient: parts.transient,
			guard: parts.guard,
			logger: parts.logger,
		});
	}

	// ── Variant-specific administration ────────────────────────────

	/**
	 * Register the pool's hook list, optionally with its fee method and
	 * pool-specific fee in the same step.
	 */
	abstract registerHooks(
		caller: Address,
		key: PoolKey,
		hooks: readonly SubHook[],
		feeConfig?: RegistrationFeeConfig,
	): Result<void, AdapterError>;

	abstract setPoolSpecificFee(
		caller: Address,
		poolId: PoolId,
		fee: number,
	): Result<void, AdapterError>;

	abstract setFeeMethod(
		caller: Address,
		poolId: PoolId,
		method: FeeCalculationMethod,
	): Result<void, AdapterError>;

	// ── Global administration ──────────────────────────────────────

	/** Owner only. `0` clears the governance fee. */
	setGovernanceFee(caller: Address, fee: number): Result<void, AdapterError> {
		return this.mutate("setGovernanceFee", (notify) => {
			const auth = this.policy.requireOwner(caller);
			if (!auth.ok) return auth;
			const previous = this.fees.getGovernanceFee();
			const set = this.fees.setGovernanceFee(fee);
			if (!set.ok) return set;
			this.logger.info({ previous, current: fee }, "Governance fee updated");
			notify("governanceFeeUpdated", { previous, current: fee });
			return OK_VOID;
		});
	}

	transferOwnership(caller: Address, next: Address): Result<void, AdapterError> {
		return this.mutate("transferOwnership", (notify) => {
			const moved = this.policy.transferOwnership(caller, next);
			if (!moved.ok) return moved;
			this.logger.info({ previous: moved.value, current: next }, "Ownership transferred");
			notify("ownershipTransferred", { previous: moved.value, current: next });
			return OK_VOID;
		});
	}

	// ── Queries ────────────────────────────────────────────────────

	owner(): Address {
		return this.policy.owner();
	}

	/** The adapter handles every lifecycle event on behalf of its sub-hooks. */
	getHookPermissions(): HookPermissions {
		return ALL_PERMISSIONS;
	}

	isRegistered(poolId: PoolId): boolean {
		return this.registry.isRegistered(poolId);
	}

	/** Registered hooks in execution order. */
	getHooks(poolId: PoolId): readonly Address[] {
		return this.registry.addresses(poolId);
	}

	/** Current adapter-wide values merged with the pool's settings. */
	getFeeConfiguration(poolId: PoolId): FeeConfiguration {
		return this.fees.view(poolId);
	}

	/** Fee the pool would charge for these contributions right now. */
	resolveFeeFor(poolId: PoolId, contributions: readonly WeightedFee[]): number {
		return resolveFee(contributions, this.fees.view(poolId));
	}

	dispatchPhase(): DispatchPhase {
		return this.dispatcher.currentPhase();
	}

	// ── Lifecycle callbacks ────────────────────────────────────────

	beforeInitialize(caller: Address, args: BeforeInitializeArgs): Result<HookAck, AdapterError> {
		return this.dispatcher.beforeInitialize(caller, args);
	}

	afterInitialize(caller: Address, args: AfterInitializeArgs): Result<HookAck, AdapterError> {
		return this.dispatcher.afterInitialize(caller, args);
	}

	beforeAddLiquidity(
		caller: Address,
		args: BeforeModifyLiquidityArgs,
	): Result<HookAck, AdapterError> {
		return this.dispatcher.beforeAddLiquidity(caller, args);
	}

	afterAddLiquidity(
		caller: Address,
		args: AfterModifyLiquidityArgs,
	): Result<LiquidityResult, AdapterError> {
		return this.dispatcher.afterAddLiquidity(caller, args);
	}

	beforeRemoveLiquidity(
		caller: Address,
		args: BeforeModifyLiquidityArgs,
	): Result<HookAck, AdapterError> {
		return this.dispatcher.beforeRemoveLiquidity(caller, args);
	}

	afterRemoveLiquidity(
		caller: Address,
		args: AfterModifyLiquidityArgs,
	): Result<LiquidityResult, AdapterError> {
		return this.dispatcher.afterRemoveLiquidity(caller, args);
	}

	beforeSwap(caller: Address, args: BeforeSwapArgs): Result<BeforeSwapResult, AdapterError> {
		return this.dispatcher.beforeSwap(caller, args);
	}

	afterSwap(caller: Address, args: AfterSwapArgs): Result<AfterSwapResult, AdapterError> {
		return this.dispatcher.afterSwap(caller, args);
	}

	beforeDonate(caller: Address, args: DonateArgs): Result<HookAck, AdapterError> {
		return this.dispatcher.beforeDonate(caller, args);
	}

	afterDonate(caller: Address, args: DonateArgs): Result<HookAck, AdapterError> {
		return this.dispatcher.afterDonate(caller, args);
	}

	// ── Helpers for variants ───────────────────────────────────────

	/**
	 * Run an admin call under the reentrancy guard. Events queued through
	 * `notify` are emitted after the guard is released, and only on success.
	 */
	protected mutate<T>(
		entryPoint: string,
		body: (notify: Notify) => Result<T, AdapterError>,
	): Result<T, AdapterError> {
		const pending: Array<() => void> = [];
		const notify: Notify = (event, payload) => {
			pending.push(() => {
				this.events.emit(event, payload);
			});
		};
		const result = this.guard.run(entryPoint, () => body(notify));
		if (!result.ok) {
			this.logger.info({ entryPoint, error: result.error.toJSON() }, "Admin call rejected");
			return result;
		}
		for (const emit of pending) emit();
		return result;
	}

	/** The key must route to this adapter for its hooks to ever be called. */
	protected checkPoolKey(key: PoolKey): Result<PoolId, AdapterError> {
		const pool = validatePoolKey(key);
		if (!pool.ok) return pool;
		if (!sameAddress(key.hooks, this.address)) {
			return err(
				new ConfigError(`Pool key hooks ${key.hooks} is not this adapter`, {
					hooks: key.hooks,
					adapter: this.address,
				}),
			);
		}
		return pool;
	}

	/** Emit-ready payload describing the pool's current fee settings. */
	protected feeSettings(poolId: PoolId): AdapterEvents["poolFeeConfigurationUpdated"] {
		const view = this.fees.view(poolId);
		return { poolId, method: view.method, poolSpecificFee: view.poolSpecificFee };
	}
}
