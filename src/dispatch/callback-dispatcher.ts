/**
 * CallbackDispatcher — fans each lifecycle event out to a pool's sub-hooks.
 *
 * Per event: idle → validating_registration → fanning_out →
 * (aggregating | passthrough) → returning → idle.
 *
 * Fan-out is sequential in registration order and only reaches hooks whose
 * cached flags declare the event. The first throw or bad acknowledgement
 * aborts the event; nothing is written until every hook has answered.
 * beforeSwap leaves its per-hook answers in the transient store, and the
 * matching afterSwap consumes them.
 */

import {
	aggregateBalanceDeltas,
	aggregateBeforeSwapDeltas,
	aggregateScalarDeltas,
} from "../delta/delta-aggregator.js";
import { ZERO_BALANCE_DELTA, ZERO_BEFORE_SWAP_DELTA } from "../delta/types.js";
import { resolveFee, weightedFee } from "../fees/fee-resolver.js";
import type { FeeConfigStore } from "../fees/fee-config-store.js";
import { EVENT_FLAG, HookFlag, hasFlag } from "../hooks/permissions.js";
import {
	isDynamicFee,
	stripOverrideFlag,
	validatePoolKey,
	withOverrideFlag,
} from "../hooks/pool-key.js";
import { HOOK_SELECTORS, acknowledges } from "../hooks/selectors.js";
import {
	type AfterInitializeArgs,
	type AfterModifyLiquidityArgs,
	type AfterSwapArgs,
	type BeforeInitializeArgs,
	type BeforeModifyLiquidityArgs,
	type BeforeSwapArgs,
	type DonateArgs,
	type HookAck,
	HookEvent,
	type HookEventAcks,
	type HookEventArgs,
	type SubHookHandlers,
} from "../hooks/types.js";
import { sameAddress } from "../lib/ethereum/index.js";
import type { Logger } from "../lib/logger/index.js";
import type { z } from "../lib/validation/index.js";
import type { HookEntry } from "../registry/types.js";
import type { HookRegistry } from "../registry/hook-registry.js";
import {
	type AdapterError,
	InvalidHookResponseError,
	UnauthorizedCode,
	UnauthorizedError,
	classifyError,
} from "../shared/errors.js";
import type { Address, PoolId } from "../shared/identifiers.js";
import { OK_VOID, type Result, err, ok } from "../shared/result.js";
import type { ReentrancyGuard } from "./reentrancy-guard.js";
import {
	balanceDeltaSchema,
	beforeSwapDeltaSchema,
	beforeSwapFeeSchema,
	unspecifiedDeltaSchema,
} from "./response-schemas.js";
import type { TransientSwapStore } from "./transient-store.js";
import {
	type AfterSwapResult,
	type BeforeSwapRecord,
	type BeforeSwapResult,
	DispatchPhase,
	type LifecycleHandler,
	type LiquidityResult,
} from "./types.js";

export interface DispatcherDeps {
	/** The only caller allowed to trigger lifecycle events. */
	readonly poolManager: Address;
	readonly registry: HookRegistry;
	readonly fees: FeeConfigStore;
	readonly transient: TransientSwapStore;
	readonly guard: ReentrancyGuard;
	readonly logger: Logger;
}

interface Invocation<E extends HookEvent> {
	readonly entry: HookEntry;
	readonly ack: HookEventAcks[E];
}

/** How one event turns sub-hook answers into the composite result. */
interface EventPlan<E extends HookEvent, R> {
	/** Result when no hook handles the event, or when the event has nothing to aggregate. */
	readonly neutral: (poolId: PoolId) => R;
	readonly check?: (ack: HookEventAcks[E], entry: HookEntry) => Result<void, AdapterError>;
	readonly aggregate?: (
		invocations: readonly Invocation<E>[],
		poolId: PoolId,
	) => Result<R, AdapterError>;
	readonly onAbort?: (poolId: PoolId) => void;
}

type LiquidityEvent = typeof HookEvent.AfterAddLiquidity | typeof HookEvent.AfterRemoveLiquidity;

function ackOf(event: HookEvent): HookAck {
	return { selector: HOOK_SELECTORS[event] };
}

function checkShape(
	schema: z.ZodTypeAny,
	value: unknown,
	entry: HookEntry,
	event: HookEvent,
	expected: string,
): Result<void, InvalidHookResponseError> {
	return schema.safeParse(value).success
		? OK_VOID
		: err(new InvalidHookResponseError(entry.address, event, expected, value));
}

export class CallbackDispatcher implements LifecycleHandler {
	private readonly deps: DispatcherDeps;
	private phase: DispatchPhase = DispatchPhase.Idle;

	private constructor(deps: DispatcherDeps) {
		this.deps = deps;
	}

	static create(deps: DispatcherDeps): CallbackDispatcher {
		return new CallbackDispatcher(deps);
	}

	currentPhase(): DispatchPhase {
		return this.phase;
	}

	// ── Pass-through events ────────────────────────────────────────

	beforeInitialize(caller: Address, args: BeforeInitializeArgs): Result<HookAck, AdapterError> {
		return this.dispatch(caller, HookEvent.BeforeInitialize, args, {
			neutral: () => ackOf(HookEvent.BeforeInitialize),
		});
	}

	afterInitialize(caller: Address, args: AfterInitializeArgs): Result<HookAck, AdapterError> {
		return this.dispatch(caller, HookEvent.AfterInitialize, args, {
			neutral: () => ackOf(HookEvent.AfterInitialize),
		});
	}

	beforeAddLiquidity(
		caller: Address,
		args: BeforeModifyLiquidityArgs,
	): Result<HookAck, AdapterError> {
		return this.dispatch(caller, HookEvent.BeforeAddLiquidity, args, {
			neutral: () => ackOf(HookEvent.BeforeAddLiquidity),
		});
	}

	beforeRemoveLiquidity(
		caller: Address,
		args: BeforeModifyLiquidityArgs,
	): Result<HookAck, AdapterError> {
		return this.dispatch(caller, HookEvent.BeforeRemoveLiquidity, args, {
			neutral: () => ackOf(HookEvent.BeforeRemoveLiquidity),
		});
	}

	beforeDonate(caller: Address, args: DonateArgs): Result<HookAck, AdapterError> {
		return this.dispatch(caller, HookEvent.BeforeDonate, args, {
			neutral: () => ackOf(HookEvent.BeforeDonate),
		});
	}

	afterDonate(caller: Address, args: DonateArgs): Result<HookAck, AdapterError> {
		return this.dispatch(caller, HookEvent.AfterDonate, args, {
			neutral: () => ackOf(HookEvent.AfterDonate),
		});
	}

	// ── Liquidity deltas ───────────────────────────────────────────

	afterAddLiquidity(
		caller: Address,
		args: AfterModifyLiquidityArgs,
	): Result<LiquidityResult, AdapterError> {
		return this.dispatch(
			caller,
			HookEvent.AfterAddLiquidity,
			args,
			this.liquidityPlan(HookEvent.AfterAddLiquidity, HookFlag.AfterAddLiquidityReturnsDelta),
		);
	}

	afterRemoveLiquidity(
		caller: Address,
		args: AfterModifyLiquidityArgs,
	): Result<LiquidityResult, AdapterError> {
		return this.dispatch(
			caller,
			HookEvent.AfterRemoveLiquidity,
			args,
			this.liquidityPlan(HookEvent.AfterRemoveLiquidity, HookFlag.AfterRemoveLiquidityReturnsDelta),
		);
	}

	private liquidityPlan(
		event: LiquidityEvent,
		returnsDelta: HookFlag,
	): EventPlan<LiquidityEvent, LiquidityResult> {
		return {
			neutral: () => ({ ...ackOf(event), delta: ZERO_BALANCE_DELTA }),
			check: (ack, entry) =>
				hasFlag(entry.flags, returnsDelta)
					? checkShape(balanceDeltaSchema, ack.delta, entry, event, "int128 balance delta")
					: OK_VOID,
			aggregate: (invocations) =>
				ok({
					...ackOf(event),
					delta: aggregateBalanceDeltas(
						invocations.map(({ entry, ack }) => ({
							returnsDelta: hasFlag(entry.flags, returnsDelta),
							delta: ack.delta,
						})),
					),
				}),
		};
	}

	// ── Swap pair ──────────────────────────────────────────────────

	/**
	 * Only hooks declaring `beforeSwapReturnDelta` contribute a delta and a
	 * fee preference; the others are called and their selector checked.
	 */
	beforeSwap(caller: Address, args: BeforeSwapArgs): Result<BeforeSwapResult, AdapterError> {
		const event = HookEvent.BeforeSwap;
		const plan: EventPlan<typeof event, BeforeSwapResult> = {
			neutral: (poolId) => {
				this.writeTransient(poolId, []);
				return {
					...ackOf(event),
					delta: ZERO_BEFORE_SWAP_DELTA,
					fee: null,
					lpFeeOverride: 0,
				};
			},
			check: (ack, entry) => {
				if (!hasFlag(entry.flags, HookFlag.BeforeSwapReturnsDelta)) return OK_VOID;
				const fee = checkShape(beforeSwapFeeSchema, ack, entry, event, "fee override and weight");
				if (!fee.ok) return fee;
				return checkShape(beforeSwapDeltaSchema, ack.delta, entry, event, "int128 swap delta");
			},
			aggregate: (invocations, poolId) => {
				const records: BeforeSwapRecord[] = invocations
					.filter(({ entry }) => hasFlag(entry.flags, HookFlag.BeforeSwapReturnsDelta))
					.map(({ entry, ack }) => ({
						hook: entry.address,
						delta: ack.delta,
						fee: weightedFee(stripOverrideFlag(ack.lpFeeOverride), ack.feeWeight ?? 1),
					}));
				const fee = resolveFee(
					records.map((r) => r.fee),
					this.deps.fees.view(poolId),
				);
				this.writeTransient(poolId, records);
				return ok({
					...ackOf(event),
					delta: aggregateBeforeSwapDeltas(
						records.map((r) => ({ returnsDelta: true, delta: r.delta })),
					),
					fee,
					lpFeeOverride: isDynamicFee(args.key.fee) ? withOverrideFlag(fee) : 0,
				});
			},
			onAbort: (poolId) => this.deps.transient.discard(poolId),
		};
		return this.dispatch(caller, event, args, plan);
	}

	afterSwap(caller: Address, args: AfterSwapArgs): Result<AfterSwapResult, AdapterError> {
		const event = HookEvent.AfterSwap;
		const plan: EventPlan<typeof event, AfterSwapResult> = {
			neutral: (poolId) => ({
				...ackOf(event),
				delta: 0n,
				beforeSwap: this.deps.transient.take(poolId),
			}),
			check: (ack, entry) =>
				hasFlag(entry.flags, HookFlag.AfterSwapReturnsDelta)
					? checkShape(unspecifiedDeltaSchema, ack.delta, entry, event, "int128 unspecified delta")
					: OK_VOID,
			aggregate: (invocations, poolId) =>
				ok({
					...ackOf(event),
					delta: aggregateScalarDeltas(
						invocations.map(({ entry, ack }) => ({
							returnsDelta: hasFlag(entry.flags, HookFlag.AfterSwapReturnsDelta),
							delta: ack.delta,
						})),
					),
					beforeSwap: this.deps.transient.take(poolId),
				}),
			onAbort: (poolId) => this.deps.transient.discard(poolId),
		};
		return this.dispatch(caller, event, args, plan);
	}

	// ── Engine ─────────────────────────────────────────────────────

	private dispatch<E extends HookEvent, R>(
		caller: Address,
		event: E,
		args: HookEventArgs[E],
		plan: EventPlan<E, R>,
	): Result<R, AdapterError> {
		return this.deps.guard.run(event, () => {
			if (!sameAddress(caller, this.deps.poolManager)) {
				return err(new UnauthorizedError(UnauthorizedCode.NotPoolManager, caller, { event }));
			}
			const pool = validatePoolKey(args.key);
			if (!pool.ok) return pool;
			const poolId = pool.value;
			try {
				const result = this.execute(poolId, event, args, plan);
				this.enter(DispatchPhase.Returning, event, poolId);
				if (!result.ok) {
					plan.onAbort?.(poolId);
					this.deps.logger.warn(
						{ event, poolId, error: result.error.toJSON() },
						"Lifecycle event aborted",
					);
				}
				return result;
			} finally {
				this.phase = DispatchPhase.Idle;
			}
		});
	}

	private execute<E extends HookEvent, R>(
		poolId: PoolId,
		event: E,
		args: HookEventArgs[E],
		plan: EventPlan<E, R>,
	): Result<R, AdapterError> {
		this.enter(DispatchPhase.ValidatingRegistration, event, poolId);
		const eligible = this.deps.registry
			.entries(poolId)
			.filter((entry) => hasFlag(entry.flags, EVENT_FLAG[event]));
		if (eligible.length === 0) return ok(plan.neutral(poolId));

		this.enter(DispatchPhase.FanningOut, event, poolId);
		const invocations: Invocation<E>[] = [];
		for (const entry of eligible) {
			const ack = this.invoke(entry, event, args);
			if (!ack.ok) return ack;
			if (plan.check !== undefined) {
				const checked = plan.check(ack.value, entry);
				if (!checked.ok) return checked;
			}
			invocations.push({ entry, ack: ack.value });
		}

		if (plan.aggregate === undefined) {
			this.enter(DispatchPhase.Passthrough, event, poolId);
			return ok(plan.neutral(poolId));
		}
		this.enter(DispatchPhase.Aggregating, event, poolId);
		return plan.aggregate(invocations, poolId);
	}

	/** Call one sub-hook and verify it echoed the event's selector. */
	private invoke<E extends HookEvent>(
		entry: HookEntry,
		event: E,
		args: HookEventArgs[E],
	): Result<HookEventAcks[E], AdapterError> {
		const handlers: SubHookHandlers = entry.hook;
		let ack: HookEventAcks[E] | undefined;
		try {
			ack = handlers[event]?.(args);
		} catch (e) {
			return err(classifyError(e, { hook: entry.address, event }));
		}
		if (ack === undefined || ack === null || !acknowledges(event, ack.selector)) {
			return err(
				new InvalidHookResponseError(entry.address, event, HOOK_SELECTORS[event], ack?.selector),
			);
		}
		return ok(ack);
	}

	private writeTransient(poolId: PoolId, records: readonly BeforeSwapRecord[]): void {
		const previous = this.deps.transient.write(poolId, records);
		if (previous.length > 0) {
			this.deps.logger.warn(
				{ poolId, unmatched: previous.map((r) => r.hook) },
				"beforeSwap overwrote an unmatched swap record",
			);
		}
	}

	private enter(phase: DispatchPhase, event: HookEvent, poolId: PoolId): void {
		this.phase = phase;
		this.deps.logger.debug({ event, poolId, phase }, "dispatch phase");
	}
}
