/**
 * MockSubHook — configurable sub-hook for tests.
 *
 * Implements every lifecycle method, so any permission set passes capability
 * validation; the permissions decide which methods the adapter may call.
 * Calls are recorded per hook and, optionally, in a log shared by several hooks.
 */

import {
	type BalanceDelta,
	type BeforeSwapDelta,
	ZERO_BALANCE_DELTA,
	ZERO_BEFORE_SWAP_DELTA,
} from "../delta/types.js";
import type { Selector } from "../lib/ethereum/index.js";
import { type HookPermissions, permissions } from "../hooks/permissions.js";
import { HOOK_SELECTORS } from "../hooks/selectors.js";
import type {
	AfterInitializeArgs,
	AfterModifyLiquidityArgs,
	AfterSwapAck,
	AfterSwapArgs,
	BeforeInitializeArgs,
	BeforeModifyLiquidityArgs,
	BeforeSwapAck,
	BeforeSwapArgs,
	DonateArgs,
	HookAck,
	HookDeltaAck,
	HookEvent,
	SubHook,
} from "../hooks/types.js";
import type { Address } from "../shared/identifiers.js";

export interface RecordedCall {
	readonly hook: Address;
	readonly event: HookEvent;
	readonly args: unknown;
}

export interface BeforeSwapAnswer {
	readonly delta?: BeforeSwapDelta;
	readonly lpFeeOverride?: number;
	readonly feeWeight?: number;
}

type CallInterceptor = (event: HookEvent, args: unknown) => void;

export class MockSubHook implements SubHook {
	readonly address: Address;
	readonly calls: RecordedCall[] = [];

	private readonly perms: HookPermissions;
	private readonly sharedLog: RecordedCall[] | null;
	private readonly failures = new Map<HookEvent, unknown>();
	private readonly selectorOverrides = new Map<HookEvent, Selector>();
	private readonly liquidityDeltas = new Map<HookEvent, BalanceDelta>();
	private beforeSwapAnswer: Required<Omit<BeforeSwapAnswer, "feeWeight">> & {
		feeWeight: number | undefined;
	} = { delta: ZERO_BEFORE_SWAP_DELTA, lpFeeOverride: 0, feeWeight: undefined };
	private afterSwapDelta = 0n;
	private interceptor: CallInterceptor | null = null;
	private permissionQueries = 0;

	private constructor(address: Address, perms: HookPermissions, sharedLog: RecordedCall[] | null) {
		this.address = address;
		this.perms = perms;
		this.sharedLog = sharedLog;
	}

	/**
	 * @param perms - Declared capabilities; unspecified entries are false
	 * @param sharedLog - Optional log shared across hooks to assert cross-hook ordering
	 */
	static create(
		address: Address,
		perms: Partial<HookPermissions> = {},
		sharedLog?: RecordedCall[],
	): MockSubHook {
		return new MockSubHook(address, permissions(perms), sharedLog ?? null);
	}

	// ── Configuration ──────────────────────────────────────────────

	/** Throw `error` whenever `event` is handled. */
	failOn(event: HookEvent, error: unknown = new Error(`${event} failed`)): this {
		this.failures.set(event, error);
		return this;
	}

	/** Acknowledge `event` with `selector` instead of its own. */
	respondWithSelector(event: HookEvent, selector: Selector): this {
		this.selectorOverrides.set(event, selector);
		return this;
	}

	returnBeforeSwap(answer: BeforeSwapAnswer): this {
		this.beforeSwapAnswer = {
			delta: answer.delta ?? this.beforeSwapAnswer.delta,
			lpFeeOverride: answer.lpFeeOverride ?? this.beforeSwapAnswer.lpFeeOverride,
			feeWeight: answer.feeWeight ?? this.beforeSwapAnswer.feeWeight,
		};
		return this;
	}

	returnAfterSwap(delta: bigint): this {
		this.afterSwapDelta = delta;
		return this;
	}

	returnLiquidityDelta(event: "afterAddLiquidity" | "afterRemoveLiquidity", delta: BalanceDelta): this {
		this.liquidityDeltas.set(event, delta);
		return this;
	}

	/** Run `fn` inside every handled call, before the answer is produced. */
	intercept(fn: CallInterceptor): this {
		this.interceptor = fn;
		return this;
	}

	/** How many times the capability descriptor was queried. */
	permissionQueryCount(): number {
		return this.permissionQueries;
	}

	callCount(event?: HookEvent): number {
		return event === undefined ? this.calls.length : this.calls.filter((c) => c.event === event).length;
	}

	// ── SubHook ────────────────────────────────────────────────────

	getHookPermissions(): HookPermissions {
		this.permissionQueries++;
		return this.perms;
	}

	beforeInitialize(args: BeforeInitializeArgs): HookAck {
		return this.ack("beforeInitialize", args);
	}

	afterInitialize(args: AfterInitializeArgs): HookAck {
		return this.ack("afterInitialize", args);
	}

	beforeAddLiquidity(args: BeforeModifyLiquidityArgs): HookAck {
		return this.ack("beforeAddLiquidity", args);
	}

	afterAddLiquidity(args: AfterModifyLiquidityArgs): HookDeltaAck {
		const ack = this.ack("afterAddLiquidity", args);
		return { ...ack, delta: this.liquidityDeltas.get("afterAddLiquidity") ?? ZERO_BALANCE_DELTA };
	}

	beforeRemoveLiquidity(args: BeforeModifyLiquidityArgs): HookAck {
		return this.ack("beforeRemoveLiquidity", args);
	}

	afterRemoveLiquidity(args: AfterModifyLiquidityArgs): HookDeltaAck {
		const ack = this.ack("afterRemoveLiquidity", args);
		return { ...ack, delta: this.liquidityDeltas.get("afterRemoveLiquidity") ?? ZERO_BALANCE_DELTA };
	}

	beforeSwap(args: BeforeSwapArgs): BeforeSwapAck {
		const ack = this.ack("beforeSwap", args);
		return {
			...ack,
			delta: this.beforeSwapAnswer.delta,
			lpFeeOverride: this.beforeSwapAnswer.lpFeeOverride,
			feeWeight: this.beforeSwapAnswer.feeWeight,
		};
	}

	afterSwap(args: AfterSwapArgs): AfterSwapAck {
		const ack = this.ack("afterSwap", args);
		return { ...ack, delta: this.afterSwapDelta };
	}

	beforeDonate(args: DonateArgs): HookAck {
		return this.ack("beforeDonate", args);
	}

	afterDonate(args: DonateArgs): HookAck {
		return this.ack("afterDonate", args);
	}

	private ack(event: HookEvent, args: unknown): HookAck {
		const call: RecordedCall = { hook: this.address, event, args };
		this.calls.push(call);
		this.sharedLog?.push(call);
		this.interceptor?.(event, args);
		if (this.failures.has(event)) {
			throw this.failures.get(event);
		}
		return { selector: this.selectorOverrides.get(event) ?? HOOK_SELECTORS[event] };
	}
}
