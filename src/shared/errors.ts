/**
 * AdapterError hierarchy — structured failure classification.
 *
 * Every error carries a category that tells the caller which layer rejected
 * the operation: a bad argument, a missing role, a failing sub-hook, a
 * registry conflict or a reentrant call. No category is retried by the engine.
 */

/** Which layer of the adapter rejected the operation. */
export const ErrorCategory = {
	Configuration: "configuration",
	Authorization: "authorization",
	SubHook: "sub_hook",
	Consistency: "consistency",
	Reentrancy: "reentrancy",
} as const;

export type ErrorCategory = (typeof ErrorCategory)[keyof typeof ErrorCategory];

interface AdapterErrorOptions {
	readonly cause?: unknown;
}

type ErrorContext = Record<string, unknown> & AdapterErrorOptions;

/** Base class for every failure surfaced by the adapter. */
export class AdapterError extends Error {
	readonly category: ErrorCategory;
	readonly code: string;
	readonly context: Record<string, unknown>;

	constructor(
		message: string,
		code: string,
		category: ErrorCategory,
		context: Record<string, unknown> = {},
	) {
		super(message);
		this.name = "AdapterError";
		this.category = category;
		this.code = code;
		this.context = context;
	}

	toJSON(): Record<string, unknown> {
		return {
			name: this.name,
			message: this.message,
			code: this.code,
			category: this.category,
			context: this.context,
		};
	}
}

function splitCause(context: ErrorContext): {
	readonly rest: Record<string, unknown>;
	readonly cause: unknown;
} {
	const { cause, ...rest } = context;
	return { rest, cause };
}

// ── Configuration ────────────────────────────────────────────────────

/** A fee outside `0..1_000_000`, or not an integer. */
export class InvalidFeeError extends AdapterError {
	readonly fee: number;
	constructor(fee: number, context: ErrorContext = {}) {
		const { rest, cause } = splitCause(context);
		super(`Invalid fee: ${fee}`, "INVALID_FEE", ErrorCategory.Configuration, { fee, ...rest });
		this.name = "InvalidFeeError";
		this.fee = fee;
		if (cause !== undefined) this.cause = cause;
	}
}

/** Parallel arrays passed to a batch operation differ in length. */
export class ArrayLengthMismatchError extends AdapterError {
	constructor(left: number, right: number) {
		super(
			`Array length mismatch: ${left} != ${right}`,
			"ARRAY_LENGTH_MISMATCH",
			ErrorCategory.Configuration,
			{ left, right },
		);
		this.name = "ArrayLengthMismatchError";
	}
}

/** A missing, zero or self-referencing hook address. */
export class InvalidHookAddressError extends AdapterError {
	constructor(message: string, context: ErrorContext = {}) {
		const { rest, cause } = splitCause(context);
		super(message, "INVALID_HOOK_ADDRESS", ErrorCategory.Configuration, rest);
		this.name = "InvalidHookAddressError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** A hook whose capability descriptor is inconsistent with what it implements. */
export class InvalidHookCapabilitiesError extends AdapterError {
	constructor(message: string, context: ErrorContext = {}) {
		const { rest, cause } = splitCause(context);
		super(message, "INVALID_HOOK_CAPABILITIES", ErrorCategory.Configuration, rest);
		this.name = "InvalidHookCapabilitiesError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Malformed adapter configuration (construction or environment). */
export class ConfigError extends AdapterError {
	constructor(message: string, context: ErrorContext = {}) {
		const { rest, cause } = splitCause(context);
		super(message, "CONFIG_ERROR", ErrorCategory.Configuration, rest);
		this.name = "ConfigError";
		if (cause !== undefined) this.cause = cause;
	}
}

// ── Authorization ────────────────────────────────────────────────────

/** Role that a caller failed to hold. */
export const UnauthorizedCode = {
	NotOwner: "NOT_OWNER",
	NotHookManager: "NOT_HOOK_MANAGER",
	NotPoolOwner: "NOT_POOL_OWNER",
	NotPoolManager: "NOT_POOL_MANAGER",
} as const;

export type UnauthorizedCode = (typeof UnauthorizedCode)[keyof typeof UnauthorizedCode];

/** The caller does not hold the role the operation requires. */
export class UnauthorizedError extends AdapterError {
	constructor(code: UnauthorizedCode, caller: string, context: Record<string, unknown> = {}) {
		super(`Unauthorized (${code}): ${caller}`, code, ErrorCategory.Authorization, {
			caller,
			...context,
		});
		this.name = "UnauthorizedError";
	}
}

/** The hook is not in the approved-hook registry. */
export class HookNotApprovedError extends AdapterError {
	constructor(hook: string) {
		super(`Hook not approved: ${hook}`, "HOOK_NOT_APPROVED", ErrorCategory.Authorization, {
			hook,
		});
		this.name = "HookNotApprovedError";
	}
}

// ── Consistency ──────────────────────────────────────────────────────

/** An immutable adapter already holds a registration for this pool. */
export class PoolAlreadyRegisteredError extends AdapterError {
	constructor(poolId: string) {
		super(
			`Hooks already registered for pool ${poolId}`,
			"POOL_ALREADY_REGISTERED",
			ErrorCategory.Consistency,
			{ poolId },
		);
		this.name = "PoolAlreadyRegisteredError";
	}
}

/** The hook is already part of the pool's hook list. */
export class HookAlreadyRegisteredError extends AdapterError {
	constructor(poolId: string, hook: string) {
		super(
			`Hook ${hook} already registered for pool ${poolId}`,
			"HOOK_ALREADY_REGISTERED",
			ErrorCategory.Consistency,
			{ poolId, hook },
		);
		this.name = "HookAlreadyRegisteredError";
	}
}

/** The hook is not part of the pool's hook list. */
export class HookNotRegisteredError extends AdapterError {
	constructor(poolId: string, hook: string) {
		super(
			`Hook ${hook} not registered for pool ${poolId}`,
			"HOOK_NOT_REGISTERED",
			ErrorCategory.Consistency,
			{ poolId, hook },
		);
		this.name = "HookNotRegisteredError";
	}
}

/** Fee configuration of an immutable adapter cannot change after registration. */
export class ImmutableConfigurationError extends AdapterError {
	constructor(operation: string) {
		super(
			`Configuration is immutable: ${operation}`,
			"IMMUTABLE_CONFIGURATION",
			ErrorCategory.Consistency,
			{ operation },
		);
		this.name = "ImmutableConfigurationError";
	}
}

// ── Sub-hook failures ────────────────────────────────────────────────

/** A sub-hook threw while handling a lifecycle event. */
export class SubHookCallError extends AdapterError {
	constructor(message: string, context: ErrorContext = {}) {
		const { rest, cause } = splitCause(context);
		super(message, "SUB_HOOK_CALL_FAILED", ErrorCategory.SubHook, rest);
		this.name = "SubHookCallError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** A sub-hook returned without echoing the expected acknowledgement selector. */
export class InvalidHookResponseError extends AdapterError {
	constructor(hook: string, event: string, expected: string, received: unknown) {
		super(
			`Invalid ${event} response from ${hook}`,
			"INVALID_HOOK_RESPONSE",
			ErrorCategory.SubHook,
			{ hook, event, expected, received },
		);
		this.name = "InvalidHookResponseError";
	}
}

// ── Reentrancy ───────────────────────────────────────────────────────

/** An adapter entry point was invoked while another one was still on the stack. */
export class ReentrancyError extends AdapterError {
	constructor(entryPoint: string, inFlight: string) {
		super(
			`Reentrant call to ${entryPoint} while ${inFlight} is in flight`,
			"REENTRANT_CALL",
			ErrorCategory.Reentrancy,
			{ entryPoint, inFlight },
		);
		this.name = "ReentrancyError";
	}
}

// ── Classification helper ────────────────────────────────────────────

/**
 * Wrap whatever a sub-hook threw into a `SubHookCallError`.
 * Adapter errors raised inside the sub-hook (e.g. a rejected reentrant call) are kept as cause.
 */
export function classifyError(
	error: unknown,
	context: { readonly hook: string; readonly event: string },
): SubHookCallError {
	const reason = error instanceof Error ? error.message : String(error);
	return new SubHookCallError(`Sub-hook ${context.hook} failed in ${context.event}: ${reason}`, {
		...context,
		cause: error,
	});
}

// ── Type guards ──────────────────────────────────────────────────────

export function isAdapterError(e: unknown): e is AdapterError {
	return e instanceof AdapterError;
}

/** True for role and approval failures. */
export function isAuthorizationError(e: unknown): e is AdapterError {
	return e instanceof AdapterError && e.category === ErrorCategory.Authorization;
}

/** True when a sub-hook threw or answered with a bad acknowledgement. */
export function isSubHookFailure(e: unknown): e is SubHookCallError | InvalidHookResponseError {
	return e instanceof SubHookCallError || e instanceof InvalidHookResponseError;
}
