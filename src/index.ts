// ── Shared Kernel ────────────────────────────────────────────────────
export {
	type Address,
	type PoolId,
	poolId,
	address,
	type Result,
	ok,
	err,
	OK_VOID,
	map,
	andThen,
	firstFailure,
	unwrap,
	isOk,
	isErr,
	tryCatch,
	ErrorCategory,
	AdapterError,
	InvalidFeeError,
	ArrayLengthMismatchError,
	InvalidHookAddressError,
	InvalidHookCapabilitiesError,
	ConfigError,
	UnauthorizedCode,
	UnauthorizedError,
	HookNotApprovedError,
	PoolAlreadyRegisteredError,
	HookAlreadyRegisteredError,
	HookNotRegisteredError,
	ImmutableConfigurationError,
	SubHookCallError,
	InvalidHookResponseError,
	ReentrancyError,
	classifyError,
	isAdapterError,
	isAuthorizationError,
	isSubHookFailure,
	type AdapterConfig,
	type AdapterConfigInput,
	type EnvConfig,
	DEFAULT_ADAPTER_CONFIG,
	adapterConfigSchema,
	configFromEnv,
	parseAdapterConfig,
} from "./shared/index.js";

// ── Hooks ────────────────────────────────────────────────────────────
export {
	HookEvent,
	HOOK_EVENTS,
	type PoolKey,
	type ModifyLiquidityParams,
	type SwapParams,
	type BeforeInitializeArgs,
	type AfterInitializeArgs,
	type BeforeModifyLiquidityArgs,
	type AfterModifyLiquidityArgs,
	type BeforeSwapArgs,
	type AfterSwapArgs,
	type DonateArgs,
	type HookEventArgs,
	type HookAck,
	type HookDeltaAck,
	type BeforeSwapAck,
	type AfterSwapAck,
	type HookEventAcks,
	type SubHook,
	type SubHookHandlers,
	type HookPermissions,
	type HookFlags,
	HookFlag,
	ALL_HOOK_FLAGS,
	ALL_PERMISSIONS,
	NO_PERMISSIONS,
	EVENT_FLAG,
	permissions,
	encodePermissions,
	decodeFlags,
	hasFlag,
	validatePermissions,
	HOOK_SELECTORS,
	HOOK_SIGNATURES,
	acknowledges,
	DYNAMIC_FEE_FLAG,
	OVERRIDE_FEE_FLAG,
	poolIdOf,
	poolKeySchema,
	validatePoolKey,
	isDynamicFee,
	withOverrideFlag,
	stripOverrideFlag,
} from "./hooks/index.js";

// ── Deltas ───────────────────────────────────────────────────────────
export {
	type BalanceDelta,
	type BeforeSwapDelta,
	type DeltaContribution,
	ZERO_BALANCE_DELTA,
	ZERO_BEFORE_SWAP_DELTA,
	INT128_MAX,
	INT128_MIN,
	isInt128,
	sumInt128,
	wrapInt128,
	aggregateBalanceDeltas,
	aggregateBeforeSwapDeltas,
	aggregateScalarDeltas,
	isZeroBalanceDelta,
	isZeroBeforeSwapDelta,
} from "./delta/index.js";

// ── Fees ─────────────────────────────────────────────────────────────
export {
	MAX_FEE,
	FeeCalculationMethod,
	FEE_CALCULATION_METHODS,
	DEFAULT_FEE_METHOD,
	type WeightedFee,
	type PoolFeeSettings,
	type FeeConfiguration,
	type RegistrationFeeConfig,
	isValidFee,
	isValidFeeSetting,
	isValidContribution,
	weightedFee,
	fallbackFee,
	resolveFee,
	FeeConfigStore,
} from "./fees/index.js";

// ── Registry & Access ────────────────────────────────────────────────
export { type HookEntry, describeHook, describeHooks, HookRegistry } from "./registry/index.js";
export {
	type ApprovalChange,
	Ownable,
	ApprovedHookRegistry,
	PoolOwnerRegistry,
} from "./access/index.js";

// ── Dispatch ─────────────────────────────────────────────────────────
export {
	DispatchPhase,
	type AfterSwapResult,
	type BeforeSwapRecord,
	type BeforeSwapResult,
	type LifecycleHandler,
	type LiquidityResult,
	CallbackDispatcher,
	type DispatcherDeps,
	ReentrancyGuard,
	TransientSwapStore,
} from "./dispatch/index.js";

// ── Adapters ─────────────────────────────────────────────────────────
export {
	type AdapterEvents,
	type GovernanceFeeUpdatedEvent,
	type HookApprovalChangedEvent,
	type HookListChange,
	type HooksRegisteredEvent,
	type PoolFeeConfigurationUpdatedEvent,
	type PoolOwnerClaimedEvent,
	type RoleChangedEvent,
	MultiHookAdapterBase,
	type AdapterOptions,
	ImmutableMultiHookAdapter,
	PermissionedMultiHookAdapter,
	createImmutableAdapter,
	createPermissionedAdapter,
	type FactoryOptions,
} from "./adapter/index.js";

// ── Lib: Ethereum ───────────────────────────────────────────────────
export {
	type Bytes32,
	type Hex,
	type Selector,
	ZERO_ADDRESS,
	isValidAddress,
	isZeroAddress,
	sameAddress,
	toAddress,
	functionSelector,
	hashPoolKey,
	addressSchema,
} from "./lib/ethereum/index.js";

// ── Lib: Logger ─────────────────────────────────────────────────────
export { createLogger, silentLogger } from "./lib/logger/index.js";
export type { Logger, LoggerConfig, LogLevel } from "./lib/logger/index.js";

// ── Lib: Validation ─────────────────────────────────────────────────
export { validate, ValidationError, z } from "./lib/validation/index.js";
export type { ValidationIssue } from "./lib/validation/index.js";

// ── Lib: Events ─────────────────────────────────────────────────────
export { TypedEmitter } from "./lib/events/index.js";
export type { Listener, ListenerErrorCallback } from "./lib/events/index.js";
