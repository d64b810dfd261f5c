export { type Address, type PoolId, poolId, address } from "./identifiers.js";

export {
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
} from "./result.js";

export {
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
} from "./errors.js";

export {
	type AdapterConfig,
	type AdapterConfigInput,
	type EnvConfig,
	DEFAULT_ADAPTER_CONFIG,
	adapterConfigSchema,
	configFromEnv,
	parseAdapterConfig,
} from "./config.js";
