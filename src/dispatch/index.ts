export {
	DispatchPhase,
	type AfterSwapResult,
	type BeforeSwapRecord,
	type BeforeSwapResult,
	type LifecycleHandler,
	type LiquidityResult,
} from "./types.js";
export { CallbackDispatcher, type DispatcherDeps } from "./callback-dispatcher.js";
export { ReentrancyGuard } from "./reentrancy-guard.js";
export { TransientSwapStore } from "./transient-store.js";
