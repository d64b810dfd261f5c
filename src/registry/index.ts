export type { HookEntry } from "./types.js";
export { describeHook, describeHooks } from "./hook-entry.js";
export { HookRegistry } from "./hook-registry.js";
