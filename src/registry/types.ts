import type { HookFlags } from "../hooks/permissions.js";
import type { SubHook } from "../hooks/types.js";
import type { Address } from "../shared/identifiers.js";

/** A registered sub-hook with its capability flags, queried once at registration. */
export interface HookEntry {
	readonly hook: SubHook;
	readonly address: Address;
	readonly flags: HookFlags;
}
