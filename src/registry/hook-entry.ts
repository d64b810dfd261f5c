/**
 * Hook entry construction — the one place a sub-hook's capabilities are queried.
 */

import { encodePermissions, validatePermissions } from "../hooks/permissions.js";
import type { SubHook } from "../hooks/types.js";
import { isValidAddress, isZeroAddress, sameAddress } from "../lib/ethereum/index.js";
import {
	type AdapterError,
	InvalidHookAddressError,
	InvalidHookCapabilitiesError,
} from "../shared/errors.js";
import { type Address, address } from "../shared/identifiers.js";
import { type Result, err, ok, tryCatch } from "../shared/result.js";
import type { HookEntry } from "./types.js";

/**
 * Validate one sub-hook and cache its flags.
 * @param self - The adapter's own address; an adapter cannot contain itself
 */
export function describeHook(
	hook: SubHook | null | undefined,
	self: Address,
): Result<HookEntry, AdapterError> {
	if (hook === null || hook === undefined) {
		return err(new InvalidHookAddressError("Hook reference is empty"));
	}
	if (typeof hook.address !== "string" || !isValidAddress(hook.address)) {
		return err(
			new InvalidHookAddressError(`Hook address is malformed: ${String(hook.address)}`, {
				hook: hook.address,
			}),
		);
	}
	const hookAddress = address(hook.address);
	if (isZeroAddress(hookAddress)) {
		return err(new InvalidHookAddressError("Hook address is zero", { hook: hookAddress }));
	}
	if (sameAddress(hookAddress, self)) {
		return err(
			new InvalidHookAddressError("Adapter cannot register itself as a sub-hook", {
				hook: hookAddress,
			}),
		);
	}

	const queried = tryCatch(() => encodePermissions(hook.getHookPermissions()));
	if (!queried.ok) {
		return err(
			new InvalidHookCapabilitiesError(`Capability query failed for ${hookAddress}`, {
				hook: hookAddress,
				cause: queried.error,
			}),
		);
	}
	const flags = queried.value;
	const valid = validatePermissions(flags, hook, hookAddress);
	if (!valid.ok) return valid;

	return ok({ hook, address: hookAddress, flags });
}

/** Validate a batch; fails on the first bad hook. */
export function describeHooks(
	hooks: readonly (SubHook | null | undefined)[],
	self: Address,
): Result<HookEntry[], AdapterError> {
	const entries: HookEntry[] = [];
	for (const hook of hooks) {
		const entry = describeHook(hook, self);
		if (!entry.ok) return entry;
		entries.push(entry.value);
	}
	return ok(entries);
}
