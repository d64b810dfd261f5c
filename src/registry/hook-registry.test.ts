import { beforeEach, describe, expect, it } from "vitest";
import type { HookFlags } from "../hooks/permissions.js";
import { MockSubHook, buildPoolId, testAddress } from "../testing/index.js";
import { HookRegistry } from "./hook-registry.js";
import type { HookEntry } from "./types.js";

function entry(n: number, flags: HookFlags = 0): HookEntry {
	const hook = MockSubHook.create(testAddress(n));
	return { hook, address: hook.address, flags };
}

describe("HookRegistry", () => {
	const pool = buildPoolId();
	const other = buildPoolId({}, 1);
	let registry: HookRegistry;

	beforeEach(() => {
		registry = HookRegistry.create();
	});

	it("starts unregistered with an empty list", () => {
		expect(registry.isRegistered(pool)).toBe(false);
		expect(registry.entries(pool)).toEqual([]);
		expect(registry.poolCount()).toBe(0);
	});

	it("counts a pool registered with zero hooks", () => {
		registry.set(pool, []);
		expect(registry.isRegistered(pool)).toBe(true);
		expect(registry.addresses(pool)).toEqual([]);
	});

	it("keeps pools independent", () => {
		registry.set(pool, [entry(1)]);
		expect(registry.isRegistered(other)).toBe(false);
		expect(registry.contains(other, testAddress(1))).toBe(false);
	});

	it("set replaces the whole list", () => {
		registry.set(pool, [entry(1), entry(2)]);
		registry.set(pool, [entry(3)]);
		expect(registry.addresses(pool)).toEqual([testAddress(3)]);
	});

	it("append keeps registration order", () => {
		registry.set(pool, [entry(1)]);
		registry.append(pool, [entry(2), entry(3)]);
		expect(registry.addresses(pool)).toEqual([testAddress(1), testAddress(2), testAddress(3)]);
		expect(registry.indexOf(pool, testAddress(3))).toBe(2);
	});

	it("does not alias the caller's array", () => {
		const list = [entry(1)];
		registry.set(pool, list);
		list.push(entry(2));
		expect(registry.addresses(pool)).toEqual([testAddress(1)]);
	});

	describe("remove", () => {
		beforeEach(() => {
			registry.set(pool, [entry(1), entry(2), entry(3), entry(4)]);
		});

		it("swaps the last entry into the removed slot", () => {
			registry.remove(pool, [testAddress(2)]);
			expect(registry.addresses(pool)).toEqual([testAddress(1), testAddress(4), testAddress(3)]);
		});

		it("removes the last entry without reordering", () => {
			registry.remove(pool, [testAddress(4)]);
			expect(registry.addresses(pool)).toEqual([testAddress(1), testAddress(2), testAddress(3)]);
		});

		it("applies removals in argument order", () => {
			registry.remove(pool, [testAddress(1), testAddress(2)]);
			// [1,2,3,4] -> [4,2,3] -> [4,3]
			expect(registry.addresses(pool)).toEqual([testAddress(4), testAddress(3)]);
		});

		it("can empty the list while the pool stays registered", () => {
			registry.remove(pool, [1, 2, 3, 4].map(testAddress));
			expect(registry.entries(pool)).toEqual([]);
			expect(registry.isRegistered(pool)).toBe(true);
		});

		it("ignores absent hooks", () => {
			registry.remove(pool, [testAddress(99)]);
			expect(registry.addresses(pool)).toHaveLength(4);
		});
	});
});
