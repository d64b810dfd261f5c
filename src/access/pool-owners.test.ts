import { describe, expect, it } from "vitest";
import { ZERO_ADDRESS } from "../lib/ethereum/index.js";
import { ALICE, BOB, buildPoolId } from "../testing/index.js";
import { PoolOwnerRegistry } from "./pool-owners.js";

const POOL = buildPoolId();

describe("PoolOwnerRegistry", () => {
	it("reports the zero address for unclaimed pools", () => {
		const owners = PoolOwnerRegistry.create();
		expect(owners.ownerOf(POOL)).toBe(ZERO_ADDRESS);
		expect(owners.isClaimed(POOL)).toBe(false);
	});

	it("lets anyone register on an unclaimed pool", () => {
		const owners = PoolOwnerRegistry.create();
		expect(owners.authorizeRegistration(POOL, ALICE).ok).toBe(true);
		expect(owners.authorizeRegistration(POOL, BOB).ok).toBe(true);
	});

	it("first claim wins", () => {
		const owners = PoolOwnerRegistry.create();
		expect(owners.claim(POOL, ALICE)).toBe(true);
		expect(owners.claim(POOL, BOB)).toBe(false);
		expect(owners.ownerOf(POOL)).toBe(ALICE);
	});

	it("restricts claimed pools to their owner", () => {
		const owners = PoolOwnerRegistry.create();
		owners.claim(POOL, ALICE);
		expect(owners.authorizeRegistration(POOL, ALICE).ok).toBe(true);
		const denied = owners.authorizeRegistration(POOL, BOB);
		expect(denied.ok).toBe(false);
		if (!denied.ok) {
			expect(denied.error.code).toBe("NOT_POOL_OWNER");
			expect(denied.error.context).toEqual({ caller: BOB, poolId: POOL, owner: ALICE });
		}
	});

	it("requirePoolOwner fails on unclaimed pools", () => {
		const owners = PoolOwnerRegistry.create();
		expect(owners.requirePoolOwner(POOL, ALICE).ok).toBe(false);
	});
});
