import type { Address } from "../shared/identifiers.js";

/** One approval flip, reported so the adapter can emit it. */
export interface ApprovalChange {
	readonly hook: Address;
	readonly approved: boolean;
}
