/**
 * Shape checks for sub-hook answers that carry numbers back into the adapter.
 */

import { isInt128 } from "../delta/int128.js";
import { z } from "../lib/validation/index.js";

const int128 = z.bigint().refine(isInt128, { message: "outside int128 range" });

export const balanceDeltaSchema = z.object({ amount0: int128, amount1: int128 });

export const beforeSwapDeltaSchema = z.object({ specified: int128, unspecified: int128 });

/** Fee fields only; the delta is checked separately when the hook declares it. */
export const beforeSwapFeeSchema = z.object({
	lpFeeOverride: z.number().int().nonnegative(),
	feeWeight: z.number().optional(),
});

export const unspecifiedDeltaSchema = int128;
