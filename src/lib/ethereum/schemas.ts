import { z } from "../validation/index.js";
import { isValidAddress, toAddress } from "./address.js";

/** Any-case 20-byte hex address, checksummed on parse. */
export const addressSchema = z
	.string()
	.refine(isValidAddress, { message: "must be a 20-byte hex address" })
	.transform(toAddress);
