export type { Address, Bytes32, Hex, Selector } from "./types.js";
export { ZERO_ADDRESS, isValidAddress, isZeroAddress, sameAddress, toAddress } from "./address.js";
export { type PoolKeyTuple, functionSelector, hashPoolKey } from "./hashing.js";
export { addressSchema } from "./schemas.js";
