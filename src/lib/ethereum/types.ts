/**
 * Ethereum primitive types shared by the adapter.
 *
 * Domain code works with these branded strings; only this folder talks to viem.
 */

export declare const __brand: unique symbol;
type Brand<T, B extends string> = T & { readonly [__brand]: B };

/** `0x`-prefixed hex string. */
export type Hex = `0x${string}`;

/**
 * EIP-55 checksummed 20-byte address.
 * @example "0x742d35Cc6634C0532925a3b844Bc454e4438f44e"
 */
export type Address = Brand<Hex, "Address">;

/** 32-byte keccak digest. */
export type Bytes32 = Brand<Hex, "Bytes32">;

/** Four-byte function selector. */
export type Selector = Brand<Hex, "Selector">;
