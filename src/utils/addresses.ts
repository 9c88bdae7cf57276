import { StrKey } from "@stellar/stellar-sdk";

/**
 * Address utilities for Stellar/Soroban address handling.
 */

/**
 * Validate a Stellar public key (G... address).
 *
 * @example
 * ```ts
 * isValidPublicKey('GBRPYHIL2CI3FNQ4BXLFMNDLFJUNPU2HY3ZMFSHONUCEOASW7QC7OX2H'); // true
 * isValidPublicKey('invalid'); // false
 * ```
 */
export function isValidPublicKey(address: string): boolean {
  try {
    return StrKey.isValidEd25519PublicKey(address);
  } catch {
    return false;
  }
}

/**
 * Validate a Soroban contract address (C... address).
 */
export function isValidContractId(address: string): boolean {
  try {
    return StrKey.isValidContract(address);
  } catch {
    return false;
  }
}

/**
 * Validate any Stellar address (public key or contract). Treasuries and
 * share recipients may be either; pool tokens must be contracts.
 */
export function isValidAddress(address: string): boolean {
  return isValidPublicKey(address) || isValidContractId(address);
}

/**
 * Sort two token addresses lexicographically: token0 < token1.
 *
 * The pool fixes its token order this way at construction, so every
 * per-token pair it accepts or returns is in this order.
 *
 * @throws {Error} If tokenA and tokenB are identical
 */
export function sortTokens(tokenA: string, tokenB: string): [string, string] {
  if (tokenA === tokenB) throw new Error("Identical tokens");
  return tokenA < tokenB ? [tokenA, tokenB] : [tokenB, tokenA];
}

/**
 * Truncate an address for log lines, e.g. 'GBRP...OX2H'.
 */
export function truncateAddress(address: string, chars: number = 4): string {
  if (address.length <= chars * 2 + 3) return address;
  return `${address.slice(0, chars)}...${address.slice(-chars)}`;
}
