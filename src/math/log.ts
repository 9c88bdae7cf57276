import { PRECISION } from '../config';
import { ONE } from '../utils/math';

/**
 * Compressed natural logs for oracle samples. A value `v` (18 decimals) is
 * stored as `round(ln(v) · 1e4)`, which fits comfortably in a JS number.
 */

export function toLowResLog(value: bigint): number {
  if (value <= 0n) {
    throw new RangeError(`Logarithm of non-positive value ${value}`);
  }
  return Math.round(Math.log(Number(value) / Number(ONE)) * PRECISION.LOG_COMPRESSION);
}

export function fromLowResLog(value: number): bigint {
  return BigInt(Math.round(Math.exp(value / PRECISION.LOG_COMPRESSION) * Number(ONE)));
}

export function logSpotPrice(price: bigint): number {
  return toLowResLog(price);
}

/** ln(invariant / supply), given the compressed log of the supply. */
export function logInvariantDivSupply(invariant: bigint, logTotalSupply: number): number {
  return toLowResLog(invariant) - logTotalSupply;
}
