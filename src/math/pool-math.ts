import { TokenAmounts } from '../types/common';
import { Rounding, divDown, mulDiv, mulDown } from '../utils/math';

/**
 * Share and fee arithmetic shared by joins and exits. All values are
 * 18-decimal fixed point; every division rounds toward the pool.
 */

/**
 * Protocol fee shares owed on invariant growth since the last liquidity
 * event, split between the two beneficiaries.
 */
export function calcProtocolFees(
  previousInvariant: bigint,
  currentInvariant: bigint,
  totalSupply: bigint,
  protocolFeePercentage: bigint,
  gyroPortion: bigint,
): { gyroShares: bigint; protocolShares: bigint } {
  if (currentInvariant <= previousInvariant || protocolFeePercentage === 0n) {
    return { gyroShares: 0n, protocolShares: 0n };
  }

  const diff = mulDown(protocolFeePercentage, currentInvariant - previousInvariant);
  const due = divDown(mulDown(diff, totalSupply), currentInvariant - diff);
  const gyroShares = mulDown(gyroPortion, due);
  return { gyroShares, protocolShares: due - gyroShares };
}

/**
 * Invariant after a proportional join of `sharesOut` (ceil(inv·Δ/S) added).
 */
export function invariantAfterJoin(
  invariant: bigint,
  sharesOut: bigint,
  totalSupply: bigint,
): bigint {
  return invariant + mulDiv(invariant, sharesOut, totalSupply, Rounding.ROUND_UP);
}

/**
 * Invariant after a proportional exit of `sharesIn` (floor(inv·Δ/S) removed).
 */
export function invariantAfterExit(
  invariant: bigint,
  sharesIn: bigint,
  totalSupply: bigint,
): bigint {
  return invariant - mulDiv(invariant, sharesIn, totalSupply, Rounding.ROUND_DOWN);
}

/**
 * Token amounts a proportional join of `sharesOut` pays in.
 */
export function proportionalAmountsIn(
  balances: TokenAmounts,
  sharesOut: bigint,
  totalSupply: bigint,
): TokenAmounts {
  return [
    mulDiv(balances[0], sharesOut, totalSupply, Rounding.ROUND_UP),
    mulDiv(balances[1], sharesOut, totalSupply, Rounding.ROUND_UP),
  ];
}

/**
 * Token amounts a proportional exit of `sharesIn` pays out.
 */
export function proportionalAmountsOut(
  balances: TokenAmounts,
  sharesIn: bigint,
  totalSupply: bigint,
): TokenAmounts {
  return [
    mulDiv(balances[0], sharesIn, totalSupply, Rounding.ROUND_DOWN),
    mulDiv(balances[1], sharesIn, totalSupply, Rounding.ROUND_DOWN),
  ];
}
