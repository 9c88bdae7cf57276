/**
 * Fixed-point helpers for 18-decimal bigint arithmetic.
 *
 * Every division names its rounding direction explicitly; callers pick the
 * direction that favours the pool.
 */

export const ONE = 10n ** 18n;
export const ONE_XP = 10n ** 38n;

export enum Rounding {
  /** Toward negative infinity. */
  ROUND_DOWN,
  /** Toward positive infinity. */
  ROUND_UP,
}

/**
 * Divide two signed integers with an explicit rounding direction.
 *
 * bigint `/` truncates toward zero; this corrects the quotient so that
 * ROUND_DOWN floors and ROUND_UP ceils regardless of operand signs.
 */
export function divideWithRounding(
  numerator: bigint,
  denominator: bigint,
  rounding: Rounding,
): bigint {
  if (denominator === 0n) {
    throw new RangeError('Division by zero');
  }
  const quotient = numerator / denominator;
  const remainder = numerator % denominator;
  if (remainder === 0n) return quotient;

  const isPositive = (numerator > 0n) === (denominator > 0n);
  if (rounding === Rounding.ROUND_UP && isPositive) return quotient + 1n;
  if (rounding === Rounding.ROUND_DOWN && !isPositive) return quotient - 1n;
  return quotient;
}

export function mulDiv(a: bigint, b: bigint, denominator: bigint, rounding: Rounding): bigint {
  return divideWithRounding(a * b, denominator, rounding);
}

export function mulDown(a: bigint, b: bigint): bigint {
  return divideWithRounding(a * b, ONE, Rounding.ROUND_DOWN);
}

export function mulUp(a: bigint, b: bigint): bigint {
  return divideWithRounding(a * b, ONE, Rounding.ROUND_UP);
}

export function divDown(a: bigint, b: bigint): bigint {
  return divideWithRounding(a * ONE, b, Rounding.ROUND_DOWN);
}

export function divUp(a: bigint, b: bigint): bigint {
  return divideWithRounding(a * ONE, b, Rounding.ROUND_UP);
}

export function abs(x: bigint): bigint {
  return x < 0n ? -x : x;
}

/**
 * Integer square root, rounded down.
 */
export function sqrt(value: bigint): bigint {
  if (value < 0n) {
    throw new RangeError('Square root of negative number');
  }
  if (value < 2n) return value;

  // Newton iteration from an over-estimate converges monotonically to floor(sqrt).
  let x = 1n << BigInt(Math.ceil(value.toString(2).length / 2));
  for (;;) {
    const next = (x + value / x) >> 1n;
    if (next >= x) break;
    x = next;
  }
  return x;
}

/**
 * Scaling factor that normalizes a token with `decimals` to 18 decimals.
 */
export function scalingFactor(decimals: number): bigint {
  return 10n ** BigInt(18 - decimals);
}

export function upscale(amount: bigint, factor: bigint): bigint {
  return amount * factor;
}

export function downscaleDown(amount: bigint, factor: bigint): bigint {
  return divideWithRounding(amount, factor, Rounding.ROUND_DOWN);
}

export function downscaleUp(amount: bigint, factor: bigint): bigint {
  return divideWithRounding(amount, factor, Rounding.ROUND_UP);
}
