import { TokenAmounts } from '../types/common';
import {
  CurveParams,
  DerivedParams,
  InvariantEstimate,
  InvariantWithError,
  MathEngine,
  Vector2,
} from '../types/curve';
import {
  CurveDomainViolationError,
  InvalidDerivedParamsError,
  InvalidParamsError,
} from '../errors';
import { PRECISION } from '../config';
import { ONE, ONE_XP, Rounding, abs, divideWithRounding, sqrt } from '../utils/math';

/**
 * Exact-integer math for the elliptical concentrated-liquidity curve.
 *
 * The curve is `‖A(t − r·χ)‖ = r` with `A = [[c/λ, −s/λ], [s, c]]`, where
 * `t = (x, y)` are the normalized balances, `r` the invariant and `χ` the
 * ellipse centre per unit of invariant. Everything is carried in bigint
 * without intermediate rounding; only square roots and final divisions
 * round, each in the direction that favours the pool.
 *
 * Scales: balances, prices and curve params 1e18; derived params and χ 1e38.
 */

const ONE_SQ = ONE * ONE; // 1e36
const XP_SQ = ONE_XP * ONE_XP; // 1e76
const E74 = ONE_SQ * ONE_XP;
const E112 = E74 * ONE_XP;

/**
 * Unit-circle point `(ζ, 1) / sqrt(1 + ζ²)` for price `p`, with
 * `ζ(p) = λ(c·p − s) / (c + s·p)`.
 */
function tau(price: bigint, params: CurveParams): Vector2 {
  const { c, s, lambda } = params;
  const numerator = lambda * (c * price - s * ONE); // 1e54
  const denominator = c * ONE + s * price; // 1e36
  if (denominator <= 0n) {
    throw new InvalidParamsError('Price outside the rotation half-plane', {
      price: price.toString(),
    });
  }
  const zeta = (numerator * 10n ** 20n) / denominator; // 1e38
  const norm = sqrt(XP_SQ + zeta * zeta);
  return { x: (zeta * ONE_XP) / norm, y: XP_SQ / norm };
}

/**
 * Compute the derived parameters from the curve parameters.
 */
export function deriveParams(params: CurveParams): DerivedParams {
  const { c, s } = params;
  const tauAlpha = Object.freeze(tau(params.alpha, params));
  const tauBeta = Object.freeze(tau(params.beta, params));

  return Object.freeze({
    tauAlpha,
    tauBeta,
    u: (s * c * (tauBeta.x - tauAlpha.x)) / ONE_SQ,
    v: (s * s * tauBeta.y + c * c * tauAlpha.y) / ONE_SQ,
    w: (s * c * (tauBeta.y - tauAlpha.y)) / ONE_SQ,
    z: (c * c * tauBeta.x + s * s * tauAlpha.x) / ONE_SQ,
    dSq: (c * c + s * s) * 100n,
  });
}

/**
 * Ellipse centre per unit of invariant (1e38).
 */
export function computeChi(params: CurveParams, derived: DerivedParams): Vector2 {
  const { c, s, lambda } = params;
  const { tauAlpha, tauBeta, dSq } = derived;
  const nx = lambda * c * tauBeta.x + s * tauBeta.y * ONE; // 1e74
  const ny = c * tauAlpha.y * ONE - lambda * s * tauAlpha.x;
  return { x: (nx * 100n) / dSq, y: (ny * 100n) / dSq };
}

/**
 * Coefficients `(P, Q, D)` of `D·r² − 2P·r + Q = 0` (scales 1e128, 1e108,
 * 1e148), the curve equation with both sides multiplied by λ².
 */
function invariantTerms(
  balances: TokenAmounts,
  params: CurveParams,
  chi: Vector2,
): { p: bigint; q: bigint; d: bigint } {
  const { c, s, lambda } = params;
  const [x, y] = balances;
  const l = lambda * lambda;
  const u1 = c * x - s * y;
  const u2 = s * x + c * y;
  const m1 = c * chi.x - s * chi.y;
  const m2 = s * chi.x + c * chi.y;
  return {
    p: u1 * m1 * ONE_SQ + l * u2 * m2,
    q: u1 * u1 * ONE_SQ + l * u2 * u2,
    d: m1 * m1 * ONE_SQ + l * m2 * m2 - l * E112,
  };
}

/**
 * Larger root of the invariant quadratic, truncated, plus an error bound.
 */
export function calculateInvariantWithError(
  balances: TokenAmounts,
  params: CurveParams,
  derived: DerivedParams,
): InvariantWithError {
  const { p, q, d } = invariantTerms(balances, params, computeChi(params, derived));
  if (d <= 0n) {
    throw new CurveDomainViolationError('Degenerate invariant denominator');
  }
  const discriminant = p * p - d * q;
  if (discriminant < 0n) {
    throw new CurveDomainViolationError('Negative invariant discriminant');
  }
  const invariant = ((p + sqrt(discriminant)) * ONE_XP) / d;
  const error = 1n + divideWithRounding(ONE_XP, d, Rounding.ROUND_UP);
  return { invariant, error };
}

export function invariantBracket(result: InvariantWithError): InvariantEstimate {
  return {
    upperBound: result.invariant + 2n * result.error,
    lowerBound: result.invariant,
  };
}

/** Lower root of `qa·t² + qb·t + qc = 0`, rounded up (1e56). */
function solveQuadratic(qa: bigint, qb: bigint, qc: bigint): bigint {
  const discriminant = qb * qb - 4n * qa * qc;
  if (discriminant < 0n) {
    throw new CurveDomainViolationError('Balance outside the curve domain', {
      discriminant: discriminant.toString(),
    });
  }
  return divideWithRounding(-qb - sqrt(discriminant), 2n * qa, Rounding.ROUND_UP);
}

/**
 * Balance of token 1 on the curve of invariant `r` at token 0 balance `x`,
 * rounded up.
 */
export function calcYGivenX(
  x: bigint,
  params: CurveParams,
  derived: DerivedParams,
  r: bigint,
): bigint {
  const { c, s, lambda } = params;
  const chi = computeChi(params, derived);
  const l = lambda * lambda;
  const xt = x * ONE_XP - r * chi.x;
  const yt = solveQuadratic(
    s * s * ONE_SQ + l * c * c,
    2n * xt * s * c * (l - ONE_SQ),
    xt * xt * (c * c * ONE_SQ + l * s * s) - l * r * r * E112,
  );
  return divideWithRounding(r * chi.y + yt, ONE_XP, Rounding.ROUND_UP);
}

/**
 * Balance of token 0 on the curve of invariant `r` at token 1 balance `y`,
 * rounded up.
 */
export function calcXGivenY(
  y: bigint,
  params: CurveParams,
  derived: DerivedParams,
  r: bigint,
): bigint {
  const { c, s, lambda } = params;
  const chi = computeChi(params, derived);
  const l = lambda * lambda;
  const yt = y * ONE_XP - r * chi.y;
  const xt = solveQuadratic(
    c * c * ONE_SQ + l * s * s,
    2n * yt * s * c * (l - ONE_SQ),
    yt * yt * (s * s * ONE_SQ + l * c * c) - l * r * r * E112,
  );
  return divideWithRounding(r * chi.x + xt, ONE_XP, Rounding.ROUND_UP);
}

/**
 * Largest balances the curve of invariant `r` can hold: token 0 at price
 * alpha and token 1 at price beta.
 */
export function maxBalances(
  params: CurveParams,
  derived: DerivedParams,
  r: bigint,
): TokenAmounts {
  const { c, s, lambda } = params;
  const { tauAlpha, tauBeta, dSq } = derived;
  const nx = lambda * c * (tauBeta.x - tauAlpha.x) + s * (tauBeta.y - tauAlpha.y) * ONE;
  const ny = lambda * s * (tauBeta.x - tauAlpha.x) + c * (tauAlpha.y - tauBeta.y) * ONE;
  const scale = dSq * ONE_SQ;
  return [(r * nx) / scale, (r * ny) / scale];
}

/**
 * Spot price of token 0 in token 1 at the given balances (18 decimals).
 */
export function calculatePrice(
  balances: TokenAmounts,
  params: CurveParams,
  derived: DerivedParams,
  invariant: bigint,
): bigint {
  const { c, s, lambda } = params;
  const chi = computeChi(params, derived);
  const l = lambda * lambda;
  const xt = balances[0] * ONE_XP - invariant * chi.x;
  const yt = balances[1] * ONE_XP - invariant * chi.y;
  const g1 = c * xt - s * yt;
  const g2 = s * xt + c * yt;
  const numerator = g1 * c * ONE_SQ + l * g2 * s;
  const denominator = l * g2 * c - g1 * s * ONE_SQ;
  if (denominator === 0n) {
    throw new CurveDomainViolationError('Price undefined at balances');
  }
  return (numerator * ONE) / denominator;
}

function checkAssetBound(
  newBalance: bigint,
  maxBalance: bigint,
  index: number,
): void {
  if (newBalance > maxBalance) {
    throw new CurveDomainViolationError('Asset bounds exceeded', {
      tokenIndex: index,
      newBalance: newBalance.toString(),
      maxBalance: maxBalance.toString(),
    });
  }
}

/**
 * Exact-integer E-CLP engine.
 */
export class EclpMath implements MathEngine {
  validateParams(params: CurveParams): void {
    const { alpha, beta, c, s, lambda } = params;
    if (alpha <= 0n || beta <= alpha) {
      throw new InvalidParamsError('Price bounds must satisfy 0 < alpha < beta', {
        alpha: alpha.toString(),
        beta: beta.toString(),
      });
    }
    if (c < 0n || s < 0n || c > ONE || s > ONE) {
      throw new InvalidParamsError('Rotation components must lie in [0, 1]');
    }
    if (abs(c * c + s * s - ONE_SQ) > PRECISION.ROTATION_NORM_ERROR * ONE) {
      throw new InvalidParamsError('Rotation vector must have unit norm', {
        c: c.toString(),
        s: s.toString(),
      });
    }
    if (lambda < ONE || lambda > PRECISION.MAX_LAMBDA) {
      throw new InvalidParamsError('Stretch factor out of range', {
        lambda: lambda.toString(),
      });
    }
  }

  validateDerivedParamsLimits(params: CurveParams, derived: DerivedParams): void {
    const tolerance = PRECISION.DERIVED_ERROR;
    for (const [name, point] of [
      ['tauAlpha', derived.tauAlpha],
      ['tauBeta', derived.tauBeta],
    ] as const) {
      const normSq = point.x * point.x + point.y * point.y;
      if (abs(normSq - XP_SQ) > ONE_XP * tolerance) {
        throw new InvalidDerivedParamsError(`${name} is not a unit vector`);
      }
      if (point.y <= 0n) {
        throw new InvalidDerivedParamsError(`${name}.y must be positive`);
      }
    }
    if (abs(derived.dSq - ONE_XP) > tolerance) {
      throw new InvalidDerivedParamsError('dSq must be close to 1');
    }
    for (const name of ['u', 'v', 'w', 'z'] as const) {
      if (abs(derived[name]) > ONE_XP) {
        throw new InvalidDerivedParamsError(`${name} exceeds 1`);
      }
    }

    const expected = deriveParams(params);
    const mismatched = [
      ['tauAlpha.x', derived.tauAlpha.x, expected.tauAlpha.x],
      ['tauAlpha.y', derived.tauAlpha.y, expected.tauAlpha.y],
      ['tauBeta.x', derived.tauBeta.x, expected.tauBeta.x],
      ['tauBeta.y', derived.tauBeta.y, expected.tauBeta.y],
      ['u', derived.u, expected.u],
      ['v', derived.v, expected.v],
      ['w', derived.w, expected.w],
      ['z', derived.z, expected.z],
      ['dSq', derived.dSq, expected.dSq],
    ] as const;
    for (const [name, actual, wanted] of mismatched) {
      if (abs(actual - wanted) > tolerance) {
        throw new InvalidDerivedParamsError(`${name} does not match curve params`, {
          actual: actual.toString(),
          expected: wanted.toString(),
        });
      }
    }

    // XP² / (AχAχ − 1) must stay bounded for the invariant to be well conditioned.
    const { d } = invariantTerms([0n, 0n], params, computeChi(params, derived));
    const lambdaSq = params.lambda * params.lambda;
    const denominator = d / (lambdaSq * E74);
    if (denominator <= 0n || XP_SQ / denominator > PRECISION.MAX_INV_INVARIANT_DENOMINATOR) {
      throw new InvalidDerivedParamsError('Invariant denominator too small');
    }
  }

  calculateInvariant(
    balances: TokenAmounts,
    params: CurveParams,
    derived: DerivedParams,
  ): bigint {
    return calculateInvariantWithError(balances, params, derived).invariant;
  }

  calculateInvariantWithError(
    balances: TokenAmounts,
    params: CurveParams,
    derived: DerivedParams,
  ): InvariantWithError {
    return calculateInvariantWithError(balances, params, derived);
  }

  calcOutGivenIn(
    balances: TokenAmounts,
    amountIn: bigint,
    tokenInIsToken0: boolean,
    params: CurveParams,
    derived: DerivedParams,
    invariant: InvariantEstimate,
  ): bigint {
    const [ixIn, ixOut] = tokenInIsToken0 ? [0, 1] : [1, 0];
    const newBalanceIn = balances[ixIn] + amountIn;
    checkAssetBound(newBalanceIn, maxBalances(params, derived, invariant.lowerBound)[ixIn], ixIn);

    const newBalanceOut = tokenInIsToken0
      ? calcYGivenX(newBalanceIn, params, derived, invariant.upperBound)
      : calcXGivenY(newBalanceIn, params, derived, invariant.upperBound);
    const amountOut = balances[ixOut] - newBalanceOut;
    if (amountOut < 0n) {
      throw new CurveDomainViolationError('Swap result below zero', {
        amountIn: amountIn.toString(),
        amountOut: amountOut.toString(),
      });
    }
    return amountOut;
  }

  calcInGivenOut(
    balances: TokenAmounts,
    amountOut: bigint,
    tokenInIsToken0: boolean,
    params: CurveParams,
    derived: DerivedParams,
    invariant: InvariantEstimate,
  ): bigint {
    const [ixIn, ixOut] = tokenInIsToken0 ? [0, 1] : [1, 0];
    if (amountOut > balances[ixOut]) {
      throw new CurveDomainViolationError('Insufficient balance for amount out', {
        amountOut: amountOut.toString(),
        balance: balances[ixOut].toString(),
      });
    }
    const newBalanceOut = balances[ixOut] - amountOut;
    const newBalanceIn = tokenInIsToken0
      ? calcXGivenY(newBalanceOut, params, derived, invariant.upperBound)
      : calcYGivenX(newBalanceOut, params, derived, invariant.upperBound);
    checkAssetBound(newBalanceIn, maxBalances(params, derived, invariant.lowerBound)[ixIn], ixIn);

    const amountIn = newBalanceIn - balances[ixIn];
    if (amountIn < 0n) {
      throw new CurveDomainViolationError('Swap result below zero', {
        amountIn: amountIn.toString(),
        amountOut: amountOut.toString(),
      });
    }
    return amountIn;
  }

  calculatePrice(
    balances: TokenAmounts,
    params: CurveParams,
    derived: DerivedParams,
    invariant: bigint,
  ): bigint {
    return calculatePrice(balances, params, derived, invariant);
  }
}

export const eclpMath = new EclpMath();
