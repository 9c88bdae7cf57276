import { TokenAmounts } from './common';

/**
 * Two-dimensional vector of signed fixed-point values.
 */
export interface Vector2 {
  x: bigint;
  y: bigint;
}

/**
 * Geometric description of the elliptical price curve (18 decimals).
 */
export interface CurveParams {
  /** Lower price bound. */
  readonly alpha: bigint;
  /** Upper price bound. */
  readonly beta: bigint;
  /** Cosine component of the rotation vector. */
  readonly c: bigint;
  /** Sine component of the rotation vector. */
  readonly s: bigint;
  /** Stretch factor of the ellipse. */
  readonly lambda: bigint;
}

/**
 * Quantities precomputed from {@link CurveParams} (38 decimals).
 */
export interface DerivedParams {
  /** Unit-circle point for price alpha. */
  readonly tauAlpha: Readonly<Vector2>;
  /** Unit-circle point for price beta. */
  readonly tauBeta: Readonly<Vector2>;
  /** s·c·(tauBeta.x − tauAlpha.x) */
  readonly u: bigint;
  /** s²·tauBeta.y + c²·tauAlpha.y */
  readonly v: bigint;
  /** s·c·(tauBeta.y − tauAlpha.y) */
  readonly w: bigint;
  /** c²·tauBeta.x + s²·tauAlpha.x */
  readonly z: bigint;
  /** c² + s² */
  readonly dSq: bigint;
}

/**
 * Two-sided invariant bracket: the upper bound overestimates and the lower
 * bound underestimates the true invariant.
 */
export interface InvariantEstimate {
  upperBound: bigint;
  lowerBound: bigint;
}

export interface InvariantWithError {
  invariant: bigint;
  error: bigint;
}

/**
 * Numeric engine for the elliptical curve.
 *
 * All balances and amounts are normalized to 18 decimals. Implementations
 * must be pure and must throw instead of saturating on curve-domain
 * violations.
 */
export interface MathEngine {
  validateParams(params: CurveParams): void;
  validateDerivedParamsLimits(params: CurveParams, derived: DerivedParams): void;
  calculateInvariant(balances: TokenAmounts, params: CurveParams, derived: DerivedParams): bigint;
  calculateInvariantWithError(
    balances: TokenAmounts,
    params: CurveParams,
    derived: DerivedParams,
  ): InvariantWithError;
  calcOutGivenIn(
    balances: TokenAmounts,
    amountIn: bigint,
    tokenInIsToken0: boolean,
    params: CurveParams,
    derived: DerivedParams,
    invariant: InvariantEstimate,
  ): bigint;
  calcInGivenOut(
    balances: TokenAmounts,
    amountOut: bigint,
    tokenInIsToken0: boolean,
    params: CurveParams,
    derived: DerivedParams,
    invariant: InvariantEstimate,
  ): bigint;
  calculatePrice(
    balances: TokenAmounts,
    params: CurveParams,
    derived: DerivedParams,
    invariant: bigint,
  ): bigint;
}
