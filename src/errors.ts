/**
 * Typed error hierarchy for the E-CLP pool.
 *
 * All errors extend EclpPoolError and carry a machine-readable
 * error code for programmatic handling plus human-readable messages.
 */

/**
 * Base error class for all pool errors.
 */
export class EclpPoolError extends Error {
  readonly code: string;
  readonly details?: Record<string, unknown>;

  constructor(
    code: string,
    message: string,
    details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "EclpPoolError";
    this.code = code;
    this.details = details;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Swap tokens do not resolve to one pool token in and the other out.
 */
export class InvalidTokenPairError extends EclpPoolError {
  constructor(tokenIn: string, tokenOut: string) {
    super("INVALID_TOKEN_PAIR", `Invalid token pair ${tokenIn} / ${tokenOut}`, {
      tokenIn,
      tokenOut,
    });
    this.name = "InvalidTokenPairError";
  }
}

/**
 * Amount arrays of the wrong length.
 */
export class LengthMismatchError extends EclpPoolError {
  constructor(expected: number, actual: number) {
    super("LENGTH_MISMATCH", `Expected ${expected} amounts, got ${actual}`, {
      expected,
      actual,
    });
    this.name = "LengthMismatchError";
  }
}

export class UnsupportedJoinKindError extends EclpPoolError {
  constructor(kind: string) {
    super("UNSUPPORTED_JOIN_KIND", `Unsupported join kind: ${kind}`, { kind });
    this.name = "UnsupportedJoinKindError";
  }
}

export class UnsupportedExitKindError extends EclpPoolError {
  constructor(kind: string) {
    super("UNSUPPORTED_EXIT_KIND", `Unsupported exit kind: ${kind}`, { kind });
    this.name = "UnsupportedExitKindError";
  }
}

/**
 * Join would push a holder or the pool above its liquidity cap.
 */
export class CapExceededError extends EclpPoolError {
  constructor(
    which: "perAddress" | "global",
    limit: bigint,
    attempted: bigint,
  ) {
    super(
      "CAP_EXCEEDED",
      `${which === "global" ? "Global" : "Per-address"} cap exceeded: ${attempted} > ${limit}`,
      { which, limit: limit.toString(), attempted: attempted.toString() },
    );
    this.name = "CapExceededError";
  }
}

export class PoolPausedError extends EclpPoolError {
  constructor(action: string) {
    super("POOL_PAUSED", `Pool is paused; ${action} is disabled`, { action });
    this.name = "PoolPausedError";
  }
}

/**
 * Computation left the valid region of the curve (asset bounds, negative
 * discriminant, insufficient balance).
 */
export class CurveDomainViolationError extends EclpPoolError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("CURVE_DOMAIN_VIOLATION", message, details);
    this.name = "CurveDomainViolationError";
  }
}

export class InvalidParamsError extends EclpPoolError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("INVALID_PARAMS", message, details);
    this.name = "InvalidParamsError";
  }
}

export class InvalidDerivedParamsError extends EclpPoolError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("INVALID_DERIVED_PARAMS", message, details);
    this.name = "InvalidDerivedParamsError";
  }
}

/**
 * Invalid input parameters.
 */
export class ValidationError extends EclpPoolError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("VALIDATION_ERROR", message, details);
    this.name = "ValidationError";
  }
}

/**
 * Oracle query that cannot be answered from the sample buffer.
 */
export class OracleQueryError extends EclpPoolError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("ORACLE_QUERY_ERROR", message, details);
    this.name = "OracleQueryError";
  }
}

/**
 * Map a raw error to the appropriate typed error class.
 *
 * Pool errors pass through unchanged. Anything else reaching the pool comes
 * from the math engine (including `RangeError` from bigint arithmetic) and
 * is reported as a curve-domain violation with the original attached.
 */
export function mapError(err: unknown): EclpPoolError {
  if (err instanceof EclpPoolError) return err;

  const message = err instanceof Error ? err.message : String(err);
  return new CurveDomainViolationError(message, { originalError: err });
}
