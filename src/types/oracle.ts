/**
 * Quantities tracked by the price oracle.
 */
export enum OracleVariable {
  /** Log of the spot price of token 0 in token 1. */
  PAIR_PRICE = 'PAIR_PRICE',
  /** Log of invariant divided by share supply. */
  INVARIANT_PER_SHARE = 'INVARIANT_PER_SHARE',
  /** Log of the invariant. */
  INVARIANT = 'INVARIANT',
}

/**
 * One ring-buffer slot. Instant values are compressed natural logs
 * (4 decimals); accumulators are instant values integrated over seconds.
 */
export interface OracleSample {
  logPairPrice: number;
  accLogPairPrice: number;
  logInvariantPerShare: number;
  accLogInvariantPerShare: number;
  logInvariant: number;
  accLogInvariant: number;
  /** Unix seconds of the last update; 0 for a slot never written. */
  timestamp: number;
}

/**
 * Oracle bookkeeping owned by the sampler.
 */
export interface OracleState {
  /** Ring-buffer index of the latest sample. */
  index: number;
  /** Creation time of the sample at `index`. */
  sampleCreationTimestamp: number;
  /** Compressed log of the last known invariant. */
  logInvariant: number;
  /** Compressed log of the share supply at the last liquidity event. */
  logTotalSupply: number;
}

/**
 * Time-weighted average query.
 */
export interface OracleAverageQuery {
  variable: OracleVariable;
  /** Window length in seconds. */
  secs: number;
  /** End of the window, in seconds before now. */
  ago: number;
}

/**
 * Pending sampler write, applied only when the surrounding action commits.
 */
export interface OracleUpdate {
  index: number;
  sample: OracleSample;
  /** Set when the write starts a new slot. */
  sampleCreationTimestamp?: number;
}
