import { OracleState } from './oracle';

/**
 * A token registered with the pool.
 */
export interface PoolToken {
  /** Soroban contract address of the token. */
  address: string;
  /** Number of decimal places (0-18). */
  decimals: number;
  /** Optional ticker symbol, used only for display. */
  symbol?: string;
}

/**
 * Tracking status of the last known invariant.
 */
export enum InvariantStatus {
  KNOWN = 'known',
  UNKNOWN = 'unknown',
}

/**
 * Invariant as of the most recent liquidity event, or UNKNOWN when it must
 * be recomputed before it can be trusted for fee accounting.
 */
export type LastInvariant =
  | { status: InvariantStatus.KNOWN; value: bigint }
  | { status: InvariantStatus.UNKNOWN };

/**
 * Liquidity cap applied to joins.
 */
export interface CapConfig {
  /** When false the caps below are ignored. */
  enabled: boolean;
  /** Maximum share balance a single address may hold after a join. */
  perAddressCap: bigint;
  /** Maximum total share supply after a join. */
  globalCap: bigint;
}

/**
 * Read-only snapshot of the state the pool owns.
 */
export interface PoolState {
  /** Pool tokens in pool order. */
  tokens: readonly [PoolToken, PoolToken];
  /** Last known invariant. */
  lastInvariant: LastInvariant;
  /** Oracle bookkeeping. */
  oracle: OracleState;
  /** True if the oracle records samples. */
  oracleEnabled: boolean;
  /** Swap fee percentage (18 decimals). */
  swapFeePercentage: bigint;
  /** Liquidity cap configuration. */
  cap: CapConfig;
}
