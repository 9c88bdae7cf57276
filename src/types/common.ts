/**
 * Trade direction for swap operations.
 */
export enum TradeType {
  EXACT_IN = 'EXACT_IN',
  EXACT_OUT = 'EXACT_OUT',
}

/**
 * Ordered pair of per-token amounts, in pool token order.
 */
export type TokenAmounts = readonly [bigint, bigint];

/**
 * Block metadata the vault supplies with every action.
 */
export interface BlockContext {
  /** Current block number. */
  blockNumber: number;
  /** Current block time, Unix seconds. */
  timestamp: number;
  /** Block in which the pool balances last changed. */
  lastChangeBlock: number;
  /** True while the pool is paused. Defaults to false. */
  paused?: boolean;
}

/**
 * Logger interface for pool instrumentation.
 *
 * Implement this interface to receive debug, info, and error
 * logs from every pool action. Defaults to undefined (no logging).
 */
export interface Logger {
  /** Debug-level log for computed amounts and invariant brackets. */
  debug(msg: string, data?: unknown): void;
  /** Info-level log for lifecycle events such as initialization. */
  info(msg: string, data?: unknown): void;
  /** Error-level log for failed actions. */
  error(msg: string, err?: unknown): void;
}
