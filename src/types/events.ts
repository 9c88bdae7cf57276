import { TradeType, TokenAmounts } from './common';
import { OracleSample } from './oracle';

/**
 * Base pool event.
 */
export interface BasePoolEvent {
  /** Event type identifier string */
  type: string;
  /** Block number of the action */
  blockNumber: number;
  /** Unix timestamp in seconds of the action */
  timestamp: number;
}

/**
 * Swap event.
 */
export interface SwapEvent extends BasePoolEvent {
  /** Literal type tag for swap */
  type: "swap";
  kind: TradeType;
  /** Address of the input token */
  tokenIn: string;
  /** Address of the output token */
  tokenOut: string;
  /** Raw input amount, fee included */
  amountIn: bigint;
  /** Raw output amount */
  amountOut: bigint;
  /** Fee charged, in raw input-token units */
  feeAmount: bigint;
}

/**
 * Join event.
 */
export interface JoinEvent extends BasePoolEvent {
  /** Literal type tag */
  type: "join";
  /** Address receiving the minted shares */
  recipient: string;
  /** Raw amounts pulled into the pool */
  amountsIn: TokenAmounts;
  /** Shares minted to the recipient */
  sharesOut: bigint;
  /** Invariant recorded after the join */
  invariant: bigint;
}

/**
 * Exit event.
 */
export interface ExitEvent extends BasePoolEvent {
  /** Literal type tag */
  type: "exit";
  /** Address burning shares */
  sender: string;
  /** Raw amounts sent out of the pool */
  amountsOut: TokenAmounts;
  /** Shares burned */
  sharesIn: bigint;
  /** Invariant recorded after the exit; null when it became unknown */
  invariant: bigint | null;
}

/**
 * Protocol fee shares owed for invariant growth.
 */
export interface ProtocolFeeEvent extends BasePoolEvent {
  /** Literal type tag */
  type: "protocol_fee";
  gyroTreasury: string;
  gyroShares: bigint;
  protocolTreasury: string;
  protocolShares: bigint;
}

/**
 * Oracle sample written.
 */
export interface OracleSampleEvent extends BasePoolEvent {
  /** Literal type tag */
  type: "oracle_sample";
  /** Ring-buffer index written */
  index: number;
  sample: OracleSample;
}

/**
 * Union of all pool events.
 */
export type PoolEvent =
  | SwapEvent
  | JoinEvent
  | ExitEvent
  | ProtocolFeeEvent
  | OracleSampleEvent;
