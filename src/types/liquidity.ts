import { BlockContext, TokenAmounts } from './common';
import { ProtocolFeeConfig, ProtocolFeeShares } from './fee';

/**
 * Join kinds a request payload may carry.
 */
export enum JoinKind {
  INIT = 'INIT',
  ALL_TOKENS_IN_FOR_EXACT_SHARES_OUT = 'ALL_TOKENS_IN_FOR_EXACT_SHARES_OUT',
  EXACT_TOKENS_IN_FOR_SHARES_OUT = 'EXACT_TOKENS_IN_FOR_SHARES_OUT',
  TOKEN_IN_FOR_EXACT_SHARES_OUT = 'TOKEN_IN_FOR_EXACT_SHARES_OUT',
}

/**
 * Exit kinds a request payload may carry.
 */
export enum ExitKind {
  EXACT_SHARES_IN_FOR_ONE_TOKEN_OUT = 'EXACT_SHARES_IN_FOR_ONE_TOKEN_OUT',
  EXACT_SHARES_IN_FOR_TOKENS_OUT = 'EXACT_SHARES_IN_FOR_TOKENS_OUT',
  SHARES_IN_FOR_EXACT_TOKENS_OUT = 'SHARES_IN_FOR_EXACT_TOKENS_OUT',
}

export type JoinPayload =
  | { kind: JoinKind.INIT; amountsIn: readonly bigint[] }
  | { kind: JoinKind.ALL_TOKENS_IN_FOR_EXACT_SHARES_OUT; sharesOut: bigint }
  | { kind: JoinKind.EXACT_TOKENS_IN_FOR_SHARES_OUT; amountsIn: readonly bigint[]; minSharesOut: bigint }
  | { kind: JoinKind.TOKEN_IN_FOR_EXACT_SHARES_OUT; sharesOut: bigint; tokenIndex: number };

export type ExitPayload =
  | { kind: ExitKind.EXACT_SHARES_IN_FOR_ONE_TOKEN_OUT; sharesIn: bigint; tokenIndex: number }
  | { kind: ExitKind.EXACT_SHARES_IN_FOR_TOKENS_OUT; sharesIn: bigint }
  | { kind: ExitKind.SHARES_IN_FOR_EXACT_TOKENS_OUT; amountsOut: readonly bigint[]; maxSharesIn: bigint };

/**
 * First join into an empty pool.
 */
export interface InitialJoinRequest {
  /** Address receiving the minted shares */
  recipient: string;
  /** Payload; must be of kind INIT */
  payload: JoinPayload;
  /** Block metadata */
  context: BlockContext;
}

/**
 * Join into an initialized pool.
 */
export interface JoinRequest {
  /** Address receiving the minted shares */
  recipient: string;
  /** Current share balance of the recipient (for cap checks) */
  recipientBalance: bigint;
  /** Raw pool balances in pool order */
  balances: TokenAmounts;
  /** Current total share supply */
  totalSupply: bigint;
  /** Payload dispatched on its kind */
  payload: JoinPayload;
  /** Protocol fee configuration for this action */
  protocolFees: ProtocolFeeConfig;
  /** Block metadata */
  context: BlockContext;
}

/**
 * Exit from an initialized pool.
 */
export interface ExitRequest {
  /** Address burning shares */
  sender: string;
  /** Raw pool balances in pool order */
  balances: TokenAmounts;
  /** Current total share supply */
  totalSupply: bigint;
  /** Payload dispatched on its kind */
  payload: ExitPayload;
  /** Protocol fee configuration for this action */
  protocolFees: ProtocolFeeConfig;
  /** Block metadata */
  context: BlockContext;
}

/**
 * Join computation returned to the vault.
 */
export interface JoinResult {
  /** Shares to mint to the recipient */
  sharesOut: bigint;
  /** Raw token amounts to pull into the pool */
  amountsIn: TokenAmounts;
  /** Protocol fee shares to mint before the join */
  protocolFees: ProtocolFeeShares | null;
}

/**
 * Exit computation returned to the vault.
 */
export interface ExitResult {
  /** Shares to burn from the sender */
  sharesIn: bigint;
  /** Raw token amounts to send out of the pool */
  amountsOut: TokenAmounts;
  /** Protocol fee shares to mint before the exit */
  protocolFees: ProtocolFeeShares | null;
}
