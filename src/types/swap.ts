import { TradeType } from './common';
import { InvariantEstimate } from './curve';

/**
 * Swap request routed to the pool by the vault.
 *
 * For EXACT_IN `amount` is the raw input amount including the swap fee;
 * for EXACT_OUT it is the raw output amount requested.
 */
export interface SwapRequest {
  /** Trade direction (exact in or exact out) */
  kind: TradeType;
  /** The address of the input token */
  tokenIn: string;
  /** The address of the output token */
  tokenOut: string;
  /** The amount to swap */
  amount: bigint;
}

/**
 * Swap computation returned to the vault.
 */
export interface SwapResult {
  /** Trade direction of the request */
  kind: TradeType;
  /** The address of the input token */
  tokenIn: string;
  /** The address of the output token */
  tokenOut: string;
  /** Output amount for EXACT_IN, input amount (fee included) for EXACT_OUT */
  amount: bigint;
  /** Swap fee charged, in raw input-token units */
  feeAmount: bigint;
  /** Invariant bracket the amounts were computed against */
  invariant: InvariantEstimate;
}
