import type { EclpPool } from '../pool';
import { BlockContext, TokenAmounts, TradeType } from '../types/common';
import { SwapRequest, SwapResult } from '../types/swap';
import { InvalidTokenPairError, PoolPausedError } from '../errors';
import { invariantBracket } from '../math/eclp';
import { ONE, divUp, downscaleDown, downscaleUp, mulUp, upscale } from '../utils/math';
import { validateNonNegativeAmount } from '../utils/validation';

/**
 * Swap module -- prices exact-in and exact-out trades against the curve.
 *
 * Every swap is computed against the upper bound of the invariant
 * bracket, so rounding in the invariant solver never favours the trader.
 * The swap fee is always charged on the input token.
 */
export class SwapModule {
  private pool: EclpPool;

  constructor(pool: EclpPool) {
    this.pool = pool;
  }

  /**
   * Compute a swap and commit its oracle sample.
   *
   * @param request - Trade direction, tokens and amount
   * @param balances - Raw pool balances in pool order
   * @param context - Block metadata supplied by the vault
   */
  execute(request: SwapRequest, balances: TokenAmounts, context: BlockContext): SwapResult {
    if (context.paused) throw new PoolPausedError('swap');

    const tokenInIsToken0 = this.resolveDirection(request.tokenIn, request.tokenOut);
    validateNonNegativeAmount(request.amount, 'amount');

    const { math, params, derived, scalingFactors } = this.pool;
    const [ixIn, ixOut] = tokenInIsToken0 ? [0, 1] : [1, 0];
    const scaled: TokenAmounts = [
      upscale(balances[0], scalingFactors[0]),
      upscale(balances[1], scalingFactors[1]),
    ];

    const invariantResult = math.calculateInvariantWithError(scaled, params, derived);
    const invariant = invariantBracket(invariantResult);
    const oracleUpdate = this.pool.oracle.prepareUpdate(context, scaled, invariantResult.invariant);
    const swapFee = this.pool.config.swapFeePercentage;

    let amount: bigint;
    let feeAmount: bigint;
    if (request.kind === TradeType.EXACT_IN) {
      feeAmount = mulUp(request.amount, swapFee);
      const amountIn = upscale(request.amount - feeAmount, scalingFactors[ixIn]);
      const amountOut = math.calcOutGivenIn(scaled, amountIn, tokenInIsToken0, params, derived, invariant);
      amount = downscaleDown(amountOut, scalingFactors[ixOut]);
    } else {
      const amountOut = upscale(request.amount, scalingFactors[ixOut]);
      const amountIn = math.calcInGivenOut(scaled, amountOut, tokenInIsToken0, params, derived, invariant);
      const netIn = downscaleUp(amountIn, scalingFactors[ixIn]);
      amount = divUp(netIn, ONE - swapFee);
      feeAmount = amount - netIn;
    }

    if (oracleUpdate) this.pool.oracle.commit(oracleUpdate);

    const result: SwapResult = {
      kind: request.kind,
      tokenIn: request.tokenIn,
      tokenOut: request.tokenOut,
      amount,
      feeAmount,
      invariant,
    };

    this.pool.logger?.debug('swap: computed', {
      kind: request.kind,
      amount: amount.toString(),
      feeAmount: feeAmount.toString(),
      upperBound: invariant.upperBound.toString(),
      lowerBound: invariant.lowerBound.toString(),
    });

    if (oracleUpdate) this.pool.emitOracleSample(oracleUpdate, context);
    this.pool.emit({
      type: 'swap',
      blockNumber: context.blockNumber,
      timestamp: context.timestamp,
      kind: request.kind,
      tokenIn: request.tokenIn,
      tokenOut: request.tokenOut,
      amountIn: request.kind === TradeType.EXACT_IN ? request.amount : amount,
      amountOut: request.kind === TradeType.EXACT_IN ? amount : request.amount,
      feeAmount,
    });

    return result;
  }

  /**
   * True if tokenIn is token 0. Throws unless the pair is exactly the
   * pool's two tokens.
   */
  resolveDirection(tokenIn: string, tokenOut: string): boolean {
    const [token0, token1] = this.pool.tokens;
    if (tokenIn === token0.address && tokenOut === token1.address) return true;
    if (tokenIn === token1.address && tokenOut === token0.address) return false;
    throw new InvalidTokenPairError(tokenIn, tokenOut);
  }
}
