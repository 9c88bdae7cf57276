/**
 * MockVault: an in-process stand-in for the vault that custodies pool
 * tokens and shares.
 *
 * Holds raw balances, share balances and block metadata, routes actions to
 * an EclpPool and applies the amounts it returns, the way the real vault
 * would.
 *
 * Usage
 * -----
 *   const vault = new MockVault(pool);
 *
 *   vault.initialize(lp, [1000n * ONE, 1000n * ONE]);
 *   vault.advance();                 // next block, +12 s
 *   vault.swap({ kind: TradeType.EXACT_IN, tokenIn, tokenOut, amount });
 *   vault.join(lp, 10n * ONE, feeConfig);
 *   vault.setPaused(true);
 *   vault.exit(lp, 5n * ONE, feeConfig);
 *
 * Design notes
 * ------------
 *  - Any action that changes balances records the current block as the
 *    last change block, so a second action in the same block skips the
 *    oracle exactly like on chain.
 *  - Pool errors propagate unchanged and leave the vault untouched.
 */

import { EclpPool } from '../../pool';
import { BlockContext, TokenAmounts, TradeType } from '../../types/common';
import { ProtocolFeeConfig, ProtocolFeeShares } from '../../types/fee';
import { ExitKind, ExitResult, JoinKind, JoinResult } from '../../types/liquidity';
import { SwapRequest, SwapResult } from '../../types/swap';

/** Seconds added per block by {@link MockVault.advance}. */
export const BLOCK_TIME_SEC = 12;

export class MockVault {
  readonly pool: EclpPool;

  private _balances: [bigint, bigint] = [0n, 0n];
  private shares = new Map<string, bigint>();
  private _totalSupply = 0n;

  blockNumber = 1;
  timestamp = 1_700_000_000;
  lastChangeBlock = 0;
  paused = false;

  constructor(pool: EclpPool) {
    this.pool = pool;
  }

  get balances(): TokenAmounts {
    return [this._balances[0], this._balances[1]];
  }

  get totalSupply(): bigint {
    return this._totalSupply;
  }

  balanceOf(address: string): bigint {
    return this.shares.get(address) ?? 0n;
  }

  context(): BlockContext {
    return {
      blockNumber: this.blockNumber,
      timestamp: this.timestamp,
      lastChangeBlock: this.lastChangeBlock,
      paused: this.paused,
    };
  }

  /** Move to a later block. */
  advance(blocks: number = 1, seconds: number = blocks * BLOCK_TIME_SEC): void {
    this.blockNumber += blocks;
    this.timestamp += seconds;
  }

  setPaused(paused: boolean): void {
    this.paused = paused;
  }

  initialize(recipient: string, amounts: TokenAmounts): JoinResult {
    if (this._totalSupply !== 0n) throw new Error('MockVault: pool already has supply');
    const result = this.pool.onInitialJoin({
      recipient,
      payload: { kind: JoinKind.INIT, amountsIn: amounts },
      context: this.context(),
    });
    this.addBalances(result.amountsIn);
    this.mint(recipient, result.sharesOut);
    this.lastChangeBlock = this.blockNumber;
    return result;
  }

  swap(request: SwapRequest): SwapResult {
    const result = this.pool.onSwap(request, this.balances, this.context());
    const [token0] = this.pool.tokens;
    const inIndex = request.tokenIn === token0.address ? 0 : 1;
    const outIndex = 1 - inIndex;

    const amountIn = request.kind === TradeType.EXACT_IN ? request.amount : result.amount;
    const amountOut = request.kind === TradeType.EXACT_IN ? result.amount : request.amount;
    this._balances[inIndex] += amountIn;
    this._balances[outIndex] -= amountOut;
    this.lastChangeBlock = this.blockNumber;
    return result;
  }

  join(recipient: string, sharesOut: bigint, protocolFees: ProtocolFeeConfig): JoinResult {
    const result = this.pool.onJoin({
      recipient,
      recipientBalance: this.balanceOf(recipient),
      balances: this.balances,
      totalSupply: this._totalSupply,
      payload: { kind: JoinKind.ALL_TOKENS_IN_FOR_EXACT_SHARES_OUT, sharesOut },
      protocolFees,
      context: this.context(),
    });
    if (result.protocolFees) this.mintFees(result.protocolFees);
    this.addBalances(result.amountsIn);
    this.mint(recipient, result.sharesOut);
    this.lastChangeBlock = this.blockNumber;
    return result;
  }

  exit(sender: string, sharesIn: bigint, protocolFees: ProtocolFeeConfig): ExitResult {
    if (this.balanceOf(sender) < sharesIn) {
      throw new Error(`MockVault: ${sender} holds fewer than ${sharesIn} shares`);
    }
    const result = this.pool.onExit({
      sender,
      balances: this.balances,
      totalSupply: this._totalSupply,
      payload: { kind: ExitKind.EXACT_SHARES_IN_FOR_TOKENS_OUT, sharesIn },
      protocolFees,
      context: this.context(),
    });
    if (result.protocolFees) this.mintFees(result.protocolFees);
    this._balances[0] -= result.amountsOut[0];
    this._balances[1] -= result.amountsOut[1];
    this.burn(sender, result.sharesIn);
    this.lastChangeBlock = this.blockNumber;
    return result;
  }

  private addBalances(amounts: TokenAmounts): void {
    this._balances[0] += amounts[0];
    this._balances[1] += amounts[1];
  }

  private mintFees(fees: ProtocolFeeShares): void {
    if (fees.gyroShares > 0n) this.mint(fees.gyroTreasury, fees.gyroShares);
    if (fees.protocolShares > 0n) this.mint(fees.protocolTreasury, fees.protocolShares);
  }

  private mint(address: string, amount: bigint): void {
    this.shares.set(address, this.balanceOf(address) + amount);
    this._totalSupply += amount;
  }

  private burn(address: string, amount: bigint): void {
    this.shares.set(address, this.balanceOf(address) - amount);
    this._totalSupply -= amount;
  }
}
