import type { EclpPool } from '../pool';
import { BlockContext, TokenAmounts } from '../types/common';
import { ProtocolFeeConfig, ProtocolFeeShares } from '../types/fee';
import {
  ExitKind,
  ExitRequest,
  ExitResult,
  InitialJoinRequest,
  JoinKind,
  JoinRequest,
  JoinResult,
} from '../types/liquidity';
import { OracleState, OracleUpdate } from '../types/oracle';
import {
  CapExceededError,
  LengthMismatchError,
  PoolPausedError,
  UnsupportedExitKindError,
  UnsupportedJoinKindError,
  ValidationError,
} from '../errors';
import { FeeModule } from './fees';
import {
  invariantAfterExit,
  invariantAfterJoin,
  proportionalAmountsIn,
  proportionalAmountsOut,
} from '../math/pool-math';
import { downscaleDown, downscaleUp, upscale } from '../utils/math';
import {
  validateAddress,
  validateNonNegativeAmount,
  validatePositiveAmount,
} from '../utils/validation';

type OracleCache = Pick<OracleState, 'logInvariant' | 'logTotalSupply'>;

interface FeeStep {
  invariantBefore: bigint;
  oracleUpdate: OracleUpdate | null;
  fees: ProtocolFeeShares;
  /** Supply after the fee shares are minted. */
  supply: bigint;
}

/**
 * Liquidity module -- initial join, proportional joins and exits.
 *
 * Before any join or exit the pool charges protocol fees on the invariant
 * growth since the last liquidity event, then records the invariant the
 * pool will hold afterwards so the next action can measure growth again.
 */
export class LiquidityModule {
  private pool: EclpPool;
  private initialized = false;

  constructor(pool: EclpPool) {
    this.pool = pool;
  }

  /**
   * Seed an empty pool. Mints twice the invariant of the deposited amounts.
   */
  initialJoin(request: InitialJoinRequest): JoinResult {
    const { context, payload } = request;
    if (context.paused) throw new PoolPausedError('join');
    if (this.initialized) {
      throw new ValidationError('Pool already initialized');
    }
    if (payload.kind !== JoinKind.INIT) throw new UnsupportedJoinKindError(payload.kind);
    validateAddress(request.recipient, 'recipient');
    if (payload.amountsIn.length !== 2) {
      throw new LengthMismatchError(2, payload.amountsIn.length);
    }

    const amountsIn: TokenAmounts = [payload.amountsIn[0], payload.amountsIn[1]];
    validatePositiveAmount(amountsIn[0], 'amountsIn[0]');
    validatePositiveAmount(amountsIn[1], 'amountsIn[1]');

    const { math, params, derived, scalingFactors } = this.pool;
    const scaled: TokenAmounts = [
      upscale(amountsIn[0], scalingFactors[0]),
      upscale(amountsIn[1], scalingFactors[1]),
    ];
    const invariant = math.calculateInvariant(scaled, params, derived);
    const sharesOut = invariant * 2n;
    validatePositiveAmount(sharesOut, 'sharesOut');
    const cache = this.pool.oracle.prepareCache(invariant, sharesOut);

    this.initialized = true;
    this.pool.invariant.setKnown(invariant);
    if (cache) this.pool.oracle.commitCache(cache);

    this.pool.logger?.info('liquidity: pool initialized', {
      invariant: invariant.toString(),
      sharesOut: sharesOut.toString(),
    });
    this.pool.emit({
      type: 'join',
      blockNumber: context.blockNumber,
      timestamp: context.timestamp,
      recipient: request.recipient,
      amountsIn,
      sharesOut,
      invariant,
    });

    return { sharesOut, amountsIn, protocolFees: null };
  }

  /**
   * Proportional join for an exact number of shares.
   */
  join(request: JoinRequest): JoinResult {
    const { context, payload } = request;
    if (context.paused) throw new PoolPausedError('join');
    validateAddress(request.recipient, 'recipient');
    validatePositiveAmount(request.totalSupply, 'totalSupply');
    validateNonNegativeAmount(request.recipientBalance, 'recipientBalance');

    const scaled = this.scale(request.balances);
    const step = this.chargeFees(scaled, request.totalSupply, request.protocolFees, context);

    if (payload.kind !== JoinKind.ALL_TOKENS_IN_FOR_EXACT_SHARES_OUT) {
      throw new UnsupportedJoinKindError(payload.kind);
    }
    const { sharesOut } = payload;
    validatePositiveAmount(sharesOut, 'sharesOut');

    const scaledIn = proportionalAmountsIn(scaled, sharesOut, step.supply);
    const amountsIn: TokenAmounts = [
      downscaleUp(scaledIn[0], this.pool.scalingFactors[0]),
      downscaleUp(scaledIn[1], this.pool.scalingFactors[1]),
    ];

    this.enforceCap(request.recipientBalance, step.supply, sharesOut);

    const newInvariant = invariantAfterJoin(step.invariantBefore, sharesOut, step.supply);
    const cache = this.pool.oracle.prepareCache(newInvariant, step.supply + sharesOut);

    this.commit(newInvariant, step.oracleUpdate, cache);

    this.pool.logger?.debug('liquidity: join', {
      sharesOut: sharesOut.toString(),
      amountsIn: amountsIn.map(String),
      invariant: newInvariant.toString(),
    });
    this.emitFeeEvents(step, context);
    this.pool.emit({
      type: 'join',
      blockNumber: context.blockNumber,
      timestamp: context.timestamp,
      recipient: request.recipient,
      amountsIn,
      sharesOut,
      invariant: newInvariant,
    });

    return { sharesOut, amountsIn, protocolFees: step.fees };
  }

  /**
   * Proportional exit for an exact number of shares. Stays available while
   * the pool is paused, in which case no invariant is computed and the
   * last invariant becomes unknown.
   */
  exit(request: ExitRequest): ExitResult {
    const { context, payload } = request;
    validateAddress(request.sender, 'sender');
    validatePositiveAmount(request.totalSupply, 'totalSupply');

    const scaled = this.scale(request.balances);
    const step = context.paused
      ? null
      : this.chargeFees(scaled, request.totalSupply, request.protocolFees, context);
    const supply = step ? step.supply : request.totalSupply;

    if (payload.kind !== ExitKind.EXACT_SHARES_IN_FOR_TOKENS_OUT) {
      throw new UnsupportedExitKindError(payload.kind);
    }
    const { sharesIn } = payload;
    validatePositiveAmount(sharesIn, 'sharesIn');
    if (sharesIn > request.totalSupply) {
      throw new ValidationError('sharesIn exceeds total supply', {
        sharesIn: sharesIn.toString(),
        totalSupply: request.totalSupply.toString(),
      });
    }

    const scaledOut = proportionalAmountsOut(scaled, sharesIn, supply);
    const amountsOut: TokenAmounts = [
      downscaleDown(scaledOut[0], this.pool.scalingFactors[0]),
      downscaleDown(scaledOut[1], this.pool.scalingFactors[1]),
    ];

    let newInvariant: bigint | null = null;
    if (step) {
      newInvariant = invariantAfterExit(step.invariantBefore, sharesIn, step.supply);
      const cache = this.pool.oracle.prepareCache(newInvariant, step.supply - sharesIn);
      this.commit(newInvariant, step.oracleUpdate, cache);
      this.emitFeeEvents(step, context);
    } else {
      this.pool.invariant.invalidate();
      this.pool.logger?.debug('liquidity: paused exit, last invariant unknown');
    }

    this.pool.logger?.debug('liquidity: exit', {
      sharesIn: sharesIn.toString(),
      amountsOut: amountsOut.map(String),
      invariant: newInvariant === null ? null : newInvariant.toString(),
    });
    this.pool.emit({
      type: 'exit',
      blockNumber: context.blockNumber,
      timestamp: context.timestamp,
      sender: request.sender,
      amountsOut,
      sharesIn,
      invariant: newInvariant,
    });

    return { sharesIn, amountsOut, protocolFees: step ? step.fees : null };
  }

  private scale(balances: TokenAmounts): TokenAmounts {
    const { scalingFactors } = this.pool;
    return [upscale(balances[0], scalingFactors[0]), upscale(balances[1], scalingFactors[1])];
  }

  /**
   * Invariant before the action, its oracle sample, and the protocol fee
   * shares owed against the last invariant.
   */
  private chargeFees(
    scaled: TokenAmounts,
    totalSupply: bigint,
    config: ProtocolFeeConfig,
    context: BlockContext,
  ): FeeStep {
    const { math, params, derived } = this.pool;
    const invariantBefore = math.calculateInvariantWithError(scaled, params, derived).invariant;
    const oracleUpdate = this.pool.oracle.prepareUpdate(context, scaled, invariantBefore);
    const fees = this.pool.fees.calculate(
      this.pool.invariant.current,
      invariantBefore,
      totalSupply,
      config,
    );
    return {
      invariantBefore,
      oracleUpdate,
      fees,
      supply: totalSupply + FeeModule.totalShares(fees),
    };
  }

  private enforceCap(recipientBalance: bigint, supply: bigint, sharesOut: bigint): void {
    const { cap } = this.pool.config;
    if (!cap.enabled) return;
    if (recipientBalance + sharesOut > cap.perAddressCap) {
      throw new CapExceededError('perAddress', cap.perAddressCap, recipientBalance + sharesOut);
    }
    if (supply + sharesOut > cap.globalCap) {
      throw new CapExceededError('global', cap.globalCap, supply + sharesOut);
    }
  }

  private commit(
    invariant: bigint,
    oracleUpdate: OracleUpdate | null,
    cache: OracleCache | null,
  ): void {
    this.pool.invariant.setKnown(invariant);
    if (oracleUpdate) this.pool.oracle.commit(oracleUpdate);
    if (cache) this.pool.oracle.commitCache(cache);
  }

  private emitFeeEvents(step: FeeStep, context: BlockContext): void {
    if (step.oracleUpdate) this.pool.emitOracleSample(step.oracleUpdate, context);
    if (FeeModule.totalShares(step.fees) > 0n) {
      this.pool.emit({
        type: 'protocol_fee',
        blockNumber: context.blockNumber,
        timestamp: context.timestamp,
        gyroTreasury: step.fees.gyroTreasury,
        gyroShares: step.fees.gyroShares,
        protocolTreasury: step.fees.protocolTreasury,
        protocolShares: step.fees.protocolShares,
      });
    }
  }
}
