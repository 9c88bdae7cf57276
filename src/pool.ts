import { EclpPoolConfig, ResolvedPoolConfig, DEFAULTS, LIMITS } from './config';
import { BlockContext, Logger, TokenAmounts } from './types/common';
import { CurveParams, DerivedParams, MathEngine } from './types/curve';
import { PoolEvent } from './types/events';
import { ExitRequest, ExitResult, InitialJoinRequest, JoinRequest, JoinResult } from './types/liquidity';
import { OracleAverageQuery, OracleSample, OracleUpdate, OracleVariable } from './types/oracle';
import { LastInvariant, PoolState, PoolToken } from './types/pool';
import { SwapRequest, SwapResult } from './types/swap';
import { ValidationError, mapError } from './errors';
import { deriveParams, eclpMath } from './math/eclp';
import { InvariantModule } from './modules/invariant';
import { FeeModule } from './modules/fees';
import { OracleModule } from './modules/oracle';
import { SwapModule } from './modules/swap';
import { LiquidityModule } from './modules/liquidity';
import { isValidContractId, sortTokens, truncateAddress } from './utils/addresses';
import { divDown, scalingFactor, upscale } from './utils/math';
import { validateNonNegativeAmount, validatePositiveAmount } from './utils/validation';

/**
 * Main entry point for the E-CLP pool.
 *
 * Owns the state the pool is responsible for (last invariant, oracle
 * samples) and exposes the four vault-facing actions. Balances, share
 * supply and block metadata come from the vault with every call; the pool
 * answers with the amounts to move, rounded in its own favour.
 *
 * Actions are synchronous: each runs to completion, commits its writes
 * only after every check has passed, and leaves state untouched on error.
 */
export class EclpPool {
  readonly config: ResolvedPoolConfig;
  readonly tokens: readonly [PoolToken, PoolToken];
  readonly params: CurveParams;
  readonly derived: DerivedParams;
  readonly math: MathEngine;
  readonly scalingFactors: TokenAmounts;

  readonly invariant: InvariantModule;
  readonly fees: FeeModule;
  readonly oracle: OracleModule;

  private _swap: SwapModule | null = null;
  private _liquidity: LiquidityModule | null = null;

  constructor(config: EclpPoolConfig) {
    this.config = {
      ...config,
      oracleEnabled: config.oracleEnabled ?? DEFAULTS.oracleEnabled,
      oracleBufferSize: config.oracleBufferSize ?? DEFAULTS.oracleBufferSize,
      maxSampleDurationSec: config.maxSampleDurationSec ?? DEFAULTS.maxSampleDurationSec,
      cap: config.cap ?? { ...DEFAULTS.cap },
    };

    this.tokens = EclpPool.orderTokens(config.tokens);
    this.scalingFactors = [
      scalingFactor(this.tokens[0].decimals),
      scalingFactor(this.tokens[1].decimals),
    ];
    EclpPool.validateSettings(this.config);

    this.math = config.math ?? eclpMath;
    this.params = Object.freeze({ ...config.params });
    this.math.validateParams(this.params);
    this.derived = config.derived
      ? Object.freeze({
          ...config.derived,
          tauAlpha: Object.freeze({ ...config.derived.tauAlpha }),
          tauBeta: Object.freeze({ ...config.derived.tauBeta }),
        })
      : deriveParams(this.params);
    this.math.validateDerivedParamsLimits(this.params, this.derived);

    this.invariant = new InvariantModule();
    this.fees = new FeeModule(this);
    this.oracle = new OracleModule(this);

    this.logger?.info('EclpPool: configured', {
      token0: truncateAddress(this.tokens[0].address),
      token1: truncateAddress(this.tokens[1].address),
      swapFeePercentage: this.config.swapFeePercentage.toString(),
      oracleEnabled: this.config.oracleEnabled,
    });
  }

  get logger(): Logger | undefined {
    return this.config.logger;
  }

  /**
   * Access the swap module (singleton).
   */
  get swap(): SwapModule {
    if (!this._swap) this._swap = new SwapModule(this);
    return this._swap;
  }

  /**
   * Access the liquidity module (singleton).
   */
  get liquidity(): LiquidityModule {
    if (!this._liquidity) this._liquidity = new LiquidityModule(this);
    return this._liquidity;
  }

  onSwap(request: SwapRequest, balances: TokenAmounts, context: BlockContext): SwapResult {
    return this.run('onSwap', () => this.swap.execute(request, balances, context));
  }

  onInitialJoin(request: InitialJoinRequest): JoinResult {
    return this.run('onInitialJoin', () => this.liquidity.initialJoin(request));
  }

  onJoin(request: JoinRequest): JoinResult {
    return this.run('onJoin', () => this.liquidity.join(request));
  }

  onExit(request: ExitRequest): ExitResult {
    return this.run('onExit', () => this.liquidity.exit(request));
  }

  getLastInvariant(): LastInvariant {
    return this.invariant.current;
  }

  /**
   * Snapshot of the state the pool owns.
   */
  getState(): PoolState {
    return {
      tokens: this.tokens,
      lastInvariant: this.invariant.current,
      oracle: this.oracle.getState(),
      oracleEnabled: this.config.oracleEnabled,
      swapFeePercentage: this.config.swapFeePercentage,
      cap: { ...this.config.cap },
    };
  }

  /**
   * Spot price of token 0 in token 1 at raw balances (18 decimals).
   */
  getSpotPrice(balances: TokenAmounts): bigint {
    return this.run('getSpotPrice', () => {
      const scaled = this.scale(balances);
      const invariant = this.math.calculateInvariant(scaled, this.params, this.derived);
      return this.math.calculatePrice(scaled, this.params, this.derived, invariant);
    });
  }

  /**
   * Invariant per share at raw balances (18 decimals, rounded down).
   */
  getInvariantDivSupply(balances: TokenAmounts, totalSupply: bigint): bigint {
    return this.run('getInvariantDivSupply', () => {
      validatePositiveAmount(totalSupply, 'totalSupply');
      const invariant = this.math.calculateInvariant(this.scale(balances), this.params, this.derived);
      return divDown(invariant, totalSupply);
    });
  }

  getOracleSample(index: number): OracleSample {
    return this.oracle.getSample(index);
  }

  getLatest(variable: OracleVariable): bigint {
    return this.oracle.getLatest(variable);
  }

  getPastAccumulator(variable: OracleVariable, ago: number, now: number): number {
    return this.oracle.getPastAccumulator(variable, ago, now);
  }

  getTimeWeightedAverage(queries: readonly OracleAverageQuery[], now: number): bigint[] {
    return this.oracle.getTimeWeightedAverage(queries, now);
  }

  /**
   * Deliver an event to the configured listener. Listener failures are
   * logged; the action has already committed.
   */
  emit(event: PoolEvent): void {
    if (!this.config.onEvent) return;
    try {
      this.config.onEvent(event);
    } catch (err) {
      this.logger?.error(`EclpPool: ${event.type} listener failed`, err);
    }
  }

  emitOracleSample(update: OracleUpdate, context: BlockContext): void {
    this.emit({
      type: 'oracle_sample',
      blockNumber: context.blockNumber,
      timestamp: context.timestamp,
      index: update.index,
      sample: update.sample,
    });
  }

  private scale(balances: TokenAmounts): TokenAmounts {
    return [
      upscale(balances[0], this.scalingFactors[0]),
      upscale(balances[1], this.scalingFactors[1]),
    ];
  }

  private run<T>(action: string, fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      const mapped = mapError(err);
      this.logger?.error(`EclpPool: ${action} failed`, mapped);
      throw mapped;
    }
  }

  private static orderTokens(tokens: readonly [PoolToken, PoolToken]): readonly [PoolToken, PoolToken] {
    for (const token of tokens) {
      if (!isValidContractId(token.address)) {
        throw new ValidationError(`Invalid token address: ${token.address}`, {
          address: token.address,
        });
      }
      if (
        !Number.isInteger(token.decimals) ||
        token.decimals < 0 ||
        token.decimals > LIMITS.MAX_TOKEN_DECIMALS
      ) {
        throw new ValidationError(`Invalid token decimals: ${token.decimals}`, {
          address: token.address,
          decimals: token.decimals,
        });
      }
    }
    const [a, b] = tokens;
    if (a.address === b.address) {
      throw new ValidationError('Identical tokens', { address: a.address });
    }
    const [address0] = sortTokens(a.address, b.address);
    const ordered: readonly [PoolToken, PoolToken] = address0 === a.address ? [a, b] : [b, a];
    return Object.freeze(ordered);
  }

  private static validateSettings(config: ResolvedPoolConfig): void {
    const fee = config.swapFeePercentage;
    if (fee < LIMITS.MIN_SWAP_FEE || fee > LIMITS.MAX_SWAP_FEE) {
      throw new ValidationError('Swap fee out of range', {
        swapFeePercentage: fee.toString(),
        min: LIMITS.MIN_SWAP_FEE.toString(),
        max: LIMITS.MAX_SWAP_FEE.toString(),
      });
    }
    if (!Number.isInteger(config.oracleBufferSize) || config.oracleBufferSize < 2) {
      throw new ValidationError('Oracle buffer must hold at least two samples');
    }
    if (config.maxSampleDurationSec <= 0) {
      throw new ValidationError('Max sample duration must be positive');
    }
    if (config.cap.enabled) {
      validateNonNegativeAmount(config.cap.perAddressCap, 'cap.perAddressCap');
      validateNonNegativeAmount(config.cap.globalCap, 'cap.globalCap');
    }
  }
}
