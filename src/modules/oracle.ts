import type { EclpPool } from '../pool';
import { BlockContext, TokenAmounts } from '../types/common';
import {
  OracleAverageQuery,
  OracleSample,
  OracleState,
  OracleUpdate,
  OracleVariable,
} from '../types/oracle';
import { OracleQueryError } from '../errors';
import {
  fromLowResLog,
  logInvariantDivSupply,
  logSpotPrice,
  toLowResLog,
} from '../math/log';

const EMPTY_SAMPLE: OracleSample = Object.freeze({
  logPairPrice: 0,
  accLogPairPrice: 0,
  logInvariantPerShare: 0,
  accLogInvariantPerShare: 0,
  logInvariant: 0,
  accLogInvariant: 0,
  timestamp: 0,
});

function instantOf(sample: OracleSample, variable: OracleVariable): number {
  switch (variable) {
    case OracleVariable.PAIR_PRICE:
      return sample.logPairPrice;
    case OracleVariable.INVARIANT_PER_SHARE:
      return sample.logInvariantPerShare;
    case OracleVariable.INVARIANT:
      return sample.logInvariant;
  }
}

function accumulatorOf(sample: OracleSample, variable: OracleVariable): number {
  switch (variable) {
    case OracleVariable.PAIR_PRICE:
      return sample.accLogPairPrice;
    case OracleVariable.INVARIANT_PER_SHARE:
      return sample.accLogInvariantPerShare;
    case OracleVariable.INVARIANT:
      return sample.accLogInvariant;
  }
}

/**
 * Oracle module -- time-weighted price and invariant samples.
 *
 * Samples live in a fixed-size ring buffer. Each gated update folds the
 * instant values into the current sample's accumulators; once the current
 * sample is older than the maximum sample duration the update starts the
 * next slot instead. Updates are prepared without side effects and only
 * applied with {@link OracleModule.commit} once the surrounding action has
 * succeeded.
 */
export class OracleModule {
  private pool: EclpPool;
  private samples: OracleSample[];
  private state: OracleState = {
    index: 0,
    sampleCreationTimestamp: 0,
    logInvariant: 0,
    logTotalSupply: 0,
  };

  constructor(pool: EclpPool) {
    this.pool = pool;
    this.samples = new Array<OracleSample>(pool.config.oracleBufferSize).fill(EMPTY_SAMPLE);
  }

  /** Snapshot of the oracle bookkeeping. */
  getState(): OracleState {
    return { ...this.state };
  }

  /**
   * Build the sample write for an action, or null when the oracle is
   * disabled or the balances already changed in this block.
   *
   * @param balances - Normalized pre-action balances
   * @param invariant - Point invariant of those balances
   */
  prepareUpdate(
    context: BlockContext,
    balances: TokenAmounts,
    invariant: bigint,
  ): OracleUpdate | null {
    if (!this.pool.config.oracleEnabled) return null;
    if (context.blockNumber <= context.lastChangeBlock) return null;

    const price = this.pool.math.calculatePrice(
      balances,
      this.pool.params,
      this.pool.derived,
      invariant,
    );
    const logPairPrice = logSpotPrice(price);
    const logInvariantPerShare = logInvariantDivSupply(invariant, this.state.logTotalSupply);
    const logInvariant = toLowResLog(invariant);

    const now = context.timestamp;
    const current = this.samples[this.state.index];
    const elapsed = current.timestamp === 0 ? 0 : now - current.timestamp;
    const sample: OracleSample = {
      logPairPrice,
      accLogPairPrice: current.accLogPairPrice + logPairPrice * elapsed,
      logInvariantPerShare,
      accLogInvariantPerShare: current.accLogInvariantPerShare + logInvariantPerShare * elapsed,
      logInvariant,
      accLogInvariant: current.accLogInvariant + logInvariant * elapsed,
      timestamp: now,
    };

    if (current.timestamp === 0) {
      return { index: this.state.index, sample, sampleCreationTimestamp: now };
    }
    if (now - this.state.sampleCreationTimestamp >= this.pool.config.maxSampleDurationSec) {
      return {
        index: (this.state.index + 1) % this.samples.length,
        sample,
        sampleCreationTimestamp: now,
      };
    }
    return { index: this.state.index, sample };
  }

  /** Apply a prepared update. */
  commit(update: OracleUpdate): void {
    this.samples[update.index] = update.sample;
    if (update.sampleCreationTimestamp !== undefined) {
      this.state.index = update.index;
      this.state.sampleCreationTimestamp = update.sampleCreationTimestamp;
    }
  }

  /**
   * Compressed logs of the invariant and share supply after a liquidity
   * event, computed ahead of the commit.
   */
  prepareCache(invariant: bigint, totalSupply: bigint): Pick<OracleState, 'logInvariant' | 'logTotalSupply'> | null {
    if (!this.pool.config.oracleEnabled) return null;
    if (invariant <= 0n || totalSupply <= 0n) return null;
    return {
      logInvariant: toLowResLog(invariant),
      logTotalSupply: toLowResLog(totalSupply),
    };
  }

  commitCache(cache: Pick<OracleState, 'logInvariant' | 'logTotalSupply'>): void {
    this.state.logInvariant = cache.logInvariant;
    this.state.logTotalSupply = cache.logTotalSupply;
  }

  getSample(index: number): OracleSample {
    if (!Number.isInteger(index) || index < 0 || index >= this.samples.length) {
      throw new OracleQueryError(`Sample index out of range: ${index}`, { index });
    }
    return this.samples[index];
  }

  /**
   * Latest instant value of a variable, decompressed (18 decimals).
   */
  getLatest(variable: OracleVariable): bigint {
    return fromLowResLog(instantOf(this.latestSample(), variable));
  }

  /**
   * Accumulator value of a variable `ago` seconds before `now`,
   * interpolated between the surrounding samples or extrapolated past
   * the latest one.
   */
  getPastAccumulator(variable: OracleVariable, ago: number, now: number): number {
    const latest = this.latestSample();
    const lookUpTime = now - ago;

    if (latest.timestamp <= lookUpTime) {
      const elapsed = lookUpTime - latest.timestamp;
      return accumulatorOf(latest, variable) + instantOf(latest, variable) * elapsed;
    }

    let oldestIndex = (this.state.index + 1) % this.samples.length;
    let length = this.samples.length;
    if (this.samples[oldestIndex].timestamp === 0) {
      // Buffer not yet wrapped.
      oldestIndex = 0;
      length = this.state.index + 1;
    }
    const oldest = this.samples[oldestIndex];
    if (oldest.timestamp > lookUpTime) {
      throw new OracleQueryError('Query window older than the oldest sample', {
        lookUpTime,
        oldestTimestamp: oldest.timestamp,
      });
    }

    const [prev, next] = this.findNearestSample(lookUpTime, oldestIndex, length);
    const prevAcc = accumulatorOf(prev, variable);
    if (next.timestamp <= prev.timestamp) return prevAcc;

    const elapsed = lookUpTime - prev.timestamp;
    const span = next.timestamp - prev.timestamp;
    return prevAcc + Math.trunc(((accumulatorOf(next, variable) - prevAcc) * elapsed) / span);
  }

  /**
   * Time-weighted averages over the requested windows (18 decimals).
   */
  getTimeWeightedAverage(queries: readonly OracleAverageQuery[], now: number): bigint[] {
    return queries.map((query) => {
      if (query.secs <= 0) {
        throw new OracleQueryError('Query window must be positive', { secs: query.secs });
      }
      const begin = this.getPastAccumulator(query.variable, query.ago + query.secs, now);
      const end = this.getPastAccumulator(query.variable, query.ago, now);
      return fromLowResLog(Math.trunc((end - begin) / query.secs));
    });
  }

  private latestSample(): OracleSample {
    const latest = this.samples[this.state.index];
    if (latest.timestamp === 0) {
      throw new OracleQueryError('Oracle not initialized');
    }
    return latest;
  }

  /**
   * Binary search over the `length` samples starting at `offset` for the
   * pair bracketing `lookUpTime`.
   */
  private findNearestSample(
    lookUpTime: number,
    offset: number,
    length: number,
  ): [OracleSample, OracleSample] {
    const size = this.samples.length;
    let low = 0;
    let high = length - 1;
    let mid = offset;
    let sample = this.samples[offset];

    while (low <= high) {
      const midWithoutOffset = Math.floor((low + high) / 2);
      mid = (midWithoutOffset + offset) % size;
      sample = this.samples[mid];

      if (sample.timestamp < lookUpTime) {
        low = midWithoutOffset + 1;
      } else if (sample.timestamp > lookUpTime) {
        high = midWithoutOffset - 1;
      } else {
        return [sample, sample];
      }
    }

    return sample.timestamp < lookUpTime
      ? [sample, this.samples[(mid + 1) % size]]
      : [this.samples[(mid - 1 + size) % size], sample];
  }
}
