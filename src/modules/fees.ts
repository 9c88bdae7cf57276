import type { EclpPool } from '../pool';
import { ProtocolFeeConfig, ProtocolFeeShares } from '../types/fee';
import { InvariantStatus, LastInvariant } from '../types/pool';
import { calcProtocolFees } from '../math/pool-math';
import { validateFeeConfig, validatePositiveAmount } from '../utils/validation';

/**
 * Fee module -- protocol fee accounting.
 *
 * Converts invariant growth since the last liquidity event into pool
 * shares owed to the two fee beneficiaries. Fees are paid by minting
 * shares, which leaves the invariant unchanged.
 */
export class FeeModule {
  private pool: EclpPool;

  constructor(pool: EclpPool) {
    this.pool = pool;
  }

  /**
   * Protocol fee shares owed before a liquidity action.
   *
   * @param lastInvariant - Invariant recorded at the previous liquidity event
   * @param invariantBefore - Invariant of the balances before this action
   * @param totalSupply - Share supply before fee shares are minted
   * @param config - Fee configuration read for this action
   * @example
   * const shares = pool.fees.calculate(pool.getLastInvariant(), 1050n * 10n ** 18n, supply, feeConfig);
   */
  calculate(
    lastInvariant: LastInvariant,
    invariantBefore: bigint,
    totalSupply: bigint,
    config: ProtocolFeeConfig,
  ): ProtocolFeeShares {
    validateFeeConfig(config);
    validatePositiveAmount(totalSupply, 'totalSupply');

    const none: ProtocolFeeShares = {
      gyroShares: 0n,
      protocolShares: 0n,
      gyroTreasury: config.gyroTreasury,
      protocolTreasury: config.protocolTreasury,
    };

    if (config.protocolFeePercentage === 0n) return none;
    if (lastInvariant.status === InvariantStatus.UNKNOWN) {
      this.pool.logger?.debug('fees: last invariant unknown, no fees charged');
      return none;
    }

    const { gyroShares, protocolShares } = calcProtocolFees(
      lastInvariant.value,
      invariantBefore,
      totalSupply,
      config.protocolFeePercentage,
      config.gyroPortion,
    );

    this.pool.logger?.debug('fees: protocol fee shares', {
      previousInvariant: lastInvariant.value.toString(),
      invariantBefore: invariantBefore.toString(),
      gyroShares: gyroShares.toString(),
      protocolShares: protocolShares.toString(),
    });

    return { ...none, gyroShares, protocolShares };
  }

  /** Total shares minted for a fee result. */
  static totalShares(shares: ProtocolFeeShares): bigint {
    return shares.gyroShares + shares.protocolShares;
  }
}
