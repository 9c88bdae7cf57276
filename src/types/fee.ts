/**
 * Protocol fee configuration, read fresh for every liquidity action.
 */
export interface ProtocolFeeConfig {
  /** Share of invariant growth taken as protocol fee (18 decimals). */
  protocolFeePercentage: bigint;
  /** Portion of the protocol fee paid to the gyro treasury (18 decimals). */
  gyroPortion: bigint;
  /** Recipient of the gyro portion. */
  gyroTreasury: string;
  /** Recipient of the remainder. */
  protocolTreasury: string;
}

/**
 * Protocol fee shares owed for one action.
 */
export interface ProtocolFeeShares {
  /** Shares minted to the gyro treasury. */
  gyroShares: bigint;
  /** Shares minted to the protocol treasury. */
  protocolShares: bigint;
  /** Recipient of `gyroShares`. */
  gyroTreasury: string;
  /** Recipient of `protocolShares`. */
  protocolTreasury: string;
}
