import { Logger } from './types/common';
import { CurveParams, DerivedParams, MathEngine } from './types/curve';
import { PoolEvent } from './types/events';
import { CapConfig, PoolToken } from './types/pool';

/**
 * Pool configuration.
 */
export interface EclpPoolConfig {
  /** The two pool tokens, in any order; the pool sorts them by address */
  tokens: readonly [PoolToken, PoolToken];
  /** Curve parameters (18 decimals) */
  params: CurveParams;
  /** Precomputed derived parameters; computed from `params` when omitted */
  derived?: DerivedParams;
  /** Swap fee percentage (18 decimals) */
  swapFeePercentage: bigint;
  /** Record oracle samples */
  oracleEnabled?: boolean;
  /** Number of oracle ring-buffer slots */
  oracleBufferSize?: number;
  /** Age in seconds after which the oracle starts a new sample */
  maxSampleDurationSec?: number;
  /** Liquidity cap; disabled when omitted */
  cap?: CapConfig;
  /** Math engine override; defaults to the exact-integer E-CLP engine */
  math?: MathEngine;
  /** Optional logger for action instrumentation. */
  logger?: Logger;
  /** Listener receiving pool events after each committed action. */
  onEvent?: (event: PoolEvent) => void;
}

/**
 * Configuration with every default applied.
 */
export type ResolvedPoolConfig = EclpPoolConfig & {
  oracleEnabled: boolean;
  oracleBufferSize: number;
  maxSampleDurationSec: number;
  cap: CapConfig;
};

/**
 * Default pool configuration values.
 */
export const DEFAULTS = {
  oracleEnabled: false,
  oracleBufferSize: 1024,
  maxSampleDurationSec: 120,
  cap: {
    enabled: false,
    perAddressCap: 0n,
    globalCap: 0n,
  },
} as const;

/**
 * Bounds enforced on configuration.
 */
export const LIMITS = {
  /** 0.0001% */
  MIN_SWAP_FEE: 10n ** 12n,
  /** 10% */
  MAX_SWAP_FEE: 10n ** 17n,
  MAX_TOKEN_DECIMALS: 18,
} as const;

/**
 * Precision constants for the curve math.
 */
export const PRECISION = {
  /** Decimal places kept by compressed oracle logs. */
  LOG_COMPRESSION: 1e4,
  /** Tolerance on |(c, s)| − 1 (18 decimals). */
  ROTATION_NORM_ERROR: 10n ** 3n,
  /** Tolerance on derived quantities (38 decimals). */
  DERIVED_ERROR: 10n ** 23n,
  MAX_LAMBDA: 10n ** 8n * 10n ** 18n,
  /** Upper bound on ONE_XP² / (AχAχ − ONE_XP). */
  MAX_INV_INVARIANT_DENOMINATOR: 10n ** 43n,
} as const;
