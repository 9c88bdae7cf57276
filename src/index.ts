// Pool
export { EclpPool } from './pool';

// Configuration
export { EclpPoolConfig, ResolvedPoolConfig, DEFAULTS, LIMITS, PRECISION } from './config';

// Modules
export { InvariantModule } from './modules/invariant';
export { FeeModule } from './modules/fees';
export { OracleModule } from './modules/oracle';
export { SwapModule } from './modules/swap';
export { LiquidityModule } from './modules/liquidity';

// Math
export {
  EclpMath,
  eclpMath,
  deriveParams,
  computeChi,
  calcXGivenY,
  calcYGivenX,
  calculateInvariantWithError,
  calculatePrice,
  invariantBracket,
  maxBalances,
} from './math/eclp';
export {
  calcProtocolFees,
  invariantAfterExit,
  invariantAfterJoin,
  proportionalAmountsIn,
  proportionalAmountsOut,
} from './math/pool-math';
export { toLowResLog, fromLowResLog, logSpotPrice, logInvariantDivSupply } from './math/log';

// Types
export * from './types/common';
export * from './types/curve';
export * from './types/pool';
export * from './types/swap';
export * from './types/liquidity';
export * from './types/fee';
export * from './types/oracle';
export * from './types/events';

// Errors
export * from './errors';

// Utils
export * from './utils/math';
export * from './utils/addresses';
export * from './utils/validation';
