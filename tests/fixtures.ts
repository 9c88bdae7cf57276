import { StrKey } from '@stellar/stellar-sdk';
import { EclpPool } from '../src/pool';
import { EclpPoolConfig } from '../src/config';
import { Logger } from '../src/types/common';
import { CurveParams, InvariantWithError, MathEngine } from '../src/types/curve';
import { ProtocolFeeConfig } from '../src/types/fee';
import { ONE } from '../src/utils/math';

/**
 * Shared test fixtures. Addresses are derived from filled byte buffers so
 * their lexicographic order follows the fill byte.
 */

export const contractId = (fill: number): string =>
  StrKey.encodeContract(Buffer.alloc(32, fill));
export const accountId = (fill: number): string =>
  StrKey.encodeEd25519PublicKey(Buffer.alloc(32, fill));

export const TOKEN_A = contractId(1);
export const TOKEN_B = contractId(2);
export const LP = accountId(3);
export const LP_2 = accountId(4);
export const GYRO_TREASURY = contractId(5);
export const PROTOCOL_TREASURY = contractId(6);

/** alpha 0.5, beta 2, rotation (0.8, 0.6), lambda 2. */
export const PARAMS: CurveParams = {
  alpha: 5n * 10n ** 17n,
  beta: 2n * ONE,
  c: 8n * 10n ** 17n,
  s: 6n * 10n ** 17n,
  lambda: 2n * ONE,
};

/** alpha 0.97, beta 1.03, rotation at 45 degrees, lambda 400. */
export const TIGHT_PARAMS: CurveParams = {
  alpha: 97n * 10n ** 16n,
  beta: 103n * 10n ** 16n,
  c: 707106781186547524n,
  s: 707106781186547524n,
  lambda: 400n * ONE,
};

export function feeConfig(
  protocolFeePercentage: bigint = 0n,
  gyroPortion: bigint = 0n,
): ProtocolFeeConfig {
  return {
    protocolFeePercentage,
    gyroPortion,
    gyroTreasury: GYRO_TREASURY,
    protocolTreasury: PROTOCOL_TREASURY,
  };
}

/**
 * Create a mock Logger where every method is a jest.fn().
 */
export function createMockLogger(): Logger & {
  debug: jest.Mock;
  info: jest.Mock;
  error: jest.Mock;
} {
  return {
    debug: jest.fn(),
    info: jest.fn(),
    error: jest.fn(),
  };
}

export type StubEngine = {
  [K in keyof MathEngine]: jest.Mock<ReturnType<MathEngine[K]>, Parameters<MathEngine[K]>>;
};

/**
 * Math engine whose every method is a jest.fn() with fixed answers.
 */
export function createStubEngine(
  invariant: InvariantWithError = { invariant: 500n, error: 1n },
): StubEngine {
  return {
    validateParams: jest.fn<void, Parameters<MathEngine['validateParams']>>(),
    validateDerivedParamsLimits: jest.fn<void, Parameters<MathEngine['validateDerivedParamsLimits']>>(),
    calculateInvariant: jest.fn<bigint, Parameters<MathEngine['calculateInvariant']>>(
      () => invariant.invariant,
    ),
    calculateInvariantWithError: jest.fn<
      InvariantWithError,
      Parameters<MathEngine['calculateInvariantWithError']>
    >(() => invariant),
    calcOutGivenIn: jest.fn<bigint, Parameters<MathEngine['calcOutGivenIn']>>(() => 0n),
    calcInGivenOut: jest.fn<bigint, Parameters<MathEngine['calcInGivenOut']>>(() => 0n),
    calculatePrice: jest.fn<bigint, Parameters<MathEngine['calculatePrice']>>(() => ONE),
  };
}

export function createPool(overrides: Partial<EclpPoolConfig> = {}): EclpPool {
  return new EclpPool({
    tokens: [
      { address: TOKEN_A, decimals: 18, symbol: 'AAA' },
      { address: TOKEN_B, decimals: 18, symbol: 'BBB' },
    ],
    params: PARAMS,
    swapFeePercentage: 10n ** 15n,
    ...overrides,
  });
}
