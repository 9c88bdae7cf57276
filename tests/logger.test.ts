import { TradeType } from '../src/types/common';
import { JoinKind } from '../src/types/liquidity';
import { CurveDomainViolationError, PoolPausedError } from '../src/errors';
import { truncateAddress } from '../src/utils/addresses';
import { ONE } from '../src/utils/math';
import {
  LP,
  TOKEN_A,
  TOKEN_B,
  createMockLogger,
  createPool,
  createStubEngine,
} from './fixtures';

/**
 * Tests for pool instrumentation.
 *
 * Validates that EclpPool emits debug, info, and error logs for its
 * lifecycle and actions when a Logger is provided, and remains silent
 * when no logger is configured.
 */
describe('Logger', () => {
  const context = { blockNumber: 2, timestamp: 1000, lastChangeBlock: 1 };
  const swapRequest = {
    kind: TradeType.EXACT_IN,
    tokenIn: TOKEN_A,
    tokenOut: TOKEN_B,
    amount: ONE,
  };
  const balances = [1000n * ONE, 1000n * ONE] as const;

  describe('config acceptance', () => {
    it('accepts a custom logger in config', () => {
      const logger = createMockLogger();
      const pool = createPool({ logger });
      expect(pool.config.logger).toBe(logger);
    });

    it('defaults to undefined when no logger is provided', () => {
      expect(createPool().config.logger).toBeUndefined();
    });

    it('logs the pool configuration at info level', () => {
      const logger = createMockLogger();
      createPool({ logger });
      expect(logger.info).toHaveBeenCalledWith('EclpPool: configured', {
        token0: truncateAddress(TOKEN_A),
        token1: truncateAddress(TOKEN_B),
        swapFeePercentage: '1000000000000000',
        oracleEnabled: false,
      });
    });
  });

  describe('action logging', () => {
    it('logs initialization at info level', () => {
      const logger = createMockLogger();
      const pool = createPool({ logger, math: createStubEngine({ invariant: 500n, error: 1n }) });
      pool.onInitialJoin({
        recipient: LP,
        payload: { kind: JoinKind.INIT, amountsIn: [1000n, 1000n] },
        context,
      });
      expect(logger.info).toHaveBeenCalledWith('liquidity: pool initialized', {
        invariant: '500',
        sharesOut: '1000',
      });
    });

    it('logs computed swaps at debug level', () => {
      const logger = createMockLogger();
      const engine = createStubEngine({ invariant: 1000n, error: 3n });
      engine.calcOutGivenIn.mockReturnValue(97n);
      const pool = createPool({ logger, math: engine, swapFeePercentage: 10n ** 16n });

      pool.onSwap({ ...swapRequest, amount: 100n }, [1000n, 1000n], context);

      expect(logger.debug).toHaveBeenCalledWith('swap: computed', {
        kind: TradeType.EXACT_IN,
        amount: '97',
        feeAmount: '1',
        upperBound: '1006',
        lowerBound: '1000',
      });
    });
  });

  describe('error logging', () => {
    it('logs the typed error before rethrowing it', () => {
      const logger = createMockLogger();
      const pool = createPool({ logger });

      expect(() => pool.onSwap(swapRequest, balances, { ...context, paused: true })).toThrow(
        PoolPausedError,
      );
      expect(logger.error).toHaveBeenCalledWith(
        'EclpPool: onSwap failed',
        expect.any(PoolPausedError),
      );
    });

    it('maps engine failures to curve-domain violations', () => {
      const logger = createMockLogger();
      const engine = createStubEngine();
      engine.calculateInvariantWithError.mockImplementation(() => {
        throw new RangeError('Division by zero');
      });
      const pool = createPool({ logger, math: engine });

      expect(() => pool.onSwap(swapRequest, balances, context)).toThrow(CurveDomainViolationError);
      expect(logger.error).toHaveBeenCalledWith(
        'EclpPool: onSwap failed',
        expect.objectContaining({
          code: 'CURVE_DOMAIN_VIOLATION',
          message: 'Division by zero',
        }),
      );
    });

    it('logs listener failures without failing the action', () => {
      const logger = createMockLogger();
      const pool = createPool({
        logger,
        math: createStubEngine(),
        onEvent: () => {
          throw new Error('listener down');
        },
      });

      expect(() => pool.onSwap(swapRequest, balances, context)).not.toThrow();
      expect(logger.error).toHaveBeenCalledWith(
        'EclpPool: swap listener failed',
        expect.any(Error),
      );
    });

    it('does not throw when logger is undefined', () => {
      const pool = createPool();
      expect(() => pool.onSwap(swapRequest, balances, { ...context, paused: true })).toThrow(
        PoolPausedError,
      );
    });
  });
});
