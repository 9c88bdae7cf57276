import {
  calcProtocolFees,
  invariantAfterExit,
  invariantAfterJoin,
  proportionalAmountsIn,
  proportionalAmountsOut,
} from '../src/math/pool-math';
import { ONE } from '../src/utils/math';

describe('calcProtocolFees', () => {
  const previous = 500n * ONE;
  const current = 600n * ONE;
  const supply = 1000n * ONE;

  it('splits fee shares between the two beneficiaries', () => {
    expect(calcProtocolFees(previous, current, supply, ONE / 2n, ONE / 2n)).toEqual({
      gyroShares: 45454545454545454545n,
      protocolShares: 45454545454545454545n,
    });
    expect(calcProtocolFees(previous, current, supply, ONE / 5n, ONE / 4n)).toEqual({
      gyroShares: 8620689655172413793n,
      protocolShares: 25862068965517241379n,
    });
  });

  it('takes all growth at a 100% fee', () => {
    expect(calcProtocolFees(previous, current, supply, ONE, 0n)).toEqual({
      gyroShares: 0n,
      protocolShares: 200n * ONE,
    });
  });

  it('charges nothing without growth', () => {
    expect(calcProtocolFees(current, current, supply, ONE / 2n, ONE / 2n)).toEqual({
      gyroShares: 0n,
      protocolShares: 0n,
    });
    expect(calcProtocolFees(current, previous, supply, ONE / 2n, ONE / 2n)).toEqual({
      gyroShares: 0n,
      protocolShares: 0n,
    });
  });

  it('charges nothing at a zero fee', () => {
    expect(calcProtocolFees(previous, current, supply, 0n, ONE / 2n)).toEqual({
      gyroShares: 0n,
      protocolShares: 0n,
    });
  });

  it('is monotonic in the fee percentage', () => {
    let last = -1n;
    for (const pct of [0n, ONE / 100n, ONE / 10n, ONE / 2n, (9n * ONE) / 10n, ONE]) {
      const { gyroShares, protocolShares } = calcProtocolFees(previous, current, supply, pct, ONE / 3n);
      const total = gyroShares + protocolShares;
      expect(total).toBeGreaterThanOrEqual(last);
      last = total;
    }
  });
});

describe('invariant updates', () => {
  it('adds the rounded-up share of a join', () => {
    expect(invariantAfterJoin(500n, 100n, 1000n)).toBe(550n);
    expect(invariantAfterJoin(500n, 1n, 3n)).toBe(667n);
  });

  it('removes the rounded-down share of an exit', () => {
    expect(invariantAfterExit(500n, 100n, 1000n)).toBe(450n);
    expect(invariantAfterExit(500n, 1n, 3n)).toBe(334n);
  });
});

describe('proportional amounts', () => {
  it('rounds join amounts up', () => {
    expect(proportionalAmountsIn([1000n, 1000n], 100n, 1000n)).toEqual([100n, 100n]);
    expect(proportionalAmountsIn([10n, 7n], 1n, 3n)).toEqual([4n, 3n]);
  });

  it('rounds exit amounts down', () => {
    expect(proportionalAmountsOut([1000n, 1000n], 100n, 1000n)).toEqual([100n, 100n]);
    expect(proportionalAmountsOut([10n, 7n], 1n, 3n)).toEqual([3n, 2n]);
  });
});
