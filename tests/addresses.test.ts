import {
  isValidAddress,
  isValidContractId,
  isValidPublicKey,
  sortTokens,
  truncateAddress,
} from '../src/utils/addresses';
import { validateAddress, validateFeeConfig } from '../src/utils/validation';
import { ValidationError } from '../src/errors';
import { ONE } from '../src/utils/math';
import { LP, TOKEN_A, TOKEN_B, feeConfig } from './fixtures';

describe('address validation', () => {
  it('distinguishes accounts from contracts', () => {
    expect(isValidPublicKey(LP)).toBe(true);
    expect(isValidContractId(LP)).toBe(false);
    expect(isValidContractId(TOKEN_A)).toBe(true);
    expect(isValidPublicKey(TOKEN_A)).toBe(false);
  });

  it('accepts either kind as a generic address', () => {
    expect(isValidAddress(LP)).toBe(true);
    expect(isValidAddress(TOKEN_A)).toBe(true);
    expect(isValidAddress('invalid')).toBe(false);
    expect(isValidAddress('')).toBe(false);
  });

  it('throws ValidationError naming the field', () => {
    expect(() => validateAddress('invalid', 'recipient')).toThrow('Invalid recipient: invalid');
    expect(() => validateAddress('invalid', 'recipient')).toThrow(ValidationError);
  });
});

describe('sortTokens', () => {
  it('orders addresses lexicographically', () => {
    expect(sortTokens(TOKEN_B, TOKEN_A)).toEqual([TOKEN_A, TOKEN_B]);
    expect(sortTokens(TOKEN_A, TOKEN_B)).toEqual([TOKEN_A, TOKEN_B]);
  });

  it('rejects identical tokens', () => {
    expect(() => sortTokens(TOKEN_A, TOKEN_A)).toThrow('Identical tokens');
  });
});

describe('truncateAddress', () => {
  it('keeps the head and tail', () => {
    expect(truncateAddress('GABCDEFGHIJKLMNOP')).toBe('GABC...MNOP');
    expect(truncateAddress('GABCDEFGHIJKLMNOP', 2)).toBe('GA...OP');
  });

  it('leaves short strings alone', () => {
    expect(truncateAddress('GABCDEFG')).toBe('GABCDEFG');
  });
});

describe('validateFeeConfig', () => {
  it('accepts percentages within [0, 1]', () => {
    expect(() => validateFeeConfig(feeConfig(ONE, 0n))).not.toThrow();
  });

  it('rejects percentages above one', () => {
    expect(() => validateFeeConfig(feeConfig(ONE + 1n, 0n))).toThrow(ValidationError);
    expect(() => validateFeeConfig(feeConfig(0n, -1n))).toThrow(ValidationError);
  });

  it('rejects invalid treasuries', () => {
    expect(() => validateFeeConfig({ ...feeConfig(), gyroTreasury: 'nope' })).toThrow(
      'Invalid gyroTreasury: nope',
    );
  });
});
