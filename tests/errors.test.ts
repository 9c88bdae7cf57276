import {
  CapExceededError,
  CurveDomainViolationError,
  EclpPoolError,
  InvalidTokenPairError,
  LengthMismatchError,
  OracleQueryError,
  PoolPausedError,
  UnsupportedJoinKindError,
  ValidationError,
  mapError,
} from '../src/errors';

describe('Error hierarchy', () => {
  it('keeps the prototype chain for instanceof checks', () => {
    const err = new PoolPausedError('swap');
    expect(err).toBeInstanceOf(PoolPausedError);
    expect(err).toBeInstanceOf(EclpPoolError);
    expect(err).toBeInstanceOf(Error);
    expect(err.name).toBe('PoolPausedError');
  });

  it('carries a code and details', () => {
    const err = new CapExceededError('global', 100n, 150n);
    expect(err.code).toBe('CAP_EXCEEDED');
    expect(err.message).toBe('Global cap exceeded: 150 > 100');
    expect(err.details).toEqual({ which: 'global', limit: '100', attempted: '150' });
  });

  it.each([
    [new InvalidTokenPairError('A', 'B'), 'INVALID_TOKEN_PAIR'],
    [new LengthMismatchError(2, 3), 'LENGTH_MISMATCH'],
    [new UnsupportedJoinKindError('INIT'), 'UNSUPPORTED_JOIN_KIND'],
    [new ValidationError('bad'), 'VALIDATION_ERROR'],
    [new OracleQueryError('old'), 'ORACLE_QUERY_ERROR'],
  ])('%s has code %s', (err, code) => {
    expect(err.code).toBe(code);
  });
});

describe('mapError', () => {
  it('passes pool errors through unchanged', () => {
    const err = new ValidationError('bad');
    expect(mapError(err)).toBe(err);
  });

  it('wraps arithmetic failures as curve-domain violations', () => {
    const cause = new RangeError('Division by zero');
    const mapped = mapError(cause);
    expect(mapped).toBeInstanceOf(CurveDomainViolationError);
    expect(mapped.message).toBe('Division by zero');
    expect(mapped.details).toEqual({ originalError: cause });
  });

  it('wraps non-Error values', () => {
    const mapped = mapError('boom');
    expect(mapped).toBeInstanceOf(CurveDomainViolationError);
    expect(mapped.message).toBe('boom');
  });
});
