import { InvariantStatus, LastInvariant } from '../types/pool';

const UNKNOWN: LastInvariant = Object.freeze({ status: InvariantStatus.UNKNOWN });

/**
 * Invariant module -- owns the last known invariant.
 *
 * The value is the true invariant as of the most recent liquidity event,
 * or UNKNOWN after an action that could not compute it (a paused exit).
 */
export class InvariantModule {
  private last: LastInvariant = UNKNOWN;

  get current(): LastInvariant {
    return this.last;
  }

  setKnown(value: bigint): void {
    this.last = Object.freeze({ status: InvariantStatus.KNOWN, value });
  }

  invalidate(): void {
    this.last = UNKNOWN;
  }
}
