export const LEDGER_CLOCK = Symbol('LEDGER_CLOCK');

/** Seconds per block used to convert between wall-clock time and block heights. */
export const AVERAGE_BLOCK_TIME_SECONDS = 3;

export const SECONDS_PER_HOUR = 60 * 60;

export interface LedgerClock {
  /** Unix timestamp in seconds. */
  now(): number;
  blockHeight(): number;
}

/**
 * Derives block heights from wall-clock time at the average block time,
 * counted from a fixed genesis timestamp so heights survive restarts.
 */
export class SystemLedgerClock implements LedgerClock {
  constructor(private readonly genesisTime = 0, private readonly genesisHeight = 0) {}

  now(): number {
    return Math.floor(Date.now() / 1000);
  }

  blockHeight(): number {
    const elapsed = Math.max(0, this.now() - this.genesisTime);
    return this.genesisHeight + Math.floor(elapsed / AVERAGE_BLOCK_TIME_SECONDS);
  }
}
