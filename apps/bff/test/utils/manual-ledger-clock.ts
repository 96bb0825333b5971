import { AVERAGE_BLOCK_TIME_SECONDS, type LedgerClock } from '../../src/modules/staking/ledger-clock.js';

/** Clock the tests move by hand; time and height advance together. */
export class ManualLedgerClock implements LedgerClock {
  constructor(private time = 1_000_000, private height = 100) {}

  now(): number {
    return this.time;
  }

  blockHeight(): number {
    return this.height;
  }

  advanceBlocks(blocks: number): void {
    this.height += blocks;
    this.time += blocks * AVERAGE_BLOCK_TIME_SECONDS;
  }

  advanceSeconds(seconds: number): void {
    this.time += seconds;
    this.height += Math.floor(seconds / AVERAGE_BLOCK_TIME_SECONDS);
  }
}
