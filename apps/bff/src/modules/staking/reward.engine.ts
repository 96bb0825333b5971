import { Inject, Injectable } from '@nestjs/common';
import { AVERAGE_BLOCK_TIME_SECONDS, LEDGER_CLOCK, type LedgerClock } from './ledger-clock.js';
import { StakingException } from './staking.errors.js';
import { STAKE_STATES, type StakeEntry } from './staking.types.js';

export interface RewardContext {
  rewardPerBlock: bigint;
  activeStakesCount: number;
  stakingEndTime: number;
}

@Injectable()
export class RewardEngine {
  constructor(@Inject(LEDGER_CLOCK) private readonly clock: LedgerClock) {}

  /** Whole blocks elapsed since `timestamp`, which must lie strictly in the past. */
  blocksSince(timestamp: number): number {
    const now = this.clock.now();
    if (timestamp >= now) {
      throw new StakingException('PastTimestampRequired', `Timestamp ${timestamp} is not before ${now}`);
    }
    return Math.floor((now - timestamp) / AVERAGE_BLOCK_TIME_SECONDS);
  }

  /**
   * Current block height, or the estimated height at `stakingEndTime` once
   * the staking period is over. Accrual stops at that estimate.
   */
  effectiveHeight(stakingEndTime: number): number {
    const height = this.clock.blockHeight();
    if (this.clock.now() > stakingEndTime) {
      return height - this.blocksSince(stakingEndTime);
    }
    return height;
  }

  /**
   * Reward owed to a staked entry. The per-stake share is truncated before it
   * is multiplied by the elapsed blocks.
   */
  pendingReward(entry: StakeEntry, context: RewardContext): bigint {
    if (entry.state !== STAKE_STATES.STAKED || context.activeStakesCount <= 0) {
      return 0n;
    }
    const elapsedBlocks = this.effectiveHeight(context.stakingEndTime) - entry.lastClaimedBlock;
    if (elapsedBlocks <= 0) {
      return 0n;
    }
    const sharePerBlock = context.rewardPerBlock / BigInt(context.activeStakesCount);
    return BigInt(elapsedBlocks) * sharePerBlock;
  }
}
