import { Injectable } from '@nestjs/common';

export interface LedgerGauges {
  totalStakes: number;
  activeStakes: number;
  trackedOwners: number;
  paused: boolean;
}

@Injectable()
export class MetricsService {
  private readonly operationTotals = new Map<string, number>();
  private readonly errorTotals = new Map<string, number>();
  private rewardsPaidTotal = 0n;
  private gauges: LedgerGauges = { totalStakes: 0, activeStakes: 0, trackedOwners: 0, paused: false };

  recordStakingOperation(operation: string) {
    this.operationTotals.set(operation, (this.operationTotals.get(operation) ?? 0) + 1);
  }

  recordStakingError(operation: string, code: string) {
    const key = `${operation}|${code}`;
    this.errorTotals.set(key, (this.errorTotals.get(key) ?? 0) + 1);
  }

  addRewardsPaid(amount: bigint) {
    if (amount > 0n) {
      this.rewardsPaidTotal += amount;
    }
  }

  setLedgerGauges(gauges: LedgerGauges) {
    this.gauges = { ...gauges };
  }

  renderPrometheus(): string {
    const lines: string[] = [];
    lines.push('# HELP staking_stakes_total Stake entries currently held in the registry');
    lines.push('# TYPE staking_stakes_total gauge');
    lines.push(`staking_stakes_total ${this.gauges.totalStakes}`);
    lines.push('# HELP staking_active_stakes Stake entries currently accruing rewards');
    lines.push('# TYPE staking_active_stakes gauge');
    lines.push(`staking_active_stakes ${this.gauges.activeStakes}`);
    lines.push('# HELP staking_tracked_owners Owners with at least one stake entry');
    lines.push('# TYPE staking_tracked_owners gauge');
    lines.push(`staking_tracked_owners ${this.gauges.trackedOwners}`);
    lines.push('# HELP staking_paused Whether staking operations are paused (1) or not (0)');
    lines.push('# TYPE staking_paused gauge');
    lines.push(`staking_paused ${this.gauges.paused ? 1 : 0}`);
    lines.push('# HELP staking_rewards_paid_total Reward token paid out to stakers');
    lines.push('# TYPE staking_rewards_paid_total counter');
    lines.push(`staking_rewards_paid_total ${this.rewardsPaidTotal.toString()}`);
    lines.push('# HELP staking_operation_total Committed staking operations');
    lines.push('# TYPE staking_operation_total counter');
    for (const [operation, count] of this.operationTotals) {
      lines.push(`staking_operation_total{operation="${operation}"} ${count}`);
    }
    lines.push('# HELP staking_operation_error_total Aborted staking operations by error code');
    lines.push('# TYPE staking_operation_error_total counter');
    for (const [key, count] of this.errorTotals) {
      const [operation, code] = key.split('|');
      lines.push(`staking_operation_error_total{operation="${operation}",code="${code}"} ${count}`);
    }
    return lines.join('\n') + '\n';
  }
}
