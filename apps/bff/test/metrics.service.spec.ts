import { MetricsService } from '../src/modules/metrics/metrics.service.js';

describe('MetricsService', () => {
  it('renders gauges and counters in Prometheus text format', () => {
    const metrics = new MetricsService();
    metrics.setLedgerGauges({ totalStakes: 3, activeStakes: 2, trackedOwners: 1, paused: true });
    metrics.recordStakingOperation('stake');
    metrics.recordStakingOperation('stake');
    metrics.recordStakingError('withdraw', 'ForcedExitRequired');
    metrics.addRewardsPaid(250n);
    metrics.addRewardsPaid(0n);

    const lines = metrics.renderPrometheus().split('\n');
    expect(lines).toContain('staking_stakes_total 3');
    expect(lines).toContain('staking_active_stakes 2');
    expect(lines).toContain('staking_tracked_owners 1');
    expect(lines).toContain('staking_paused 1');
    expect(lines).toContain('staking_rewards_paid_total 250');
    expect(lines).toContain('staking_operation_total{operation="stake"} 2');
    expect(lines).toContain('staking_operation_error_total{operation="withdraw",code="ForcedExitRequired"} 1');
  });
});
