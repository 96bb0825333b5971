import { StakeRegistry } from '../src/modules/staking/stake.registry.js';
import { isStakingException } from '../src/modules/staking/staking.errors.js';
import { STAKE_STATES, type StakeEntry } from '../src/modules/staking/staking.types.js';

const entryFor = (owner: string): StakeEntry => ({
  state: STAKE_STATES.STAKED,
  owner,
  stakedAt: 1_000,
  unbondingAt: 0,
  lastClaimedBlock: 10
});

function captureError(action: () => unknown): unknown {
  try {
    action();
  } catch (error) {
    return error;
  }
  throw new Error('expected action to throw');
}

describe('StakeRegistry', () => {
  let registry: StakeRegistry;

  beforeEach(() => {
    registry = new StakeRegistry();
  });

  it('indexes entries by asset and owner', () => {
    registry.add('asset-1', entryFor('0xa'));
    registry.add('asset-2', entryFor('0xa'));
    registry.add('asset-3', entryFor('0xb'));

    expect(registry.stakesCount).toBe(3);
    expect(registry.listByOwner('0xa')).toEqual(['asset-1', 'asset-2']);
    expect(registry.countByOwner('0xb')).toBe(1);
    expect(registry.trackedAssets().sort()).toEqual(['asset-1', 'asset-2', 'asset-3']);
    expect(registry.trackedOwners().sort()).toEqual(['0xa', '0xb']);
    expect(registry.get('asset-3')?.owner).toBe('0xb');
  });

  it('rejects a second entry for the same asset', () => {
    registry.add('asset-1', entryFor('0xa'));
    expect(isStakingException(captureError(() => registry.add('asset-1', entryFor('0xb'))), 'EntryAlreadyExists')).toBe(true);
    expect(registry.stakesCount).toBe(1);
  });

  it('swaps the last asset into the removed slot and drops owners with no stakes left', () => {
    registry.add('asset-1', entryFor('0xa'));
    registry.add('asset-2', entryFor('0xa'));
    registry.add('asset-3', entryFor('0xa'));
    registry.add('asset-4', entryFor('0xb'));

    const removed = registry.remove('asset-1');
    expect(removed.owner).toBe('0xa');
    expect(registry.listByOwner('0xa')).toEqual(['asset-3', 'asset-2']);

    registry.remove('asset-2');
    expect(registry.listByOwner('0xa')).toEqual(['asset-3']);

    registry.remove('asset-4');
    expect(registry.trackedOwners()).toEqual(['0xa']);
    expect(registry.trackedAssets()).toEqual(['asset-3']);
    expect(registry.stakesCount).toBe(1);
  });

  it('fails to remove or update a missing entry', () => {
    expect(isStakingException(captureError(() => registry.remove('missing')), 'EntryNotFound')).toBe(true);
    expect(isStakingException(captureError(() => registry.update('missing', { state: 'Free' })), 'EntryNotFound')).toBe(true);
  });

  it('hands out copies so callers cannot mutate stored entries', () => {
    registry.add('asset-1', entryFor('0xa'));
    const copy = registry.get('asset-1');
    if (!copy) throw new Error('entry missing');
    copy.state = STAKE_STATES.FREE;
    expect(registry.get('asset-1')?.state).toBe(STAKE_STATES.STAKED);
  });

  it('never lets the active counter go negative', () => {
    registry.incrementActive();
    registry.decrementActive();
    expect(() => registry.decrementActive()).toThrow('Active stake counter would drop below zero');
    expect(registry.activeStakesCount).toBe(0);
  });

  it('restores every index from a snapshot', () => {
    registry.add('asset-1', entryFor('0xa'));
    registry.add('asset-2', entryFor('0xa'));
    registry.incrementActive();
    registry.incrementActive();
    const snapshot = registry.snapshot();

    registry.remove('asset-1');
    registry.decrementActive();
    registry.update('asset-2', { state: STAKE_STATES.UNBONDING, unbondingAt: 5_000 });
    registry.add('asset-9', entryFor('0xc'));

    registry.restore(snapshot);
    expect(registry.stakesCount).toBe(2);
    expect(registry.activeStakesCount).toBe(2);
    expect(registry.listByOwner('0xa')).toEqual(['asset-1', 'asset-2']);
    expect(registry.get('asset-2')?.state).toBe(STAKE_STATES.STAKED);
    expect(registry.has('asset-9')).toBe(false);
    expect(registry.trackedOwners()).toEqual(['0xa']);

    // slots are rebuilt, so swap-and-pop still lands correctly
    registry.remove('asset-1');
    expect(registry.listByOwner('0xa')).toEqual(['asset-2']);
  });

  it('counts entries in the Staked state', () => {
    registry.add('asset-1', entryFor('0xa'));
    registry.add('asset-2', { ...entryFor('0xa'), state: STAKE_STATES.UNBONDING, unbondingAt: 9_000 });
    expect(registry.countStaked()).toBe(1);
  });
});
