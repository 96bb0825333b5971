import { Injectable } from '@nestjs/common';
import { StakingException } from './staking.errors.js';
import { STAKE_STATES, type StakeEntry } from './staking.types.js';
import { TrackingSet } from './tracking-set.js';

export interface RegistrySnapshot {
  entries: Array<[string, StakeEntry]>;
  ownerAssets: Array<[string, string[]]>;
  stakesCount: number;
  activeStakesCount: number;
}

export type StakeEntryUpdate = Partial<Pick<StakeEntry, 'state' | 'unbondingAt' | 'lastClaimedBlock'>>;

/**
 * Bookkeeping behind the staking state machine: the asset → entry map,
 * the owner → asset-list index, the tracked asset/owner sets and the two
 * global counters. It holds no policy; every mutation keeps the four
 * structures consistent with each other.
 */
@Injectable()
export class StakeRegistry {
  private entries = new Map<string, StakeEntry>();
  private ownerAssets = new Map<string, string[]>();
  // position of each asset inside its owner's list, for O(1) swap-and-pop
  private ownerSlots = new Map<string, number>();
  private assetSet = new TrackingSet<string>();
  private ownerSet = new TrackingSet<string>();
  private totalStakes = 0;
  private activeStakes = 0;

  add(assetId: string, entry: StakeEntry): void {
    if (this.entries.has(assetId)) {
      throw new StakingException('EntryAlreadyExists', `Asset ${assetId} is already staked`);
    }
    this.entries.set(assetId, { ...entry });

    const list = this.ownerAssets.get(entry.owner) ?? [];
    this.ownerSlots.set(assetId, list.length);
    list.push(assetId);
    this.ownerAssets.set(entry.owner, list);

    this.assetSet.add(assetId);
    this.ownerSet.add(entry.owner);
    this.totalStakes += 1;
  }

  remove(assetId: string): StakeEntry {
    const entry = this.entries.get(assetId);
    if (!entry) {
      throw new StakingException('EntryNotFound', `No stake entry for asset ${assetId}`);
    }

    const list = this.ownerAssets.get(entry.owner) ?? [];
    const slot = this.ownerSlots.get(assetId) ?? list.indexOf(assetId);
    const last = list[list.length - 1];
    if (slot >= 0 && last !== undefined) {
      list[slot] = last;
      this.ownerSlots.set(last, slot);
      list.pop();
    }
    this.ownerSlots.delete(assetId);
    if (list.length === 0) {
      this.ownerAssets.delete(entry.owner);
      this.ownerSet.remove(entry.owner);
    }

    this.assetSet.remove(assetId);
    this.entries.delete(assetId);
    this.totalStakes -= 1;
    return { ...entry };
  }

  update(assetId: string, changes: StakeEntryUpdate): StakeEntry {
    const entry = this.entries.get(assetId);
    if (!entry) {
      throw new StakingException('EntryNotFound', `No stake entry for asset ${assetId}`);
    }
    const updated: StakeEntry = { ...entry, ...changes };
    this.entries.set(assetId, updated);
    return { ...updated };
  }

  incrementActive(): void {
    this.activeStakes += 1;
  }

  decrementActive(): void {
    if (this.activeStakes === 0) {
      throw new Error('Active stake counter would drop below zero');
    }
    this.activeStakes -= 1;
  }

  get(assetId: string): StakeEntry | undefined {
    const entry = this.entries.get(assetId);
    return entry ? { ...entry } : undefined;
  }

  has(assetId: string): boolean {
    return this.entries.has(assetId);
  }

  listByOwner(owner: string): string[] {
    return [...(this.ownerAssets.get(owner) ?? [])];
  }

  countByOwner(owner: string): number {
    return this.ownerAssets.get(owner)?.length ?? 0;
  }

  trackedAssets(): string[] {
    return this.assetSet.values();
  }

  trackedOwners(): string[] {
    return this.ownerSet.values();
  }

  list(): Array<[string, StakeEntry]> {
    return Array.from(this.entries.entries(), ([assetId, entry]) => [assetId, { ...entry }]);
  }

  get stakesCount(): number {
    return this.totalStakes;
  }

  get activeStakesCount(): number {
    return this.activeStakes;
  }

  countStaked(): number {
    let staked = 0;
    for (const entry of this.entries.values()) {
      if (entry.state === STAKE_STATES.STAKED) staked += 1;
    }
    return staked;
  }

  snapshot(): RegistrySnapshot {
    return {
      entries: this.list(),
      ownerAssets: Array.from(this.ownerAssets.entries(), ([owner, assets]) => [owner, [...assets]]),
      stakesCount: this.totalStakes,
      activeStakesCount: this.activeStakes
    };
  }

  restore(snapshot: RegistrySnapshot): void {
    this.entries = new Map(snapshot.entries.map(([assetId, entry]) => [assetId, { ...entry }]));
    this.ownerAssets = new Map(snapshot.ownerAssets.map(([owner, assets]) => [owner, [...assets]]));
    this.ownerSlots = new Map();
    for (const assets of this.ownerAssets.values()) {
      assets.forEach((assetId, slot) => this.ownerSlots.set(assetId, slot));
    }
    this.assetSet = new TrackingSet(this.entries.keys());
    this.ownerSet = new TrackingSet(this.ownerAssets.keys());
    this.totalStakes = snapshot.stakesCount;
    this.activeStakes = snapshot.activeStakesCount;
  }
}
