import { Inject, Injectable, Logger, OnApplicationShutdown, OnModuleInit, Optional } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { appendEventJournal } from '../../common/event-journal.util.js';
import { MetricsService } from '../metrics/metrics.service.js';
import { LEDGER_CLOCK, type LedgerClock } from './ledger-clock.js';
import { RewardEngine, type RewardContext } from './reward.engine.js';
import { StakeRegistry } from './stake.registry.js';
import {
  ASSET_CUSTODIAN,
  ASSET_RECEIVED,
  AUTHORIZATION_GATE,
  PAUSE_GATE,
  TOKEN_LEDGER,
  isAssetReceiverRegistry,
  isJournaled,
  type AssetCustodian,
  type AssetReceiver,
  type AuthorizationGate,
  type PauseGate,
  type TokenLedger
} from './staking.collaborators.js';
import { StakingException } from './staking.errors.js';
import { toStakingEventDto } from './staking.mapper.js';
import { hoursToSeconds, parseAmount, parseCount, parseHours } from './staking.params.js';
import {
  StakingStateStore,
  fromPersistedSettings,
  toPersistedSettings,
  type PersistedLedger
} from './staking.state-store.js';
import {
  STAKE_STATES,
  type ClaimAllResult,
  type ClaimResult,
  type PrivilegedAction,
  type StakeEntry,
  type StakeState,
  type StakingEvent,
  type StakingInitParams,
  type StakingSettings,
  type UnstakeResult,
  type WithdrawResult
} from './staking.types.js';

type EventDraft = Omit<StakingEvent, 'sequence' | 'at' | 'block'>;

type TunableSetting = 'stakeLimit' | 'rewardPerBlock' | 'earlyExitTax' | 'carryAmount' | 'stakingEndTime' | 'unbondingPeriod';

interface ExitOutcome {
  state: StakeState;
  unbondingAt: number;
  reward: bigint;
  taxPaid: bigint;
}

const DEFAULT_JOURNAL_LIMIT = 500;

/**
 * Staking state machine: Staked → Unbonding → Free → removed.
 *
 * Every mutating entry point runs as one unit of work. A re-entrant call from
 * a collaborator is rejected, and any failure restores the registry, the
 * settings and every journaled collaborator to their state before the call.
 */
@Injectable()
export class StakingService implements AssetReceiver, OnModuleInit, OnApplicationShutdown {
  private readonly logger = new Logger(StakingService.name);
  private readonly custodyAddress: string;
  private readonly journalLimit: number;
  private readonly debugLogDir?: string;
  private settings: StakingSettings | null = null;
  private activeOperation: string | null = null;
  private uncommitted: EventDraft[] = [];
  private journal: StakingEvent[] = [];
  private nextSequence = 1;

  constructor(
    private readonly registry: StakeRegistry,
    private readonly rewards: RewardEngine,
    private readonly stateStore: StakingStateStore,
    private readonly config: ConfigService,
    @Inject(LEDGER_CLOCK) private readonly clock: LedgerClock,
    @Inject(ASSET_CUSTODIAN) private readonly custodian: AssetCustodian,
    @Inject(TOKEN_LEDGER) private readonly tokens: TokenLedger,
    @Inject(AUTHORIZATION_GATE) private readonly authorization: AuthorizationGate,
    @Inject(PAUSE_GATE) private readonly pauseGate: PauseGate,
    @Optional() private readonly metrics?: MetricsService
  ) {
    this.custodyAddress = this.config.get<string>('staking.custodyAddress', '0xc0ffee').toLowerCase();
    this.journalLimit = this.config.get<number>('staking.journalLimit', DEFAULT_JOURNAL_LIMIT);
    const debugDir = this.config.get<string>('debug.logDir');
    this.debugLogDir = debugDir ? debugDir.trim() || undefined : undefined;
  }

  async onModuleInit(): Promise<void> {
    if (isAssetReceiverRegistry(this.custodian)) {
      this.custodian.registerReceiver(this.custodyAddress, this);
    }
    const saved = await this.stateStore.load();
    if (saved) {
      this.restoreLedger(saved);
      return;
    }
    if (this.config.get<boolean>('staking.autoInitialize', true)) {
      this.initialize(this.initParamsFromConfig());
    }
  }

  async onApplicationShutdown(): Promise<void> {
    await this.stateStore.flush();
  }

  // ---------------------------------------------------------------------
  // Initialization
  // ---------------------------------------------------------------------

  initialize(params: StakingInitParams): StakingSettings {
    return this.runAtomic('initialize', () => {
      if (this.settings) {
        throw new StakingException('AlreadyInitialized', 'Staking ledger is already initialized');
      }
      const stakingDuration = hoursToSeconds(parseHours(params.stakingDurationHours, 'stakingDurationHours'));
      const unbondingPeriod = hoursToSeconds(parseHours(params.unbondingPeriodHours, 'unbondingPeriodHours'));
      this.settings = {
        collectionAddress: params.collectionAddress.toLowerCase(),
        rewardTokenAddress: params.rewardTokenAddress.toLowerCase(),
        custodyAddress: this.custodyAddress,
        rewardPerBlock: parseAmount(params.rewardPerBlock, 'rewardPerBlock'),
        earlyExitTax: parseAmount(params.earlyExitTax, 'earlyExitTax'),
        carryAmount: parseAmount(params.carryAmount, 'carryAmount'),
        stakeLimit: parseCount(params.stakeLimit, 'stakeLimit'),
        stakingEndTime: this.clock.now() + stakingDuration,
        unbondingPeriod
      };
      this.logger.log(
        `Initialized staking ledger: collection=${this.settings.collectionAddress} ` +
          `endTime=${this.settings.stakingEndTime} unbonding=${unbondingPeriod}s limit=${this.settings.stakeLimit}`
      );
      return { ...this.settings };
    });
  }

  get initialized(): boolean {
    return this.settings !== null;
  }

  // ---------------------------------------------------------------------
  // Staking lifecycle
  // ---------------------------------------------------------------------

  stake(caller: string, assetId: string): StakeEntry {
    return this.runAtomic('stake', () => {
      const settings = this.requireReady();
      this.requireNotPaused();
      if (this.isPeriodEnded(settings)) {
        throw new StakingException('StakingPeriodEnded', 'Staking period has ended');
      }
      if (this.registry.activeStakesCount >= settings.stakeLimit) {
        throw new StakingException('StakeLimitExceeded', `Stake limit of ${settings.stakeLimit} reached`);
      }
      if (this.custodian.ownerOf(assetId) !== caller) {
        throw new StakingException('CallerNotAssetHolder', `${caller} does not hold asset ${assetId}`);
      }

      const entry: StakeEntry = {
        state: STAKE_STATES.STAKED,
        owner: caller,
        stakedAt: this.clock.now(),
        unbondingAt: 0,
        lastClaimedBlock: this.clock.blockHeight()
      };
      this.registry.add(assetId, entry);
      this.registry.incrementActive();

      this.moveTokens(caller, this.custodyAddress, settings.carryAmount);
      this.moveAsset(caller, this.custodyAddress, assetId);
      this.record({ type: 'Staked', assetId, account: caller, amount: settings.carryAmount });
      return { ...entry };
    });
  }

  /**
   * Leaves the Staked state. A natural exit starts the unbonding wait; a
   * forced exit pays the tax and releases the asset in the same call.
   */
  unstake(caller: string, assetId: string, forceWithTax: boolean): UnstakeResult {
    return this.runAtomic('unstake', () => {
      const settings = this.requireReady();
      this.requireNotPaused();
      if (this.isPeriodEnded(settings)) {
        throw new StakingException('StakingPeriodEnded', 'Staking period has ended');
      }
      const exit = this.exitStake(settings, caller, assetId, forceWithTax);
      const withdrawn = exit.state === STAKE_STATES.FREE;
      if (withdrawn) {
        this.release(settings, caller, assetId);
      }
      return { assetId, ...exit, withdrawn };
    });
  }

  withdraw(caller: string, assetId: string, forceWithTax: boolean): WithdrawResult {
    return this.runAtomic('withdraw', () => {
      const settings = this.requireReady();
      this.requireNotPaused();
      const entry = this.requireEntry(assetId);
      this.requireOwner(entry, caller);

      let reward = 0n;
      let taxPaid = 0n;
      const sunset = this.isPeriodEnded(settings);
      if (!sunset) {
        const now = this.clock.now();
        const locked = now < entry.unbondingAt;
        if (locked && !forceWithTax) {
          throw new StakingException('ForcedExitRequired', `Asset ${assetId} is still unbonding; pass forceWithTax to exit early`);
        }
        if (entry.state === STAKE_STATES.STAKED) {
          // a staked entry has no unbonding deadline yet, so the caller's flag decides the exit
          const exit = this.exitStake(settings, caller, assetId, forceWithTax);
          reward = exit.reward;
          taxPaid = exit.taxPaid;
        } else if (locked) {
          this.registry.update(assetId, { state: STAKE_STATES.FREE, unbondingAt: now });
          this.moveTokens(caller, this.custodyAddress, settings.earlyExitTax);
          taxPaid = settings.earlyExitTax;
        } else {
          this.registry.update(assetId, { state: STAKE_STATES.FREE });
        }
      } else if (entry.state === STAKE_STATES.STAKED) {
        this.registry.decrementActive();
      }

      const carryReturned = this.release(settings, caller, assetId);
      return { assetId, owner: caller, reward, taxPaid, carryReturned, sunset };
    });
  }

  claimReward(caller: string, assetId: string): ClaimResult {
    return this.runAtomic('claimReward', () => {
      const settings = this.requireReady();
      this.requireNotPaused();
      const entry = this.requireEntry(assetId);
      this.requireStaked(entry, assetId);
      this.requireOwner(entry, caller);
      const reward = this.accrue(settings, assetId, entry);
      this.payReward(caller, assetId, reward);
      return { assetId, reward };
    });
  }

  claimAllRewards(caller: string): ClaimAllResult {
    return this.runAtomic('claimAllRewards', () => {
      const settings = this.requireReady();
      this.requireNotPaused();
      const claims: ClaimResult[] = [];
      let total = 0n;
      for (const assetId of this.registry.listByOwner(caller)) {
        const entry = this.registry.get(assetId);
        if (!entry || entry.state !== STAKE_STATES.STAKED) continue;
        const reward = this.accrue(settings, assetId, entry);
        this.payReward(caller, assetId, reward);
        claims.push({ assetId, reward });
        total += reward;
      }
      return { claims, total };
    });
  }

  /** Unconditional acceptance of incoming assets. */
  onAssetReceived(_from: string, _assetId: string): string {
    return ASSET_RECEIVED;
  }

  // ---------------------------------------------------------------------
  // Reads
  // ---------------------------------------------------------------------

  pendingReward(assetId: string): bigint {
    const settings = this.requireReady();
    const entry = this.requireEntry(assetId);
    this.requireStaked(entry, assetId);
    return this.rewards.pendingReward(entry, this.rewardContext(settings));
  }

  stakeInfo(assetId: string): StakeEntry {
    return this.requireEntry(assetId);
  }

  unbondingTimestamp(assetId: string): number {
    return this.requireEntry(assetId).unbondingAt;
  }

  listStakesByOwner(owner: string): string[] {
    return this.registry.listByOwner(owner);
  }

  stakeCount(owner: string): number {
    return this.registry.countByOwner(owner);
  }

  trackedOwners(): string[] {
    return this.registry.trackedOwners();
  }

  trackedAssets(): string[] {
    return this.registry.trackedAssets();
  }

  totalStakes(): number {
    return this.registry.stakesCount;
  }

  activeStakeCount(): number {
    return this.registry.activeStakesCount;
  }

  getSettings(): StakingSettings {
    return { ...this.requireReady() };
  }

  stakingEndTime(): number {
    return this.requireReady().stakingEndTime;
  }

  unbondingPeriod(): number {
    return this.requireReady().unbondingPeriod;
  }

  rewardPerBlock(): bigint {
    return this.requireReady().rewardPerBlock;
  }

  stakeLimit(): number {
    return this.requireReady().stakeLimit;
  }

  carryAmount(): bigint {
    return this.requireReady().carryAmount;
  }

  earlyExitTax(): bigint {
    return this.requireReady().earlyExitTax;
  }

  isPaused(): boolean {
    return this.pauseGate.isPaused();
  }

  events(limit = this.journalLimit): StakingEvent[] {
    return limit <= 0 ? [] : this.journal.slice(-limit);
  }

  // ---------------------------------------------------------------------
  // Privileged operations
  // ---------------------------------------------------------------------

  setStakeLimit(caller: string, limit: number): StakingSettings {
    return this.updateSetting(caller, 'setStakeLimit', 'stakeLimit', () => parseCount(limit, 'stakeLimit'));
  }

  setRewardPerBlock(caller: string, amount: bigint): StakingSettings {
    return this.updateSetting(caller, 'setRewardPerBlock', 'rewardPerBlock', () => parseAmount(amount, 'rewardPerBlock'));
  }

  setEarlyExitTax(caller: string, amount: bigint): StakingSettings {
    return this.updateSetting(caller, 'setEarlyExitTax', 'earlyExitTax', () => parseAmount(amount, 'earlyExitTax'));
  }

  setCarryAmount(caller: string, amount: bigint): StakingSettings {
    return this.updateSetting(caller, 'setCarryAmount', 'carryAmount', () => parseAmount(amount, 'carryAmount'));
  }

  setStakingEndTime(caller: string, hoursFromNow: number): StakingSettings {
    return this.updateSetting(
      caller,
      'setStakingEndTime',
      'stakingEndTime',
      () => this.clock.now() + hoursToSeconds(parseHours(hoursFromNow, 'hoursFromNow'))
    );
  }

  setUnbondingPeriod(caller: string, hours: number): StakingSettings {
    return this.updateSetting(caller, 'setUnbondingPeriod', 'unbondingPeriod', () =>
      hoursToSeconds(parseHours(hours, 'hours'))
    );
  }

  pause(caller: string): void {
    this.runAtomic('pause', () => {
      this.requireReady();
      this.requireAuthorized(caller, 'pause');
      if (this.pauseGate.isPaused()) {
        throw new StakingException('AlreadyPaused', 'Staking is already paused');
      }
      this.pauseGate.setPaused(true);
      this.record({ type: 'Paused', account: caller });
    });
  }

  unpause(caller: string): void {
    this.runAtomic('unpause', () => {
      this.requireReady();
      this.requireAuthorized(caller, 'unpause');
      if (!this.pauseGate.isPaused()) {
        throw new StakingException('NotPaused', 'Staking is not paused');
      }
      this.pauseGate.setPaused(false);
      this.record({ type: 'Unpaused', account: caller });
    });
  }

  /** Drains the custody's whole reward-token balance to the caller. */
  forceWithdrawRewardPool(caller: string): bigint {
    return this.runAtomic('forceWithdrawRewardPool', () => {
      this.requireReady();
      this.requireAuthorized(caller, 'forceWithdrawRewardPool');
      const amount = this.tokens.balanceOf(this.custodyAddress);
      this.moveTokens(this.custodyAddress, caller, amount);
      this.record({ type: 'RewardPoolDrained', account: caller, amount });
      return amount;
    });
  }

  /**
   * Moves an asset out of custody. A staked asset goes back to its owner and
   * its entry is dropped; a stray asset goes to the caller.
   */
  forceWithdrawAsset(caller: string, assetId: string): string {
    return this.runAtomic('forceWithdrawAsset', () => {
      this.requireReady();
      this.requireAuthorized(caller, 'forceWithdrawAsset');
      if (this.custodian.ownerOf(assetId) !== this.custodyAddress) {
        throw new StakingException('InvalidParameter', `Asset ${assetId} is not held in custody`);
      }
      let recipient = caller;
      const entry = this.registry.get(assetId);
      if (entry) {
        if (entry.state === STAKE_STATES.STAKED) {
          this.registry.decrementActive();
        }
        this.registry.remove(assetId);
        recipient = entry.owner;
      }
      this.moveAsset(this.custodyAddress, recipient, assetId);
      this.record({ type: 'AssetRescued', assetId, account: recipient });
      return recipient;
    });
  }

  // ---------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------

  private exitStake(settings: StakingSettings, caller: string, assetId: string, forceWithTax: boolean): ExitOutcome {
    const entry = this.requireEntry(assetId);
    this.requireStaked(entry, assetId);
    this.requireOwner(entry, caller);

    // reward is settled against the active count before this stake leaves it
    const reward = this.accrue(settings, assetId, entry);
    const now = this.clock.now();
    const state = forceWithTax ? STAKE_STATES.FREE : STAKE_STATES.UNBONDING;
    const unbondingAt = forceWithTax ? now : now + settings.unbondingPeriod;
    this.registry.decrementActive();
    this.registry.update(assetId, { state, unbondingAt });

    this.payReward(caller, assetId, reward);
    const taxPaid = forceWithTax ? settings.earlyExitTax : 0n;
    this.moveTokens(caller, this.custodyAddress, taxPaid);
    this.record({ type: 'Unstaked', assetId, account: caller, amount: taxPaid, detail: forceWithTax ? 'forced' : 'unbonding' });
    return { state, unbondingAt, reward, taxPaid };
  }

  private release(settings: StakingSettings, owner: string, assetId: string): bigint {
    this.registry.remove(assetId);
    this.moveAsset(this.custodyAddress, owner, assetId);
    this.moveTokens(this.custodyAddress, owner, settings.carryAmount);
    this.record({ type: 'Withdrawn', assetId, account: owner, amount: settings.carryAmount });
    return settings.carryAmount;
  }

  private accrue(settings: StakingSettings, assetId: string, entry: StakeEntry): bigint {
    const reward = this.rewards.pendingReward(entry, this.rewardContext(settings));
    this.registry.update(assetId, { lastClaimedBlock: this.clock.blockHeight() });
    return reward;
  }

  private payReward(owner: string, assetId: string, reward: bigint): void {
    if (reward === 0n) return;
    this.moveTokens(this.custodyAddress, owner, reward);
    this.record({ type: 'RewardClaimed', assetId, account: owner, amount: reward });
  }

  private rewardContext(settings: StakingSettings): RewardContext {
    return {
      rewardPerBlock: settings.rewardPerBlock,
      activeStakesCount: this.registry.activeStakesCount,
      stakingEndTime: settings.stakingEndTime
    };
  }

  private updateSetting<K extends TunableSetting>(
    caller: string,
    action: PrivilegedAction,
    field: K,
    resolve: () => StakingSettings[K]
  ): StakingSettings {
    return this.runAtomic(action, () => {
      const settings = this.requireReady();
      this.requireAuthorized(caller, action);
      const value = resolve();
      settings[field] = value;
      this.record({ type: 'SettingsUpdated', account: caller, detail: `${field}=${String(value)}` });
      return { ...settings };
    });
  }

  private isPeriodEnded(settings: StakingSettings): boolean {
    return this.clock.now() >= settings.stakingEndTime;
  }

  private requireReady(): StakingSettings {
    if (!this.settings) {
      throw new StakingException('NotInitialized', 'Staking ledger is not initialized');
    }
    return this.settings;
  }

  private requireNotPaused(): void {
    if (this.pauseGate.isPaused()) {
      throw new StakingException('SystemPaused', 'Staking is paused');
    }
  }

  private requireAuthorized(caller: string, action: PrivilegedAction): void {
    if (!this.authorization.isAuthorized(caller, action)) {
      throw new StakingException('Unauthorized', `${caller} may not ${action}`);
    }
  }

  private requireEntry(assetId: string): StakeEntry {
    const entry = this.registry.get(assetId);
    if (!entry) {
      throw new StakingException('EntryNotFound', `No stake entry for asset ${assetId}`);
    }
    return entry;
  }

  private requireStaked(entry: StakeEntry, assetId: string): void {
    if (entry.state !== STAKE_STATES.STAKED) {
      throw new StakingException('NotStaked', `Asset ${assetId} is ${entry.state}, not Staked`);
    }
  }

  private requireOwner(entry: StakeEntry, caller: string): void {
    if (entry.owner !== caller) {
      throw new StakingException('CallerNotEntryOwner', `${caller} does not own the stake entry`);
    }
  }

  private moveAsset(from: string, to: string, assetId: string): void {
    this.callCollaborator(`asset ${assetId} ${from} -> ${to}`, () => this.custodian.transfer(from, to, assetId));
  }

  private moveTokens(from: string, to: string, amount: bigint): void {
    if (amount === 0n) return;
    this.callCollaborator(`${amount} tokens ${from} -> ${to}`, () => this.tokens.transfer(from, to, amount));
  }

  private callCollaborator(description: string, call: () => void): void {
    try {
      call();
    } catch (error) {
      if (error instanceof StakingException) {
        throw error;
      }
      throw new StakingException('CustodyTransferFailed', `Custody transfer failed (${description}): ${describeError(error)}`, {
        cause: error
      });
    }
  }

  private record(event: EventDraft): void {
    this.uncommitted.push(event);
  }

  private runAtomic<T>(operation: string, work: () => T): T {
    if (this.activeOperation) {
      throw new StakingException('ReentrantCall', `${operation} called while ${this.activeOperation} is in progress`);
    }
    this.activeOperation = operation;
    const registrySnapshot = this.registry.snapshot();
    const settingsSnapshot = this.settings ? { ...this.settings } : null;
    const collaborators = new Set<unknown>([this.custodian, this.tokens, this.authorization, this.pauseGate]);
    const rollbacks = Array.from(collaborators)
      .filter(isJournaled)
      .map((collaborator) => collaborator.checkpoint());

    try {
      const result = work();
      this.commit(operation);
      return result;
    } catch (error) {
      this.registry.restore(registrySnapshot);
      this.settings = settingsSnapshot;
      for (const rollback of rollbacks.reverse()) rollback();
      this.uncommitted = [];
      const code = error instanceof StakingException ? error.code : 'Internal';
      this.logger.warn(`${operation} aborted (${code}): ${describeError(error)}`);
      this.metrics?.recordStakingError(operation, code);
      throw error;
    } finally {
      this.activeOperation = null;
    }
  }

  private commit(operation: string): void {
    const at = this.clock.now();
    const block = this.clock.blockHeight();
    const committed: StakingEvent[] = [];
    for (const draft of this.uncommitted) {
      const event: StakingEvent = { ...draft, sequence: this.nextSequence++, at, block };
      this.journal.push(event);
      this.logger.log(
        `${event.type}${event.assetId ? ` asset=${event.assetId}` : ''}${event.account ? ` account=${event.account}` : ''}` +
          `${event.amount !== undefined ? ` amount=${event.amount}` : ''}${event.detail ? ` ${event.detail}` : ''}`
      );
      if (event.type === 'RewardClaimed' && event.amount !== undefined) {
        this.metrics?.addRewardsPaid(event.amount);
      }
      committed.push(event);
    }
    this.uncommitted = [];
    void appendEventJournal(this.debugLogDir, operation, committed.map(toStakingEventDto));
    if (this.journal.length > this.journalLimit) {
      this.journal = this.journal.slice(-this.journalLimit);
    }

    this.metrics?.recordStakingOperation(operation);
    this.metrics?.setLedgerGauges({
      totalStakes: this.registry.stakesCount,
      activeStakes: this.registry.activeStakesCount,
      trackedOwners: this.registry.trackedOwners().length,
      paused: this.pauseGate.isPaused()
    });
    if (this.settings) {
      void this.stateStore.save(this.exportLedger(this.settings));
    }
  }

  private exportLedger(settings: StakingSettings): PersistedLedger {
    return {
      settings: toPersistedSettings(settings),
      registry: this.registry.snapshot(),
      paused: this.pauseGate.isPaused(),
      nextSequence: this.nextSequence
    };
  }

  private restoreLedger(saved: PersistedLedger): void {
    const settings = fromPersistedSettings(saved.settings);
    if (settings.custodyAddress !== this.custodyAddress) {
      throw new Error(
        `Saved ledger belongs to custody ${settings.custodyAddress}, configured custody is ${this.custodyAddress}`
      );
    }
    this.registry.restore(saved.registry);
    if (this.registry.countStaked() !== this.registry.activeStakesCount) {
      throw new Error('Saved ledger active stake count does not match its staked entries');
    }
    this.settings = settings;
    this.pauseGate.setPaused(saved.paused);
    this.nextSequence = saved.nextSequence;
    this.logger.log(
      `Restored staking ledger: ${this.registry.stakesCount} entries, ${this.registry.activeStakesCount} active`
    );
  }

  private initParamsFromConfig(): StakingInitParams {
    return {
      collectionAddress: this.config.get<string>('staking.collectionAddress', ''),
      rewardTokenAddress: this.config.get<string>('staking.rewardTokenAddress', ''),
      rewardPerBlock: parseAmount(this.config.get<string>('staking.rewardPerBlock', '0'), 'STAKING_REWARD_PER_BLOCK'),
      earlyExitTax: parseAmount(this.config.get<string>('staking.earlyExitTax', '0'), 'STAKING_EARLY_EXIT_TAX'),
      stakeLimit: this.config.get<number>('staking.stakeLimit', 0),
      carryAmount: parseAmount(this.config.get<string>('staking.carryAmount', '0'), 'STAKING_CARRY_AMOUNT'),
      stakingDurationHours: this.config.get<number>('staking.durationHours', 0),
      unbondingPeriodHours: this.config.get<number>('staking.unbondingHours', 0)
    };
  }
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
