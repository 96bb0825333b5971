import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { blake3 } from '@noble/hashes/blake3';
import { bytesToHex, utf8ToBytes } from '@noble/hashes/utils';
import { promises as fs } from 'node:fs';
import path from 'node:path';
import type { RegistrySnapshot } from './stake.registry.js';
import { STAKE_STATES, type StakeEntry, type StakeState, type StakingSettings } from './staking.types.js';

export const LEDGER_FILE_VERSION = 1;

export interface PersistedSettings {
  collectionAddress: string;
  rewardTokenAddress: string;
  custodyAddress: string;
  rewardPerBlock: string;
  earlyExitTax: string;
  carryAmount: string;
  stakeLimit: number;
  stakingEndTime: number;
  unbondingPeriod: number;
}

export interface PersistedLedger {
  settings: PersistedSettings;
  registry: RegistrySnapshot;
  paused: boolean;
  nextSequence: number;
}

interface LedgerFile {
  version: number;
  savedAt: string;
  checksum: string;
  ledger: PersistedLedger;
}

export function toPersistedSettings(settings: StakingSettings): PersistedSettings {
  return {
    ...settings,
    rewardPerBlock: settings.rewardPerBlock.toString(),
    earlyExitTax: settings.earlyExitTax.toString(),
    carryAmount: settings.carryAmount.toString()
  };
}

export function fromPersistedSettings(settings: PersistedSettings): StakingSettings {
  return {
    ...settings,
    rewardPerBlock: BigInt(settings.rewardPerBlock),
    earlyExitTax: BigInt(settings.earlyExitTax),
    carryAmount: BigInt(settings.carryAmount)
  };
}

const checksumOf = (ledger: unknown): string => bytesToHex(blake3(utf8ToBytes(JSON.stringify(ledger))));

/**
 * Keeps a JSON copy of the ledger on disk. Writes are queued so they land in
 * commit order; without `staking.stateFile` the store is a no-op.
 */
@Injectable()
export class StakingStateStore {
  private readonly logger = new Logger(StakingStateStore.name);
  private readonly filePath?: string;
  private pending: Promise<void> = Promise.resolve();

  constructor(private readonly config: ConfigService) {
    const configured = this.config.get<string>('staking.stateFile');
    this.filePath = configured && configured.trim() ? path.resolve(configured.trim()) : undefined;
  }

  get enabled(): boolean {
    return this.filePath !== undefined;
  }

  async load(): Promise<PersistedLedger | null> {
    if (!this.filePath) {
      return null;
    }
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) {
        this.logger.log(`No ledger state at ${this.filePath}; starting empty`);
        return null;
      }
      throw error;
    }

    const parsed: unknown = JSON.parse(raw);
    if (!isRecord(parsed) || parsed.version !== LEDGER_FILE_VERSION) {
      throw new Error(`Unsupported ledger state version in ${this.filePath}`);
    }
    if (typeof parsed.checksum !== 'string' || parsed.checksum !== checksumOf(parsed.ledger)) {
      throw new Error(`Ledger state checksum mismatch in ${this.filePath}`);
    }
    const ledger = parseLedger(parsed.ledger);
    this.logger.log(`Loaded ledger state with ${ledger.registry.entries.length} entries from ${this.filePath}`);
    return ledger;
  }

  save(ledger: PersistedLedger): Promise<void> {
    const target = this.filePath;
    if (!target) {
      return this.pending;
    }
    const file: LedgerFile = {
      version: LEDGER_FILE_VERSION,
      savedAt: new Date().toISOString(),
      checksum: checksumOf(ledger),
      ledger
    };
    const body = `${JSON.stringify(file, null, 2)}\n`;
    this.pending = this.pending
      .then(() => this.write(target, body))
      .catch((error) => {
        this.logger.error(`Failed to persist ledger state to ${target}`, error instanceof Error ? error.stack : error);
      });
    return this.pending;
  }

  /** Resolves once every queued write has settled. */
  flush(): Promise<void> {
    return this.pending;
  }

  private async write(target: string, body: string): Promise<void> {
    await fs.mkdir(path.dirname(target), { recursive: true });
    const temp = `${target}.tmp`;
    await fs.writeFile(temp, body, 'utf8');
    await fs.rename(temp, target);
  }
}

function isMissingFile(error: unknown): boolean {
  return isRecord(error) && error.code === 'ENOENT';
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readString(source: Record<string, unknown>, key: string): string {
  const value = source[key];
  if (typeof value !== 'string') {
    throw new Error(`Ledger state field ${key} must be a string`);
  }
  return value;
}

function readNumber(source: Record<string, unknown>, key: string): number {
  const value = source[key];
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new Error(`Ledger state field ${key} must be a number`);
  }
  return value;
}

const KNOWN_STATES: readonly StakeState[] = Object.values(STAKE_STATES);

function isStakeState(value: unknown): value is StakeState {
  return typeof value === 'string' && KNOWN_STATES.some((state) => state === value);
}

function readState(source: Record<string, unknown>): StakeState {
  const value = source.state;
  if (!isStakeState(value)) {
    throw new Error(`Ledger state has unknown stake state ${String(value)}`);
  }
  return value;
}

function parseEntry(value: unknown): [string, StakeEntry] {
  if (!Array.isArray(value) || value.length !== 2 || typeof value[0] !== 'string' || !isRecord(value[1])) {
    throw new Error('Ledger state entry must be an [assetId, entry] pair');
  }
  const entry = value[1];
  return [
    value[0],
    {
      state: readState(entry),
      owner: readString(entry, 'owner'),
      stakedAt: readNumber(entry, 'stakedAt'),
      unbondingAt: readNumber(entry, 'unbondingAt'),
      lastClaimedBlock: readNumber(entry, 'lastClaimedBlock')
    }
  ];
}

function parseOwnerAssets(value: unknown): [string, string[]] {
  if (
    !Array.isArray(value) ||
    value.length !== 2 ||
    typeof value[0] !== 'string' ||
    !Array.isArray(value[1]) ||
    !value[1].every((assetId) => typeof assetId === 'string')
  ) {
    throw new Error('Ledger state owner index must be an [owner, assetIds] pair');
  }
  return [value[0], value[1].map(String)];
}

function parseLedger(value: unknown): PersistedLedger {
  if (!isRecord(value) || !isRecord(value.settings) || !isRecord(value.registry)) {
    throw new Error('Ledger state is missing settings or registry');
  }
  const settings = value.settings;
  const registry = value.registry;
  if (!Array.isArray(registry.entries) || !Array.isArray(registry.ownerAssets)) {
    throw new Error('Ledger state registry is malformed');
  }
  return {
    settings: {
      collectionAddress: readString(settings, 'collectionAddress'),
      rewardTokenAddress: readString(settings, 'rewardTokenAddress'),
      custodyAddress: readString(settings, 'custodyAddress'),
      rewardPerBlock: readString(settings, 'rewardPerBlock'),
      earlyExitTax: readString(settings, 'earlyExitTax'),
      carryAmount: readString(settings, 'carryAmount'),
      stakeLimit: readNumber(settings, 'stakeLimit'),
      stakingEndTime: readNumber(settings, 'stakingEndTime'),
      unbondingPeriod: readNumber(settings, 'unbondingPeriod')
    },
    registry: {
      entries: registry.entries.map(parseEntry),
      ownerAssets: registry.ownerAssets.map(parseOwnerAssets),
      stakesCount: readNumber(registry, 'stakesCount'),
      activeStakesCount: readNumber(registry, 'activeStakesCount')
    },
    paused: value.paused === true,
    nextSequence: readNumber(value, 'nextSequence')
  };
}
