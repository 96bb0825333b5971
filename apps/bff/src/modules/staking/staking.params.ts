import { SECONDS_PER_HOUR } from './ledger-clock.js';
import { StakingException } from './staking.errors.js';

const ASSET_ID_REGEX = /^[A-Za-z0-9:_-]{1,128}$/;
const ADDRESS_REGEX = /^0x[0-9a-fA-F]{1,64}$/;
const DIGITS_REGEX = /^\d+$/;

export function parseAmount(value: unknown, field: string): bigint {
  if (typeof value === 'bigint' && value >= 0n) {
    return value;
  }
  if (typeof value === 'number' && Number.isSafeInteger(value) && value >= 0) {
    return BigInt(value);
  }
  if (typeof value === 'string' && DIGITS_REGEX.test(value.trim())) {
    return BigInt(value.trim());
  }
  throw new StakingException('InvalidParameter', `${field} must be a non-negative integer amount`);
}

export function parseCount(value: unknown, field: string): number {
  const parsed = typeof value === 'string' && DIGITS_REGEX.test(value.trim()) ? Number(value.trim()) : value;
  if (typeof parsed !== 'number' || !Number.isSafeInteger(parsed) || parsed < 0) {
    throw new StakingException('InvalidParameter', `${field} must be a non-negative integer`);
  }
  return parsed;
}

export function parseHours(value: unknown, field: string): number {
  const parsed = typeof value === 'string' && value.trim() !== '' ? Number(value.trim()) : value;
  if (typeof parsed !== 'number' || !Number.isFinite(parsed) || parsed < 0) {
    throw new StakingException('InvalidParameter', `${field} must be a non-negative number of hours`);
  }
  return parsed;
}

export function hoursToSeconds(hours: number): number {
  return Math.floor(hours * SECONDS_PER_HOUR);
}

export function parseAssetId(value: unknown): string {
  const assetId = typeof value === 'string' ? value.trim() : '';
  if (!ASSET_ID_REGEX.test(assetId)) {
    throw new StakingException('InvalidParameter', 'assetId must be 1-128 characters of [A-Za-z0-9:_-]');
  }
  return assetId;
}

export function parseAddress(value: unknown, field: string): string {
  const address = typeof value === 'string' ? value.trim().toLowerCase() : '';
  if (!ADDRESS_REGEX.test(address)) {
    throw new StakingException('InvalidParameter', `${field} must be a 0x-prefixed hex address`);
  }
  return address;
}

export function parseFlag(value: unknown): boolean {
  return value === true || value === 'true';
}
