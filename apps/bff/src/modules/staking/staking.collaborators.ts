import type { PrivilegedAction } from './staking.types.js';

export const ASSET_CUSTODIAN = Symbol('ASSET_CUSTODIAN');
export const TOKEN_LEDGER = Symbol('TOKEN_LEDGER');
export const AUTHORIZATION_GATE = Symbol('AUTHORIZATION_GATE');
export const PAUSE_GATE = Symbol('PAUSE_GATE');

/** Acknowledgement an asset receiver must return to accept a transfer. */
export const ASSET_RECEIVED = 'stakevault.asset-received';

/** Holds the unique assets; the ledger only needs ownership reads and transfers. */
export interface AssetCustodian {
  ownerOf(assetId: string): string | null;
  transfer(from: string, to: string, assetId: string): void;
}

/** Fungible reward token balances. Transfers throw when the sender is short. */
export interface TokenLedger {
  balanceOf(holder: string): bigint;
  transfer(from: string, to: string, amount: bigint): void;
}

export interface AuthorizationGate {
  isAuthorized(caller: string, action: PrivilegedAction): boolean;
}

export interface PauseGate {
  isPaused(): boolean;
  setPaused(paused: boolean): void;
}

export interface AssetReceiver {
  onAssetReceived(from: string, assetId: string): string;
}

export interface AssetReceiverRegistry {
  registerReceiver(address: string, receiver: AssetReceiver): void;
}

/**
 * A collaborator whose state can be rolled back. `checkpoint` captures the
 * current state and returns the function that restores it.
 */
export interface Journaled {
  checkpoint(): () => void;
}

export function isJournaled(value: unknown): value is Journaled {
  return typeof value === 'object' && value !== null && 'checkpoint' in value && typeof value.checkpoint === 'function';
}

export function isAssetReceiverRegistry(value: unknown): value is AssetReceiverRegistry {
  return (
    typeof value === 'object' &&
    value !== null &&
    'registerReceiver' in value &&
    typeof value.registerReceiver === 'function'
  );
}
