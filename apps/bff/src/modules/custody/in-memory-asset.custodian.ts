import { Injectable, Logger } from '@nestjs/common';
import {
  ASSET_RECEIVED,
  type AssetCustodian,
  type AssetReceiver,
  type AssetReceiverRegistry,
  type Journaled
} from '../staking/staking.collaborators.js';
import { CustodyError } from './custody.errors.js';

/**
 * Process-local stand-in for the unique-asset collection. Transfers to an
 * address with a registered receiver must be acknowledged by it.
 */
@Injectable()
export class InMemoryAssetCustodian implements AssetCustodian, AssetReceiverRegistry, Journaled {
  private readonly logger = new Logger(InMemoryAssetCustodian.name);
  private owners = new Map<string, string>();
  private readonly receivers = new Map<string, AssetReceiver>();

  mint(to: string, assetId: string): void {
    if (this.owners.has(assetId)) {
      throw new CustodyError(`Asset ${assetId} already exists`);
    }
    this.owners.set(assetId, to);
    this.logger.log(`Minted asset ${assetId} to ${to}`);
  }

  ownerOf(assetId: string): string | null {
    return this.owners.get(assetId) ?? null;
  }

  transfer(from: string, to: string, assetId: string): void {
    const owner = this.owners.get(assetId);
    if (owner !== from) {
      throw new CustodyError(`Asset ${assetId} is not held by ${from}`);
    }
    this.owners.set(assetId, to);

    const receiver = this.receivers.get(to);
    if (!receiver) {
      return;
    }
    try {
      const ack = receiver.onAssetReceived(from, assetId);
      if (ack !== ASSET_RECEIVED) {
        throw new CustodyError(`Receiver ${to} rejected asset ${assetId}`);
      }
    } catch (error) {
      this.owners.set(assetId, from);
      throw error;
    }
  }

  registerReceiver(address: string, receiver: AssetReceiver): void {
    this.receivers.set(address, receiver);
  }

  checkpoint(): () => void {
    const saved = new Map(this.owners);
    return () => {
      this.owners = new Map(saved);
    };
  }
}
