import { Injectable, Logger } from '@nestjs/common';
import type { Journaled, TokenLedger } from '../staking/staking.collaborators.js';
import { CustodyError } from './custody.errors.js';

@Injectable()
export class InMemoryTokenLedger implements TokenLedger, Journaled {
  private readonly logger = new Logger(InMemoryTokenLedger.name);
  private balances = new Map<string, bigint>();

  mint(to: string, amount: bigint): void {
    if (amount <= 0n) {
      throw new CustodyError('Mint amount must be positive');
    }
    this.balances.set(to, this.balanceOf(to) + amount);
    this.logger.log(`Minted ${amount} to ${to}`);
  }

  balanceOf(holder: string): bigint {
    return this.balances.get(holder) ?? 0n;
  }

  transfer(from: string, to: string, amount: bigint): void {
    if (amount < 0n) {
      throw new CustodyError('Transfer amount must not be negative');
    }
    if (amount === 0n || from === to) {
      return;
    }
    const available = this.balanceOf(from);
    if (available < amount) {
      throw new CustodyError(`Insufficient balance: ${from} holds ${available}, needs ${amount}`);
    }
    this.balances.set(from, available - amount);
    this.balances.set(to, this.balanceOf(to) + amount);
  }

  checkpoint(): () => void {
    const saved = new Map(this.balances);
    return () => {
      this.balances = new Map(saved);
    };
  }
}
