import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { AuthorizationGate, Journaled, PauseGate } from '../staking/staking.collaborators.js';
import type { PrivilegedAction } from '../staking/staking.types.js';

export type AccessRole = 'admin' | 'pauser';

const ACTION_ROLES: Record<PrivilegedAction, AccessRole> = {
  setStakeLimit: 'admin',
  setRewardPerBlock: 'admin',
  setEarlyExitTax: 'admin',
  setCarryAmount: 'admin',
  setStakingEndTime: 'admin',
  setUnbondingPeriod: 'admin',
  pause: 'pauser',
  unpause: 'pauser',
  forceWithdrawRewardPool: 'admin',
  forceWithdrawAsset: 'admin',
  mintAsset: 'admin',
  mintToken: 'admin'
};

@Injectable()
export class AccessControlService implements AuthorizationGate, PauseGate, Journaled {
  private readonly logger = new Logger(AccessControlService.name);
  private readonly roles = new Map<string, Set<AccessRole>>();
  private paused = false;

  constructor(private readonly config: ConfigService) {
    for (const address of this.config.get<string[]>('staking.admins', [])) {
      this.grantRole(address, 'admin');
    }
    for (const address of this.config.get<string[]>('staking.pausers', [])) {
      this.grantRole(address, 'pauser');
    }
  }

  grantRole(address: string, role: AccessRole): void {
    const key = address.toLowerCase();
    const held = this.roles.get(key) ?? new Set<AccessRole>();
    held.add(role);
    this.roles.set(key, held);
    this.logger.log(`Granted ${role} to ${key}`);
  }

  revokeRole(address: string, role: AccessRole): void {
    const key = address.toLowerCase();
    const held = this.roles.get(key);
    if (!held) return;
    held.delete(role);
    if (held.size === 0) this.roles.delete(key);
  }

  hasRole(address: string, role: AccessRole): boolean {
    return this.roles.get(address.toLowerCase())?.has(role) ?? false;
  }

  isAuthorized(caller: string, action: PrivilegedAction): boolean {
    return this.hasRole(caller, ACTION_ROLES[action]);
  }

  isPaused(): boolean {
    return this.paused;
  }

  setPaused(paused: boolean): void {
    this.paused = paused;
  }

  checkpoint(): () => void {
    const paused = this.paused;
    return () => {
      this.paused = paused;
    };
  }
}
