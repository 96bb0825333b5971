import { ConfigService } from '@nestjs/config';
import { AccessControlService } from '../src/modules/access-control/access-control.service.js';

describe('AccessControlService', () => {
  let access: AccessControlService;

  beforeEach(() => {
    access = new AccessControlService(new ConfigService({ staking: { admins: ['0xAD'], pausers: ['0xbb'] } }));
  });

  it('grants configured roles by lowercase address', () => {
    expect(access.hasRole('0xad', 'admin')).toBe(true);
    expect(access.isAuthorized('0xAd', 'setStakeLimit')).toBe(true);
    expect(access.isAuthorized('0xad', 'pause')).toBe(false);
    expect(access.isAuthorized('0xbb', 'unpause')).toBe(true);
    expect(access.isAuthorized('0xbb', 'forceWithdrawAsset')).toBe(false);
  });

  it('revokes roles', () => {
    access.grantRole('0xbb', 'admin');
    access.revokeRole('0xbb', 'pauser');
    expect(access.isAuthorized('0xbb', 'pause')).toBe(false);
    expect(access.isAuthorized('0xbb', 'mintToken')).toBe(true);
  });

  it('restores the pause flag from a checkpoint', () => {
    const rollback = access.checkpoint();
    access.setPaused(true);
    expect(access.isPaused()).toBe(true);
    rollback();
    expect(access.isPaused()).toBe(false);
  });
});
