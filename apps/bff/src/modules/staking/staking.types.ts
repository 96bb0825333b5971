export const STAKE_STATES = {
  STAKED: 'Staked',
  UNBONDING: 'Unbonding',
  FREE: 'Free'
} as const;

export type StakeState = (typeof STAKE_STATES)[keyof typeof STAKE_STATES];

/** One record per asset currently held in custody for staking. */
export interface StakeEntry {
  state: StakeState;
  owner: string;
  stakedAt: number; // Unix seconds
  unbondingAt: number; // 0 while staked; completion time (natural) or tax-payment time (forced)
  lastClaimedBlock: number;
}

export interface StakingSettings {
  collectionAddress: string;
  rewardTokenAddress: string;
  custodyAddress: string;
  rewardPerBlock: bigint;
  earlyExitTax: bigint;
  carryAmount: bigint;
  stakeLimit: number;
  stakingEndTime: number; // Unix seconds
  unbondingPeriod: number; // seconds
}

export interface StakingInitParams {
  collectionAddress: string;
  rewardTokenAddress: string;
  rewardPerBlock: bigint;
  earlyExitTax: bigint;
  stakeLimit: number;
  carryAmount: bigint;
  stakingDurationHours: number;
  unbondingPeriodHours: number;
}

export type PrivilegedAction =
  | 'setStakeLimit'
  | 'setRewardPerBlock'
  | 'setEarlyExitTax'
  | 'setCarryAmount'
  | 'setStakingEndTime'
  | 'setUnbondingPeriod'
  | 'pause'
  | 'unpause'
  | 'forceWithdrawRewardPool'
  | 'forceWithdrawAsset'
  | 'mintAsset'
  | 'mintToken';

export type StakingEventType =
  | 'Staked'
  | 'Unstaked'
  | 'Withdrawn'
  | 'RewardClaimed'
  | 'SettingsUpdated'
  | 'Paused'
  | 'Unpaused'
  | 'RewardPoolDrained'
  | 'AssetRescued';

export interface StakingEvent {
  sequence: number;
  type: StakingEventType;
  at: number;
  block: number;
  assetId?: string;
  account?: string;
  amount?: bigint;
  detail?: string;
}

export interface UnstakeResult {
  assetId: string;
  state: StakeState;
  unbondingAt: number;
  reward: bigint;
  taxPaid: bigint;
  withdrawn: boolean;
}

export interface WithdrawResult {
  assetId: string;
  owner: string;
  reward: bigint;
  taxPaid: bigint;
  carryReturned: bigint;
  sunset: boolean;
}

export interface ClaimResult {
  assetId: string;
  reward: bigint;
}

export interface ClaimAllResult {
  claims: ClaimResult[];
  total: bigint;
}
