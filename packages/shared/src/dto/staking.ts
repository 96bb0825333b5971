/**
 * Staking ledger DTOs shared by the BFF and its clients.
 * Amounts travel as stringified bigints in the reward token's smallest unit.
 */

export type StakeStateDto = 'Staked' | 'Unbonding' | 'Free';

export interface StakeInfoDto {
  assetId: string;
  owner: string;
  state: StakeStateDto;
  stakedAt: number; // Unix timestamp in seconds
  unbondingAt: number; // 0 while staked; completion time or tax-payment time otherwise
  lastClaimedBlock: number;
}

export interface OwnerStakesDto {
  owner: string;
  count: number;
  assetIds: string[];
}

export interface PendingRewardDto {
  assetId: string;
  pendingReward: string; // stringified bigint
  blockHeight: number;
}

export interface StakingConfigDto {
  collectionAddress: string;
  rewardTokenAddress: string;
  custodyAddress: string;
  rewardPerBlock: string;
  earlyExitTax: string;
  carryAmount: string;
  stakeLimit: number;
  stakingEndTime: number; // Unix timestamp in seconds
  unbondingPeriod: number; // seconds
  paused: boolean;
}

export interface StakingStatsDto {
  totalStakes: number;
  activeStakeCount: number;
  trackedOwners: number;
  trackedAssets: number;
}

export interface UnstakeResultDto {
  assetId: string;
  state: StakeStateDto;
  unbondingAt: number;
  reward: string;
  taxPaid: string;
  withdrawn: boolean;
}

export interface WithdrawResultDto {
  assetId: string;
  owner: string;
  reward: string;
  taxPaid: string;
  carryReturned: string;
  sunset: boolean;
}

export interface ClaimResultDto {
  assetId: string;
  reward: string;
}

export interface ClaimAllResultDto {
  claims: ClaimResultDto[];
  total: string;
}

export type StakingEventTypeDto =
  | 'Staked'
  | 'Unstaked'
  | 'Withdrawn'
  | 'RewardClaimed'
  | 'SettingsUpdated'
  | 'Paused'
  | 'Unpaused'
  | 'RewardPoolDrained'
  | 'AssetRescued';

export interface StakingEventDto {
  sequence: number;
  type: StakingEventTypeDto;
  at: number; // Unix timestamp in seconds
  block: number;
  assetId?: string;
  account?: string;
  amount?: string;
  detail?: string;
}
