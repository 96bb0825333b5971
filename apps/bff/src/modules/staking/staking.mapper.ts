import type {
  ClaimAllResultDto,
  ClaimResultDto,
  StakeInfoDto,
  StakingConfigDto,
  StakingEventDto,
  UnstakeResultDto,
  WithdrawResultDto
} from '@stakevault/shared/dto/staking';
import type {
  ClaimAllResult,
  ClaimResult,
  StakeEntry,
  StakingEvent,
  StakingSettings,
  UnstakeResult,
  WithdrawResult
} from './staking.types.js';

export function toStakeInfoDto(assetId: string, entry: StakeEntry): StakeInfoDto {
  return {
    assetId,
    owner: entry.owner,
    state: entry.state,
    stakedAt: entry.stakedAt,
    unbondingAt: entry.unbondingAt,
    lastClaimedBlock: entry.lastClaimedBlock
  };
}

export function toStakingConfigDto(settings: StakingSettings, paused: boolean): StakingConfigDto {
  return {
    collectionAddress: settings.collectionAddress,
    rewardTokenAddress: settings.rewardTokenAddress,
    custodyAddress: settings.custodyAddress,
    rewardPerBlock: settings.rewardPerBlock.toString(),
    earlyExitTax: settings.earlyExitTax.toString(),
    carryAmount: settings.carryAmount.toString(),
    stakeLimit: settings.stakeLimit,
    stakingEndTime: settings.stakingEndTime,
    unbondingPeriod: settings.unbondingPeriod,
    paused
  };
}

export function toUnstakeResultDto(result: UnstakeResult): UnstakeResultDto {
  return {
    ...result,
    reward: result.reward.toString(),
    taxPaid: result.taxPaid.toString()
  };
}

export function toWithdrawResultDto(result: WithdrawResult): WithdrawResultDto {
  return {
    ...result,
    reward: result.reward.toString(),
    taxPaid: result.taxPaid.toString(),
    carryReturned: result.carryReturned.toString()
  };
}

export function toClaimResultDto(result: ClaimResult): ClaimResultDto {
  return { assetId: result.assetId, reward: result.reward.toString() };
}

export function toClaimAllResultDto(result: ClaimAllResult): ClaimAllResultDto {
  return {
    claims: result.claims.map(toClaimResultDto),
    total: result.total.toString()
  };
}

export function toStakingEventDto(event: StakingEvent): StakingEventDto {
  const { amount, ...rest } = event;
  return amount === undefined ? rest : { ...rest, amount: amount.toString() };
}
