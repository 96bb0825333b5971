import { Body, Controller, Get, HttpCode, HttpStatus, Inject, Param, Post, Query, Req, Res } from '@nestjs/common';
import type { Request, Response } from 'express';
import type { OwnerStakesDto, PendingRewardDto, StakingStatsDto } from '@stakevault/shared/dto/staking';
import { createResponseMeta } from '../../common/response-meta.js';
import { AuthSessionService } from '../auth-session/auth-session.service.js';
import { extractSessionId } from '../auth-session/session-cookie.js';
import { ExitRequestDto, StakeRequestDto } from './dto/staking-requests.dto.js';
import { LEDGER_CLOCK, type LedgerClock } from './ledger-clock.js';
import {
  toClaimAllResultDto,
  toClaimResultDto,
  toStakeInfoDto,
  toStakingConfigDto,
  toStakingEventDto,
  toUnstakeResultDto,
  toWithdrawResultDto
} from './staking.mapper.js';
import { parseAddress, parseAssetId, parseCount, parseFlag } from './staking.params.js';
import { StakingService } from './staking.service.js';

@Controller('/api/staking')
export class StakingController {
  constructor(
    private readonly staking: StakingService,
    private readonly sessions: AuthSessionService,
    @Inject(LEDGER_CLOCK) private readonly clock: LedgerClock
  ) {}

  @Post('stakes')
  stake(@Body() body: StakeRequestDto, @Req() req: Request, @Res({ passthrough: true }) res: Response) {
    const caller = this.caller(req);
    const assetId = parseAssetId(body.assetId);
    const entry = this.staking.stake(caller, assetId);
    return { data: toStakeInfoDto(assetId, entry), meta: createResponseMeta(req, res) };
  }

  @Post('stakes/:assetId/unstake')
  @HttpCode(HttpStatus.OK)
  unstake(
    @Param('assetId') assetId: string,
    @Body() body: ExitRequestDto,
    @Req() req: Request,
    @Res({ passthrough: true }) res: Response
  ) {
    const result = this.staking.unstake(this.caller(req), parseAssetId(assetId), parseFlag(body.forceWithTax));
    return { data: toUnstakeResultDto(result), meta: createResponseMeta(req, res) };
  }

  @Post('stakes/:assetId/withdraw')
  @HttpCode(HttpStatus.OK)
  withdraw(
    @Param('assetId') assetId: string,
    @Body() body: ExitRequestDto,
    @Req() req: Request,
    @Res({ passthrough: true }) res: Response
  ) {
    const result = this.staking.withdraw(this.caller(req), parseAssetId(assetId), parseFlag(body.forceWithTax));
    return { data: toWithdrawResultDto(result), meta: createResponseMeta(req, res) };
  }

  @Post('stakes/:assetId/claim')
  @HttpCode(HttpStatus.OK)
  claim(@Param('assetId') assetId: string, @Req() req: Request, @Res({ passthrough: true }) res: Response) {
    const result = this.staking.claimReward(this.caller(req), parseAssetId(assetId));
    return { data: toClaimResultDto(result), meta: createResponseMeta(req, res) };
  }

  @Post('rewards/claim-all')
  @HttpCode(HttpStatus.OK)
  claimAll(@Req() req: Request, @Res({ passthrough: true }) res: Response) {
    const result = this.staking.claimAllRewards(this.caller(req));
    return { data: toClaimAllResultDto(result), meta: createResponseMeta(req, res) };
  }

  @Get('owners/:owner/stakes')
  listByOwner(@Param('owner') owner: string, @Req() req: Request, @Res({ passthrough: true }) res: Response) {
    const address = parseAddress(owner, 'owner');
    const data: OwnerStakesDto = {
      owner: address,
      count: this.staking.stakeCount(address),
      assetIds: this.staking.listStakesByOwner(address)
    };
    return { data, meta: createResponseMeta(req, res) };
  }

  @Get('stakes/:assetId')
  stakeInfo(@Param('assetId') assetId: string, @Req() req: Request, @Res({ passthrough: true }) res: Response) {
    const id = parseAssetId(assetId);
    return { data: toStakeInfoDto(id, this.staking.stakeInfo(id)), meta: createResponseMeta(req, res) };
  }

  @Get('stakes/:assetId/pending-reward')
  pendingReward(@Param('assetId') assetId: string, @Req() req: Request, @Res({ passthrough: true }) res: Response) {
    const id = parseAssetId(assetId);
    const data: PendingRewardDto = {
      assetId: id,
      pendingReward: this.staking.pendingReward(id).toString(),
      blockHeight: this.clock.blockHeight()
    };
    return { data, meta: createResponseMeta(req, res) };
  }

  @Get('config')
  getConfig(@Req() req: Request, @Res({ passthrough: true }) res: Response) {
    return {
      data: toStakingConfigDto(this.staking.getSettings(), this.staking.isPaused()),
      meta: createResponseMeta(req, res)
    };
  }

  @Get('tracked/owners')
  trackedOwners(@Req() req: Request, @Res({ passthrough: true }) res: Response) {
    return { data: this.staking.trackedOwners(), meta: createResponseMeta(req, res) };
  }

  @Get('tracked/assets')
  trackedAssets(@Req() req: Request, @Res({ passthrough: true }) res: Response) {
    return { data: this.staking.trackedAssets(), meta: createResponseMeta(req, res) };
  }

  @Get('stats')
  stats(@Req() req: Request, @Res({ passthrough: true }) res: Response) {
    const data: StakingStatsDto = {
      totalStakes: this.staking.totalStakes(),
      activeStakeCount: this.staking.activeStakeCount(),
      trackedOwners: this.staking.trackedOwners().length,
      trackedAssets: this.staking.trackedAssets().length
    };
    return { data, meta: createResponseMeta(req, res) };
  }

  @Get('events')
  events(@Query('limit') limit: string | undefined, @Req() req: Request, @Res({ passthrough: true }) res: Response) {
    const events = limit === undefined ? this.staking.events() : this.staking.events(parseCount(limit, 'limit'));
    return { data: events.map(toStakingEventDto), meta: createResponseMeta(req, res) };
  }

  private caller(req: Request): string {
    return this.sessions.requireSessionAddress(extractSessionId(req));
  }
}
