import { Body, Controller, HttpCode, HttpStatus, Param, Post, Put, Req, Res } from '@nestjs/common';
import type { Request, Response } from 'express';
import { createResponseMeta } from '../../common/response-meta.js';
import { AuthSessionService } from '../auth-session/auth-session.service.js';
import { extractSessionId } from '../auth-session/session-cookie.js';
import { AmountSettingDto, CountSettingDto, HoursSettingDto } from './dto/staking-requests.dto.js';
import { toStakingConfigDto } from './staking.mapper.js';
import { parseAmount, parseAssetId, parseCount, parseHours } from './staking.params.js';
import { StakingService } from './staking.service.js';
import type { StakingSettings } from './staking.types.js';

/** Privileged ledger operations; the authorization gate decides per action. */
@Controller('/api/staking/admin')
export class StakingAdminController {
  constructor(private readonly staking: StakingService, private readonly sessions: AuthSessionService) {}

  @Put('stake-limit')
  setStakeLimit(@Body() body: CountSettingDto, @Req() req: Request, @Res({ passthrough: true }) res: Response) {
    const settings = this.staking.setStakeLimit(this.caller(req), parseCount(body.value, 'value'));
    return this.settingsResponse(settings, req, res);
  }

  @Put('reward-per-block')
  setRewardPerBlock(@Body() body: AmountSettingDto, @Req() req: Request, @Res({ passthrough: true }) res: Response) {
    const settings = this.staking.setRewardPerBlock(this.caller(req), parseAmount(body.amount, 'amount'));
    return this.settingsResponse(settings, req, res);
  }

  @Put('early-exit-tax')
  setEarlyExitTax(@Body() body: AmountSettingDto, @Req() req: Request, @Res({ passthrough: true }) res: Response) {
    const settings = this.staking.setEarlyExitTax(this.caller(req), parseAmount(body.amount, 'amount'));
    return this.settingsResponse(settings, req, res);
  }

  @Put('carry-amount')
  setCarryAmount(@Body() body: AmountSettingDto, @Req() req: Request, @Res({ passthrough: true }) res: Response) {
    const settings = this.staking.setCarryAmount(this.caller(req), parseAmount(body.amount, 'amount'));
    return this.settingsResponse(settings, req, res);
  }

  @Put('staking-end-time')
  setStakingEndTime(@Body() body: HoursSettingDto, @Req() req: Request, @Res({ passthrough: true }) res: Response) {
    const settings = this.staking.setStakingEndTime(this.caller(req), parseHours(body.hours, 'hours'));
    return this.settingsResponse(settings, req, res);
  }

  @Put('unbonding-period')
  setUnbondingPeriod(@Body() body: HoursSettingDto, @Req() req: Request, @Res({ passthrough: true }) res: Response) {
    const settings = this.staking.setUnbondingPeriod(this.caller(req), parseHours(body.hours, 'hours'));
    return this.settingsResponse(settings, req, res);
  }

  @Post('pause')
  @HttpCode(HttpStatus.OK)
  pause(@Req() req: Request, @Res({ passthrough: true }) res: Response) {
    this.staking.pause(this.caller(req));
    return { data: { paused: true }, meta: createResponseMeta(req, res) };
  }

  @Post('unpause')
  @HttpCode(HttpStatus.OK)
  unpause(@Req() req: Request, @Res({ passthrough: true }) res: Response) {
    this.staking.unpause(this.caller(req));
    return { data: { paused: false }, meta: createResponseMeta(req, res) };
  }

  @Post('withdraw-reward-pool')
  @HttpCode(HttpStatus.OK)
  withdrawRewardPool(@Req() req: Request, @Res({ passthrough: true }) res: Response) {
    const amount = this.staking.forceWithdrawRewardPool(this.caller(req));
    return { data: { amount: amount.toString() }, meta: createResponseMeta(req, res) };
  }

  @Post('assets/:assetId/withdraw')
  @HttpCode(HttpStatus.OK)
  withdrawAsset(@Param('assetId') assetId: string, @Req() req: Request, @Res({ passthrough: true }) res: Response) {
    const id = parseAssetId(assetId);
    const recipient = this.staking.forceWithdrawAsset(this.caller(req), id);
    return { data: { assetId: id, recipient }, meta: createResponseMeta(req, res) };
  }

  private settingsResponse(settings: StakingSettings, req: Request, res: Response) {
    return { data: toStakingConfigDto(settings, this.staking.isPaused()), meta: createResponseMeta(req, res) };
  }

  private caller(req: Request): string {
    return this.sessions.requireSessionAddress(extractSessionId(req));
  }
}
