import {
  BadRequestException,
  Body,
  Controller,
  ForbiddenException,
  Get,
  NotFoundException,
  Param,
  Post,
  Req,
  Res
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { Request, Response } from 'express';
import { createResponseMeta } from '../../common/response-meta.js';
import { AccessControlService } from '../access-control/access-control.service.js';
import { AuthSessionService } from '../auth-session/auth-session.service.js';
import { extractSessionId } from '../auth-session/session-cookie.js';
import { parseAddress, parseAmount, parseAssetId } from '../staking/staking.params.js';
import type { PrivilegedAction } from '../staking/staking.types.js';
import { CustodyError } from './custody.errors.js';
import { InMemoryAssetCustodian } from './in-memory-asset.custodian.js';
import { InMemoryTokenLedger } from './in-memory-token.ledger.js';
import { MintAssetDto, MintTokensDto } from './dto/mint.dto.js';

/** Read access to the in-process collection and token ledger, plus admin minting for local runs. */
@Controller('/api/custody')
export class CustodyController {
  private readonly mintEnabled: boolean;

  constructor(
    private readonly assets: InMemoryAssetCustodian,
    private readonly tokens: InMemoryTokenLedger,
    private readonly access: AccessControlService,
    private readonly sessions: AuthSessionService,
    config: ConfigService
  ) {
    this.mintEnabled = config.get<boolean>('custody.mintEnabled', true);
  }

  @Get('assets/:assetId')
  getAsset(@Param('assetId') assetId: string, @Req() req: Request, @Res({ passthrough: true }) res: Response) {
    const id = parseAssetId(assetId);
    const owner = this.assets.ownerOf(id);
    if (!owner) {
      throw new NotFoundException(`Asset ${id} does not exist`);
    }
    return { data: { assetId: id, owner }, meta: createResponseMeta(req, res) };
  }

  @Get('balances/:address')
  getBalance(@Param('address') address: string, @Req() req: Request, @Res({ passthrough: true }) res: Response) {
    const holder = parseAddress(address, 'address');
    return {
      data: { address: holder, balance: this.tokens.balanceOf(holder).toString() },
      meta: createResponseMeta(req, res)
    };
  }

  @Post('assets')
  mintAsset(@Body() body: MintAssetDto, @Req() req: Request, @Res({ passthrough: true }) res: Response) {
    this.requireMinter(req, 'mintAsset');
    const to = parseAddress(body.to, 'to');
    const assetId = parseAssetId(body.assetId);
    this.mint(() => this.assets.mint(to, assetId));
    return { data: { assetId, owner: to }, meta: createResponseMeta(req, res) };
  }

  @Post('balances')
  mintTokens(@Body() body: MintTokensDto, @Req() req: Request, @Res({ passthrough: true }) res: Response) {
    this.requireMinter(req, 'mintToken');
    const to = parseAddress(body.to, 'to');
    const amount = parseAmount(body.amount, 'amount');
    this.mint(() => this.tokens.mint(to, amount));
    return {
      data: { address: to, balance: this.tokens.balanceOf(to).toString() },
      meta: createResponseMeta(req, res)
    };
  }

  private requireMinter(req: Request, action: PrivilegedAction): void {
    if (!this.mintEnabled) {
      throw new NotFoundException('Minting is disabled');
    }
    const caller = this.sessions.requireSessionAddress(extractSessionId(req));
    if (!this.access.isAuthorized(caller, action)) {
      throw new ForbiddenException(`${caller} may not ${action}`);
    }
  }

  private mint(action: () => void): void {
    try {
      action();
    } catch (error) {
      if (error instanceof CustodyError) {
        throw new BadRequestException(error.message);
      }
      throw error;
    }
  }
}
