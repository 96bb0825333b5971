import { Body, Controller, Get, Post, Req, Res, UnauthorizedException } from '@nestjs/common';
import type { Request, Response } from 'express';
import { AuthSessionService, type VerifyChallengeParams } from './auth-session.service.js';
import { clearSessionCookie, extractSessionId, setSessionCookie } from './session-cookie.js';

interface ChallengeRequestBody {
  address?: string;
}

@Controller('api/session')
export class AuthSessionController {
  constructor(private readonly authSessionService: AuthSessionService) {}

  @Post('challenge')
  createChallenge(@Body() body: ChallengeRequestBody) {
    return { data: this.authSessionService.createChallenge(body.address) };
  }

  @Post('verify')
  verifySession(@Body() body: VerifyChallengeParams, @Res({ passthrough: true }) res: Response) {
    const { sessionId, address, expiresAt } = this.authSessionService.verifyChallenge(body);
    setSessionCookie(res, sessionId, this.authSessionService.sessionTtlSeconds);
    return { data: { address, expiresAt }, sessionId };
  }

  @Get('me')
  getSession(@Req() req: Request, @Res({ passthrough: true }) res: Response) {
    const session = this.authSessionService.getSession(extractSessionId(req));
    if (!session) {
      clearSessionCookie(res);
      throw new UnauthorizedException('Session not found or expired');
    }
    return { data: session };
  }

  @Post('logout')
  logout(@Req() req: Request, @Res({ passthrough: true }) res: Response) {
    const sessionId = extractSessionId(req);
    if (sessionId) {
      this.authSessionService.destroySession(sessionId);
    }
    clearSessionCookie(res);
    return { data: true };
  }
}
