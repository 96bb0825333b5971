import { Module } from '@nestjs/common';
import { AuthSessionService } from './auth-session.service.js';
import { AuthSessionController } from './auth-session.controller.js';

@Module({
  providers: [AuthSessionService],
  controllers: [AuthSessionController],
  exports: [AuthSessionService]
})
export class AuthSessionModule {}
