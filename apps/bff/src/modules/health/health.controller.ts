import { Controller, Get } from '@nestjs/common';
import { StakingService } from '../staking/staking.service.js';

@Controller('/health')
export class HealthController {
  constructor(private readonly staking: StakingService) {}

  @Get()
  check() {
    return {
      status: 'ok',
      initialized: this.staking.initialized,
      paused: this.staking.isPaused(),
      timestamp: new Date().toISOString()
    };
  }
}
