import { Module } from '@nestjs/common';
import { StakingModule } from '../staking/staking.module.js';
import { HealthController } from './health.controller.js';

@Module({
  imports: [StakingModule],
  controllers: [HealthController]
})
export class HealthModule {}
