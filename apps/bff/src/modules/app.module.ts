import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import configuration from '../common/configuration.js';
import { AuthSessionModule } from './auth-session/auth-session.module.js';
import { CustodyModule } from './custody/custody.module.js';
import { HealthModule } from './health/health.module.js';
import { MetricsModule } from './metrics/metrics.module.js';
import { StakingModule } from './staking/staking.module.js';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [configuration],
      // Later entries override earlier ones
      envFilePath: ['apps/bff/.env', '.env', '.env.local', '../../.env', '../../.env.local']
    }),
    HealthModule,
    MetricsModule,
    AuthSessionModule,
    CustodyModule,
    StakingModule
  ]
})
export class AppModule {}
