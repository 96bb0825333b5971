import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AccessControlModule } from '../access-control/access-control.module.js';
import { AccessControlService } from '../access-control/access-control.service.js';
import { AuthSessionModule } from '../auth-session/auth-session.module.js';
import { CustodyModule } from '../custody/custody.module.js';
import { InMemoryAssetCustodian } from '../custody/in-memory-asset.custodian.js';
import { InMemoryTokenLedger } from '../custody/in-memory-token.ledger.js';
import { MetricsModule } from '../metrics/metrics.module.js';
import { LEDGER_CLOCK, SystemLedgerClock } from './ledger-clock.js';
import { RewardEngine } from './reward.engine.js';
import { StakeRegistry } from './stake.registry.js';
import { StakingAdminController } from './staking-admin.controller.js';
import { ASSET_CUSTODIAN, AUTHORIZATION_GATE, PAUSE_GATE, TOKEN_LEDGER } from './staking.collaborators.js';
import { StakingController } from './staking.controller.js';
import { StakingService } from './staking.service.js';
import { StakingStateStore } from './staking.state-store.js';

@Module({
  imports: [MetricsModule, AccessControlModule, CustodyModule, AuthSessionModule],
  providers: [
    {
      provide: LEDGER_CLOCK,
      inject: [ConfigService],
      useFactory: (config: ConfigService) => new SystemLedgerClock(config.get<number>('staking.genesisTime', 0))
    },
    { provide: ASSET_CUSTODIAN, useExisting: InMemoryAssetCustodian },
    { provide: TOKEN_LEDGER, useExisting: InMemoryTokenLedger },
    { provide: AUTHORIZATION_GATE, useExisting: AccessControlService },
    { provide: PAUSE_GATE, useExisting: AccessControlService },
    StakeRegistry,
    RewardEngine,
    StakingStateStore,
    StakingService
  ],
  controllers: [StakingController, StakingAdminController],
  exports: [StakingService]
})
export class StakingModule {}
