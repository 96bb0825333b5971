import { Module } from '@nestjs/common';
import { AccessControlModule } from '../access-control/access-control.module.js';
import { AuthSessionModule } from '../auth-session/auth-session.module.js';
import { CustodyController } from './custody.controller.js';
import { InMemoryAssetCustodian } from './in-memory-asset.custodian.js';
import { InMemoryTokenLedger } from './in-memory-token.ledger.js';

@Module({
  imports: [AccessControlModule, AuthSessionModule],
  providers: [InMemoryAssetCustodian, InMemoryTokenLedger],
  controllers: [CustodyController],
  exports: [InMemoryAssetCustodian, InMemoryTokenLedger]
})
export class CustodyModule {}
