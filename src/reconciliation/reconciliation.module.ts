import { Module } from '@nestjs/common';
import { EthModule } from '../eth/eth.module';
import { TransactionModule } from '../transaction/transaction.module';
import { ReconciliationService } from './reconciliation.service';

@Module({
  imports: [TransactionModule, EthModule],
  providers: [ReconciliationService],
  exports: [ReconciliationService],
})
export class ReconciliationModule {}
