import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { CustodyModule } from '../custody/custody.module';
import { TransactionEntity } from '../entities/transaction.entity';
import { EthModule } from '../eth/eth.module';
import { WalletModule } from '../wallet/wallet.module';
import { TransactionClassifierService } from './transaction-classifier.service';
import { TransactionLookupService } from './transaction-lookup.service';
import { TransactionOriginatorService } from './transaction-originator.service';
import { TransactionStore } from './transaction.store';

@Module({
  imports: [
    TypeOrmModule.forFeature([TransactionEntity]),
    EthModule,
    WalletModule,
    CustodyModule,
  ],
  providers: [
    TransactionStore,
    TransactionClassifierService,
    TransactionLookupService,
    TransactionOriginatorService,
  ],
  exports: [TransactionStore, TransactionLookupService, TransactionOriginatorService],
})
export class TransactionModule {}
