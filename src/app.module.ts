import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { SnakeNamingStrategy } from 'typeorm-naming-strategies';
import configuration, { AppConfig } from './config/configuration';
import { CustodyModule } from './custody/custody.module';
import { TransactionEntity } from './entities/transaction.entity';
import { WalletEntity } from './entities/wallet.entity';
import { EthModule } from './eth/eth.module';
import { ReconciliationModule } from './reconciliation/reconciliation.module';
import { TransactionModule } from './transaction/transaction.module';
import { WalletModule } from './wallet/wallet.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [configuration],
    }),
    TypeOrmModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (config: ConfigService<AppConfig, true>) => ({
        type: 'postgres',
        ...config.get<AppConfig, 'database'>('database', { infer: true }),
        entities: [TransactionEntity, WalletEntity],
        namingStrategy: new SnakeNamingStrategy(),
      }),
    }),
    EthModule,
    CustodyModule,
    WalletModule,
    TransactionModule,
    ReconciliationModule,
  ],
})
export class AppModule {}
