import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { providers } from 'ethers';
import { ValueCodec } from '../common/value-codec';
import { AppConfig } from '../config/configuration';
import { EthService } from './eth.service';
import { LEDGER_NODE, LedgerNode } from './ledger.types';

@Module({
  providers: [
    {
      provide: LEDGER_NODE,
      inject: [ConfigService],
      useFactory: (config: ConfigService<AppConfig, true>): LedgerNode => {
        const ledger = config.get('ledger', { infer: true });
        return new providers.StaticJsonRpcProvider({
          url: ledger.rpcUrl,
          timeout: ledger.timeoutMs,
        });
      },
    },
    {
      provide: ValueCodec,
      inject: [ConfigService],
      useFactory: (config: ConfigService<AppConfig, true>) => {
        const ledger = config.get('ledger', { infer: true });
        return new ValueCodec({
          decimals: ledger.decimals,
          maxSupply: ledger.maxSupply,
        });
      },
    },
    EthService,
  ],
  exports: [EthService, ValueCodec],
})
export class EthModule {}
