import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import axios, { AxiosInstance } from 'axios';
import { AppConfig } from '../config/configuration';
import { KEY_CUSTODY, KeyCustody } from './key-custody.types';
import { VaultKeyCustodyService } from './vault-key-custody.service';

export const VAULT_HTTP_CLIENT = Symbol('VAULT_HTTP_CLIENT');

@Module({
  providers: [
    {
      provide: VAULT_HTTP_CLIENT,
      inject: [ConfigService],
      useFactory: (config: ConfigService<AppConfig, true>): AxiosInstance => {
        const vault = config.get('vault', { infer: true });
        return axios.create({
          baseURL: vault.url,
          timeout: vault.timeoutMs,
          headers: { 'X-Vault-Token': vault.token },
        });
      },
    },
    {
      provide: KEY_CUSTODY,
      inject: [VAULT_HTTP_CLIENT, ConfigService],
      useFactory: (
        http: AxiosInstance,
        config: ConfigService<AppConfig, true>,
      ): KeyCustody => {
        const vault = config.get('vault', { infer: true });
        return new VaultKeyCustodyService(http, {
          mount: vault.mount,
          secretPath: vault.secretPath,
        });
      },
    },
  ],
  exports: [KEY_CUSTODY],
})
export class CustodyModule {}
