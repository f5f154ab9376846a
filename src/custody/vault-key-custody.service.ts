import { Logger } from '@nestjs/common';
import axios, { AxiosInstance } from 'axios';
import {
  describeError,
  KeyCustodyUnavailableError,
  KeyNotFoundError,
} from '../common/errors';
import { KeyCustody } from './key-custody.types';

export interface VaultKeyCustodyOptions {
  mount: string;
  secretPath: string;
}

interface VaultReadResponse {
  data?: {
    data?: {
      private_key?: unknown;
    };
  };
}

/**
 * HashiCorp Vault KV v2 backend. The HTTP client carries the base URL, the token
 * header and the request timeout.
 */
export class VaultKeyCustodyService implements KeyCustody {
  private _logger = new Logger(VaultKeyCustodyService.name);

  constructor(
    private readonly _http: AxiosInstance,
    private readonly _options: VaultKeyCustodyOptions,
  ) {}

  async getSecret(keyId: string): Promise<string> {
    let body: VaultReadResponse;
    try {
      const response = await this._http.get<VaultReadResponse>(this.secretUrl(keyId));
      body = response.data;
    } catch (e) {
      if (axios.isAxiosError(e) && e.response?.status === 404) {
        this._logger.error(`no secret stored for ${keyId}`);
        throw new KeyNotFoundError(keyId);
      }
      this._logger.error(`failed to read secret ${keyId}: ${describeError(e)}`);
      throw new KeyCustodyUnavailableError(`Vault read failed for ${keyId}`, {
        keyId,
        cause: describeError(e),
      });
    }

    const privateKey = body?.data?.data?.private_key;
    if (typeof privateKey !== 'string' || privateKey === '') {
      this._logger.error(`secret ${keyId} has no private_key field`);
      throw new KeyNotFoundError(keyId);
    }
    this._logger.log(`retrieved secret ${keyId}`);
    return privateKey;
  }

  async putSecret(keyId: string, secret: string): Promise<void> {
    try {
      await this._http.post(this.secretUrl(keyId), {
        data: { private_key: secret },
      });
    } catch (e) {
      this._logger.error(`failed to store secret ${keyId}: ${describeError(e)}`);
      throw new KeyCustodyUnavailableError(`Vault write failed for ${keyId}`, {
        keyId,
        cause: describeError(e),
      });
    }
    this._logger.log(`stored secret ${keyId}`);
  }

  private secretUrl(keyId: string): string {
    return `/v1/${this._options.mount}/data/${this._options.secretPath}/${encodeURIComponent(keyId)}`;
  }
}
