import { utils } from 'ethers';

export const KEY_CUSTODY = Symbol('KEY_CUSTODY');

/**
 * Opaque secret store holding one private key per custodied wallet.
 */
export interface KeyCustody {
  /**
   * @throws {KeyNotFoundError} when no secret exists under `keyId`
   * @throws {KeyCustodyUnavailableError} on any other failure
   */
  getSecret(keyId: string): Promise<string>;
  putSecret(keyId: string, secret: string): Promise<void>;
}

export function walletKeyId(address: string): string {
  return `wallet_${utils.getAddress(address)}`;
}
