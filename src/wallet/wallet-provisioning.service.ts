import { Inject, Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { utils, Wallet } from 'ethers';
import { Repository } from 'typeorm';
import { InvalidRequestError } from '../common/errors';
import { KEY_CUSTODY, KeyCustody, walletKeyId } from '../custody/key-custody.types';
import { WalletEntity } from '../entities/wallet.entity';

export const MAX_WALLETS_PER_REQUEST = 100;

@Injectable()
export class WalletProvisioningService {
  private _logger = new Logger(WalletProvisioningService.name);

  constructor(
    @InjectRepository(WalletEntity)
    private readonly _walletRepository: Repository<WalletEntity>,
    @Inject(KEY_CUSTODY) private readonly _keyCustody: KeyCustody,
  ) {}

  /**
   * Generates `count` wallets. Each key is stored in key custody before its wallet
   * row exists, so a custodied address always has a retrievable key.
   */
  async createWallets(count: number): Promise<string[]> {
    if (!Number.isInteger(count) || count < 1 || count > MAX_WALLETS_PER_REQUEST) {
      throw new InvalidRequestError(
        `count must be an integer between 1 and ${MAX_WALLETS_PER_REQUEST}`,
        { count },
      );
    }

    const addresses: string[] = [];
    for (let i = 0; i < count; i++) {
      const wallet = new Wallet(utils.hexlify(utils.randomBytes(32)));
      await this._keyCustody.putSecret(walletKeyId(wallet.address), wallet.privateKey);

      const now = new Date();
      await this._walletRepository
        .createQueryBuilder()
        .insert()
        .into(WalletEntity)
        .values({ address: wallet.address, createdAt: now, updatedAt: now })
        .orIgnore()
        .execute();

      addresses.push(wallet.address);
      this._logger.log(`provisioned wallet ${wallet.address} (${i + 1}/${count})`);
    }
    return addresses;
  }

  listWallets(): Promise<WalletEntity[]> {
    return this._walletRepository.find({ order: { createdAt: 'ASC' } });
  }
}
