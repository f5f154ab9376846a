import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Raw, Repository } from 'typeorm';
import { WalletEntity } from '../entities/wallet.entity';

@Injectable()
export class WalletDirectoryService {
  constructor(
    @InjectRepository(WalletEntity)
    private readonly _walletRepository: Repository<WalletEntity>,
  ) {}

  // soft-deleted wallets are excluded by the delete-date column
  async isCustodied(address: string | null | undefined): Promise<boolean> {
    if (!address) {
      return false;
    }
    const matches = await this._walletRepository.count({
      where: {
        address: Raw((alias) => `LOWER(${alias}) = :address`, {
          address: address.toLowerCase(),
        }),
      },
    });
    return matches > 0;
  }
}
