import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { CustodyModule } from '../custody/custody.module';
import { WalletEntity } from '../entities/wallet.entity';
import { WalletDirectoryService } from './wallet-directory.service';
import { WalletProvisioningService } from './wallet-provisioning.service';

@Module({
  imports: [TypeOrmModule.forFeature([WalletEntity]), CustodyModule],
  providers: [WalletDirectoryService, WalletProvisioningService],
  exports: [WalletDirectoryService, WalletProvisioningService],
})
export class WalletModule {}
