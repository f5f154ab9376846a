import {
  Injectable,
  Logger,
  OnApplicationBootstrap,
  OnModuleDestroy,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AppConfig } from '../config/configuration';
import { EthService } from '../eth/eth.service';
import { TransactionStore } from '../transaction/transaction.store';
import { ConfirmationTier } from './confirmation-tier';

export interface ReconciliationHealth {
  status: 'healthy' | 'degraded';
  tiersTotal: number;
  tiersRunning: number;
  tiers: { name: string; running: boolean }[];
}

@Injectable()
export class ReconciliationService implements OnApplicationBootstrap, OnModuleDestroy {
  private _logger = new Logger(ReconciliationService.name);
  private readonly _tiers: ConfirmationTier[];
  private readonly _autoStart: boolean;

  constructor(
    store: TransactionStore,
    ethService: EthService,
    config: ConfigService<AppConfig, true>,
  ) {
    const reconciliation = config.get('reconciliation', { infer: true });
    this._autoStart = reconciliation.autoStart;
    this._tiers = reconciliation.tiers.map(
      (tier) => new ConfirmationTier(tier, store, ethService, reconciliation.checkDelayMs),
    );
  }

  get tiers(): readonly ConfirmationTier[] {
    return this._tiers;
  }

  onApplicationBootstrap(): void {
    if (this._autoStart) {
      this.startReconciliation();
    }
  }

  async onModuleDestroy(): Promise<void> {
    await this.stopReconciliation();
  }

  startReconciliation(): void {
    this._logger.log(`starting ${this._tiers.length} reconciliation tiers`);
    this._tiers.forEach((tier) => tier.start());
  }

  async stopReconciliation(): Promise<void> {
    this._logger.debug('waiting for reconciliation tiers to stop...');
    await Promise.all(this._tiers.map((tier) => tier.stop()));
    this._logger.log('reconciliation stopped');
  }

  healthStatus(): ReconciliationHealth {
    const tiers = this._tiers.map((tier) => ({ name: tier.name, running: tier.isRunning }));
    const tiersRunning = tiers.filter((tier) => tier.running).length;
    return {
      status: tiersRunning === tiers.length ? 'healthy' : 'degraded',
      tiersTotal: tiers.length,
      tiersRunning,
      tiers,
    };
  }
}
