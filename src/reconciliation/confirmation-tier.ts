import { Logger } from '@nestjs/common';
import { describeError } from '../common/errors';
import { ReconciliationTierConfig } from '../config/configuration';
import { TransactionEntity, TransactionStatus } from '../entities/transaction.entity';
import { EthService } from '../eth/eth.service';
import { TransactionStore } from '../transaction/transaction.store';

export type TierState = 'stopped' | 'running';

// cancellation handle owned by one loop run
export interface RunToken {
  isTerminating: boolean;
  wake: (() => void) | null;
}

interface TierRun {
  token: RunToken;
  done: Promise<void>;
}

/**
 * One polling loop that promotes pending rows once they reach
 * `minConfirmations`. Errors never end the loop; only `stop()` does.
 * A restart while a stop is in progress starts a fresh run; the old run
 * still exits and its `stop()` resolves.
 */
export class ConfirmationTier {
  private _logger: Logger;
  private _current: TierRun | null = null;
  private readonly _stopping = new Set<Promise<void>>();

  constructor(
    private readonly _config: ReconciliationTierConfig,
    private readonly _store: TransactionStore,
    private readonly _ethService: EthService,
    private readonly _checkDelayMs: number,
  ) {
    this._logger = new Logger(`${ConfirmationTier.name}:${_config.name}`);
  }

  get name(): string {
    return this._config.name;
  }

  get state(): TierState {
    return this._current ? 'running' : 'stopped';
  }

  get isRunning(): boolean {
    return this._current !== null;
  }

  start(): void {
    if (this._current) {
      this._logger.warn('already running');
      return;
    }
    const token: RunToken = { isTerminating: false, wake: null };
    this._current = { token, done: this.run(token) };
    this._logger.log(
      `started: ${this._config.minConfirmations} confirmations, every ${this._config.pollIntervalMs}ms, ${this._config.maxAgeHours}h window`,
    );
  }

  /**
   * Resolves once the current run and every run stopped before it have exited.
   */
  async stop(): Promise<void> {
    const current = this._current;
    if (current) {
      this._logger.debug('stopping...');
      this._current = null;
      current.token.isTerminating = true;
      current.token.wake?.();

      const stopped = current.done.then(() => this._logger.log('stopped'));
      this._stopping.add(stopped);
      try {
        await stopped;
      } finally {
        this._stopping.delete(stopped);
      }
      return;
    }
    await Promise.all(this._stopping);
  }

  /**
   * One pass over the pending set. Returns how many rows were confirmed.
   */
  async checkPending(token?: RunToken): Promise<number> {
    let pending: TransactionEntity[];
    try {
      pending = await this._store.listPending(this._config.maxAgeHours);
    } catch (e) {
      this._logger.error(`failed to list pending transactions: ${describeError(e)}`);
      return 0;
    }
    if (pending.length > 0) {
      this._logger.debug(`checking ${pending.length} pending transactions`);
    }

    let confirmed = 0;
    for (const tx of pending) {
      if (token?.isTerminating) {
        break;
      }
      if (await this.checkTransaction(tx)) {
        confirmed++;
      }
      await this.sleep(this._checkDelayMs, token);
    }
    return confirmed;
  }

  private async checkTransaction(tx: TransactionEntity): Promise<boolean> {
    try {
      const { confirmations } = await this._ethService.getConfirmations(tx.hash);
      if (confirmations < this._config.minConfirmations) {
        return false;
      }
      const updated = await this._store.updateStatus(tx.hash, TransactionStatus.Confirmed);
      if (updated) {
        this._logger.log(`${tx.hash} confirmed with ${confirmations} confirmations`);
      }
      return updated;
    } catch (e) {
      this._logger.error(`failed to check ${tx.hash}: ${describeError(e)}`);
      return false;
    }
  }

  private async run(token: RunToken): Promise<void> {
    while (!token.isTerminating) {
      try {
        await this.checkPending(token);
      } catch (e) {
        this._logger.error(`reconciliation pass failed: ${describeError(e)}`);
      }
      await this.sleep(this._config.pollIntervalMs, token);
    }
  }

  // resolves early when the run is stopped
  private sleep(ms: number, token?: RunToken): Promise<void> {
    if (token?.isTerminating || ms <= 0) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        if (token) {
          token.wake = null;
        }
        resolve();
      }, ms);
      if (token) {
        token.wake = () => {
          clearTimeout(timer);
          token.wake = null;
          resolve();
        };
      }
    });
  }
}
