import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { utils } from 'ethers';
import { InvalidRequestError, NotFoundError } from '../common/errors';
import { AppConfig } from '../config/configuration';
import {
  TransactionEntity,
  TransactionStatus,
  TransactionType,
} from '../entities/transaction.entity';
import { EthService } from '../eth/eth.service';
import { LedgerTransaction, Transfer } from '../eth/ledger.types';
import {
  Classification,
  TransactionClassifierService,
} from './transaction-classifier.service';
import { TransactionStore } from './transaction.store';

export interface LookupResult {
  hash: string;
  transaction: LedgerTransaction;
  isToken: boolean;
  asset: string;
  transfers: Transfer[];
  confirmations: number;
  confirmationsDegraded: boolean;
  isConfirmed: boolean;
  minConfirmationsRequired: number;
  isSourceOwned: boolean;
  isDestinationOwned: boolean;
  type: TransactionType;
}

export interface StoredTransactionView {
  transaction: TransactionEntity;
  confirmations: number;
  isConfirmed: boolean;
}

export function normalizeHash(raw: string): string {
  const trimmed = raw.trim().toLowerCase();
  const hash = trimmed.startsWith('0x') ? trimmed : `0x${trimmed}`;
  if (!utils.isHexString(hash, 32)) {
    throw new InvalidRequestError(`Malformed transaction hash: ${raw}`);
  }
  return hash;
}

/**
 * Read path: fetch a transaction from the ledger, classify it against the
 * custodied wallets, and record it once if either side is ours.
 */
@Injectable()
export class TransactionLookupService {
  private _logger = new Logger(TransactionLookupService.name);
  private readonly _minConfirmations: number;

  constructor(
    private readonly _ethService: EthService,
    private readonly _classifier: TransactionClassifierService,
    private readonly _store: TransactionStore,
    config: ConfigService<AppConfig, true>,
  ) {
    this._minConfirmations = config.get('classification', {
      infer: true,
    }).readMinConfirmations;
  }

  async lookup(rawHash: string): Promise<LookupResult> {
    const hash = normalizeHash(rawHash);
    this._logger.log(
      `looking up ${hash}, min confirmations ${this._minConfirmations}`,
    );

    const tx = await this._ethService.getTransaction(hash);
    if (!tx) {
      throw new NotFoundError(`Transaction ${hash} not found`, { hash });
    }

    const classification = await this._classifier.classify(tx);
    const { confirmations, degraded } = await this._ethService.getConfirmations(hash);
    const isConfirmed = confirmations >= this._minConfirmations;

    if (classification.isSourceOwned || classification.isDestinationOwned) {
      await this.persist(hash, classification, isConfirmed);
    } else {
      this._logger.warn(`neither side of ${hash} is custodied, not recording`);
    }

    this._logger.log(
      `lookup of ${hash} done: type ${classification.type}, token ${classification.isToken}, confirmations ${confirmations}`,
    );

    return {
      hash,
      transaction: tx,
      isToken: classification.isToken,
      asset: classification.asset,
      transfers: classification.transfers,
      confirmations,
      confirmationsDegraded: degraded,
      isConfirmed,
      minConfirmationsRequired: this._minConfirmations,
      isSourceOwned: classification.isSourceOwned,
      isDestinationOwned: classification.isDestinationOwned,
      type: classification.type,
    };
  }

  async getStoredWithConfirmations(rawHash: string): Promise<StoredTransactionView | null> {
    const hash = normalizeHash(rawHash);
    const transaction = await this._store.getByHash(hash);
    if (!transaction) {
      return null;
    }
    const { confirmations } = await this._ethService.getConfirmations(hash);
    return { transaction, confirmations, isConfirmed: confirmations >= 1 };
  }

  list(limit?: number, offset?: number): Promise<TransactionEntity[]> {
    return this._store.list(limit, offset);
  }

  private async persist(
    hash: string,
    classification: Classification,
    isConfirmed: boolean,
  ): Promise<void> {
    const existing = await this._store.getByHash(hash);
    if (existing) {
      this._logger.log(`${hash} already recorded with status ${existing.status}, skipping`);
      return;
    }

    await this._store.insertIfAbsent({
      hash,
      asset: classification.asset,
      addressFrom: classification.sourceAddress ?? '',
      addressTo: classification.destinationAddress ?? '',
      value: classification.value.toFixed(),
      isToken: classification.isToken,
      type: classification.type,
      status: isConfirmed ? TransactionStatus.Confirmed : TransactionStatus.Pending,
      effectiveFee: null,
      contractAddress: classification.contractAddress,
    });
    this._logger.log(`recorded ${hash} as ${classification.type}`);
  }
}
