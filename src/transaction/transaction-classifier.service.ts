import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import BigNumber from 'bignumber.js';
import { AppConfig } from '../config/configuration';
import { TransactionType } from '../entities/transaction.entity';
import { EthService } from '../eth/eth.service';
import {
  LedgerTransaction,
  Transfer,
  UNKNOWN_ASSET,
} from '../eth/ledger.types';
import { WalletDirectoryService } from '../wallet/wallet-directory.service';

export interface Classification {
  isToken: boolean;
  asset: string;
  contractAddress: string | null;
  transfers: Transfer[];
  // economic endpoints after ownership resolution
  sourceAddress: string | null;
  destinationAddress: string | null;
  isSourceOwned: boolean;
  isDestinationOwned: boolean;
  type: TransactionType;
  value: BigNumber;
}

const sameAddress = (a: string | null, b: string | null): boolean =>
  a !== null && b !== null && a.toLowerCase() === b.toLowerCase();

/**
 * Internal transfers (both sides custodied) are recorded as a single withdraw.
 */
export function decideTransactionType(
  isSourceOwned: boolean,
  isDestinationOwned: boolean,
): TransactionType {
  if (isDestinationOwned && !isSourceOwned) {
    return TransactionType.Deposit;
  }
  if (isSourceOwned) {
    return TransactionType.Withdraw;
  }
  return TransactionType.Unknown;
}

/**
 * Token rows carry the amount of the transfer (native or token) that touches the
 * owned side, preferring the owned source; native rows carry the transaction value.
 */
export function selectPersistedValue(
  tx: LedgerTransaction,
  resolved: Pick<
    Classification,
    | 'isToken'
    | 'transfers'
    | 'sourceAddress'
    | 'destinationAddress'
    | 'isSourceOwned'
    | 'isDestinationOwned'
  >,
): BigNumber {
  if (!resolved.isToken) {
    return tx.value;
  }
  const { transfers } = resolved;
  if (resolved.isSourceOwned) {
    const match = transfers.find((t) => sameAddress(t.from, resolved.sourceAddress));
    if (match) {
      return match.value;
    }
  }
  if (resolved.isDestinationOwned) {
    const match = transfers.find((t) => sameAddress(t.to, resolved.destinationAddress));
    if (match) {
      return match.value;
    }
  }
  return new BigNumber(0);
}

@Injectable()
export class TransactionClassifierService {
  private _logger = new Logger(TransactionClassifierService.name);
  private readonly _nativeSymbol: string;

  constructor(
    private readonly _ethService: EthService,
    private readonly _walletDirectory: WalletDirectoryService,
    config: ConfigService<AppConfig, true>,
  ) {
    this._nativeSymbol = config.get('ledger', { infer: true }).nativeSymbol.toUpperCase();
  }

  async classify(tx: LedgerTransaction): Promise<Classification> {
    const isToken = this._ethService.isTokenTransaction(tx);

    let asset = this._nativeSymbol;
    let transfers: Transfer[];
    if (isToken) {
      asset = tx.to ? await this._ethService.getTokenSymbol(tx.to) : UNKNOWN_ASSET;
      transfers = await this._ethService.getTransferEvents(tx.hash);
    } else {
      transfers = tx.value.isGreaterThan(0)
        ? [{ asset: 'native', from: tx.from, to: tx.to, value: tx.value }]
        : [];
    }

    // the contract is tx.to for token moves, so the owned recipient comes from the transfers
    let destinationAddress = tx.to;
    let isDestinationOwned = false;
    if (isToken) {
      for (const transfer of transfers) {
        if (await this._walletDirectory.isCustodied(transfer.to)) {
          isDestinationOwned = true;
          destinationAddress = transfer.to;
          this._logger.log(`token transfer destination ${transfer.to} is custodied`);
          break;
        }
      }
    } else {
      isDestinationOwned = await this._walletDirectory.isCustodied(tx.to);
    }

    let sourceAddress: string | null = tx.from;
    let isSourceOwned = await this._walletDirectory.isCustodied(tx.from);
    if (isToken) {
      for (const transfer of transfers) {
        if (await this._walletDirectory.isCustodied(transfer.from)) {
          isSourceOwned = true;
          sourceAddress = transfer.from;
          this._logger.log(`token transfer source ${transfer.from} is custodied`);
          break;
        }
      }
    }

    const type = decideTransactionType(isSourceOwned, isDestinationOwned);
    const resolved = {
      isToken,
      transfers,
      sourceAddress,
      destinationAddress,
      isSourceOwned,
      isDestinationOwned,
    };

    return {
      ...resolved,
      asset,
      contractAddress: isToken ? tx.to : null,
      type,
      value: selectPersistedValue(tx, resolved),
    };
  }
}
