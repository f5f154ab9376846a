import { Inject, Injectable, Logger } from '@nestjs/common';
import BigNumber from 'bignumber.js';
import { BigNumber as EthersBigNumber } from 'ethers';
import { describeError, LedgerUnavailableError } from '../common/errors';
import {
  ConfirmationReading,
  GasEstimateRequest,
  LEDGER_NODE,
  LedgerNode,
  LedgerTransaction,
  Transfer,
  UNKNOWN_ASSET,
} from './ledger.types';
import {
  decodeTransferLog,
  ERC20_INTERFACE,
  isTransferLog,
} from './transfer-events';

const EMPTY_CALL_DATA = '0x';

/**
 * Adapter over the ledger node. Hard failures surface as `LedgerUnavailableError`;
 * confirmation counts, receipts and token symbols degrade instead of throwing.
 */
@Injectable()
export class EthService {
  private _logger = new Logger(EthService.name);

  constructor(@Inject(LEDGER_NODE) private readonly _node: LedgerNode) {}

  async getTransaction(hash: string): Promise<LedgerTransaction | null> {
    const tx = await this.request('getTransaction', () =>
      this._node.getTransaction(hash),
    );
    if (!tx) {
      return null;
    }
    return {
      hash: tx.hash,
      from: tx.from,
      to: tx.to ?? null,
      input: tx.data,
      value: new BigNumber(tx.value.toString()),
    };
  }

  isTokenTransaction(tx: LedgerTransaction): boolean {
    return Boolean(tx.input) && tx.input.length > EMPTY_CALL_DATA.length;
  }

  async getConfirmations(hash: string): Promise<ConfirmationReading> {
    try {
      const tx = await this._node.getTransaction(hash);
      if (!tx || tx.blockNumber === undefined || tx.blockNumber === null) {
        this._logger.debug(`tx ${hash} is not mined yet`);
        return { confirmations: 0, degraded: false };
      }
      const currentBlock = await this._node.getBlockNumber();
      const confirmations = Math.max(0, currentBlock - tx.blockNumber + 1);
      this._logger.debug(
        `tx ${hash}: block ${tx.blockNumber}, head ${currentBlock}, confirmations ${confirmations}`,
      );
      return { confirmations, degraded: false };
    } catch (e) {
      this._logger.warn(
        `failed to read confirmations for ${hash}, treating as unconfirmed: ${describeError(e)}`,
      );
      return { confirmations: 0, degraded: true };
    }
  }

  async getTransferEvents(hash: string): Promise<Transfer[]> {
    const tx = await this.getTransaction(hash);
    if (!tx) {
      return [];
    }

    const transfers: Transfer[] = [];
    if (tx.value.isGreaterThan(0)) {
      transfers.push({
        asset: 'native',
        from: tx.from,
        to: tx.to,
        value: tx.value,
      });
    }

    try {
      const receipt = await this._node.getTransactionReceipt(hash);
      const logs = receipt?.logs ?? [];
      logs.forEach((log, index) => {
        if (!isTransferLog(log)) {
          return;
        }
        const transfer = decodeTransferLog(log);
        if (transfer) {
          transfers.push(transfer);
        } else {
          this._logger.debug(`skipping malformed Transfer log ${index} of ${hash}`);
        }
      });
    } catch (e) {
      this._logger.warn(
        `failed to read receipt for ${hash}, no token transfers decoded: ${describeError(e)}`,
      );
    }

    return transfers;
  }

  async getTokenSymbol(contractAddress: string): Promise<string> {
    try {
      const result = await this._node.call({
        to: contractAddress,
        data: ERC20_INTERFACE.encodeFunctionData('symbol'),
      });
      const symbol: unknown = ERC20_INTERFACE.decodeFunctionResult(
        'symbol',
        result,
      )[0];
      if (typeof symbol !== 'string' || symbol.trim() === '') {
        return UNKNOWN_ASSET;
      }
      return symbol.trim().toUpperCase();
    } catch (e) {
      this._logger.warn(
        `failed to read token symbol of ${contractAddress}: ${describeError(e)}`,
      );
      return UNKNOWN_ASSET;
    }
  }

  getTransactionCount(address: string): Promise<number> {
    return this.request('getTransactionCount', () =>
      this._node.getTransactionCount(address),
    );
  }

  async getChainId(): Promise<number> {
    const network = await this.request('getNetwork', () =>
      this._node.getNetwork(),
    );
    return network.chainId;
  }

  async getBalance(address: string): Promise<BigNumber> {
    const balance = await this.request('getBalance', () =>
      this._node.getBalance(address),
    );
    return new BigNumber(balance.toString());
  }

  async getGasPrice(): Promise<BigNumber> {
    const gasPrice = await this.request('getGasPrice', () =>
      this._node.getGasPrice(),
    );
    return new BigNumber(gasPrice.toString());
  }

  /**
   * Returns null when the node does not answer `eth_maxPriorityFeePerGas`.
   */
  async getMaxPriorityFeePerGas(): Promise<BigNumber | null> {
    try {
      const result = await this._node.send('eth_maxPriorityFeePerGas', []);
      if (typeof result !== 'string') {
        return null;
      }
      return new BigNumber(EthersBigNumber.from(result).toString());
    } catch (e) {
      this._logger.debug(`eth_maxPriorityFeePerGas unavailable: ${describeError(e)}`);
      return null;
    }
  }

  async estimateGas(request: GasEstimateRequest): Promise<BigNumber> {
    const gas = await this.request('estimateGas', () =>
      this._node.estimateGas({
        from: request.from,
        to: request.to,
        data: request.data,
        value: request.value.toFixed(),
      }),
    );
    return new BigNumber(gas.toString());
  }

  encodeTokenTransfer(to: string, value: BigNumber): string {
    return ERC20_INTERFACE.encodeFunctionData('transfer', [to, value.toFixed()]);
  }

  async sendRawTransaction(signedTransaction: string): Promise<string> {
    const response = await this.request('sendRawTransaction', () =>
      this._node.sendTransaction(signedTransaction),
    );
    return response.hash;
  }

  private async request<T>(operation: string, call: () => Promise<T>): Promise<T> {
    try {
      return await call();
    } catch (e) {
      this._logger.error(`${operation} failed: ${describeError(e)}`);
      throw new LedgerUnavailableError(
        `Ledger node ${operation} failed: ${describeError(e)}`,
        { operation, cause: describeError(e) },
      );
    }
  }
}
