import { BigNumber as EthersBigNumber, providers, utils } from 'ethers';
import {
  LedgerNode,
  NodeLog,
  NodeReceipt,
  NodeTransaction,
} from '../eth/ledger.types';
import { ERC20_INTERFACE, TRANSFER_EVENT_TOPIC } from '../eth/transfer-events';

export interface FakeTransactionInput {
  hash: string;
  from: string;
  to?: string;
  data?: string;
  value?: string;
  blockNumber?: number | null;
}

export function transferLog(from: string, to: string, value: string): NodeLog {
  return {
    topics: [TRANSFER_EVENT_TOPIC, utils.hexZeroPad(from, 32), utils.hexZeroPad(to, 32)],
    data: utils.hexZeroPad(EthersBigNumber.from(value).toHexString(), 32),
  };
}

export type FakeNodeMethod = keyof LedgerNode;

/**
 * In-process ledger node. Methods named in `failing` reject with a transport error.
 */
export class FakeLedgerNode implements LedgerNode {
  readonly transactions = new Map<string, NodeTransaction>();
  readonly receipts = new Map<string, NodeReceipt>();
  readonly balances = new Map<string, string>();
  readonly nonces = new Map<string, number>();
  readonly symbols = new Map<string, string>();
  readonly failing = new Set<FakeNodeMethod>();
  readonly broadcast: string[] = [];
  readonly gasEstimates: providers.TransactionRequest[] = [];

  blockNumber = 100;
  chainId = 1;
  gasPrice = '10000000000';
  maxPriorityFeePerGas: string | null = '1500000000';
  gasEstimate = '52000';

  addTransaction(input: FakeTransactionInput): void {
    this.transactions.set(input.hash.toLowerCase(), {
      hash: input.hash,
      from: input.from,
      to: input.to,
      data: input.data ?? '0x',
      value: EthersBigNumber.from(input.value ?? '0'),
      blockNumber: input.blockNumber ?? null,
    });
  }

  async getTransaction(hash: string): Promise<NodeTransaction | null> {
    this.failIf('getTransaction');
    return this.transactions.get(hash.toLowerCase()) ?? null;
  }

  async getTransactionReceipt(hash: string): Promise<NodeReceipt | null> {
    this.failIf('getTransactionReceipt');
    return this.receipts.get(hash.toLowerCase()) ?? null;
  }

  async getBlockNumber(): Promise<number> {
    this.failIf('getBlockNumber');
    return this.blockNumber;
  }

  async getBalance(address: string): Promise<EthersBigNumber> {
    this.failIf('getBalance');
    return EthersBigNumber.from(this.balances.get(address.toLowerCase()) ?? '0');
  }

  async getTransactionCount(address: string): Promise<number> {
    this.failIf('getTransactionCount');
    return this.nonces.get(address.toLowerCase()) ?? 0;
  }

  async getGasPrice(): Promise<EthersBigNumber> {
    this.failIf('getGasPrice');
    return EthersBigNumber.from(this.gasPrice);
  }

  async getNetwork(): Promise<{ chainId: number }> {
    this.failIf('getNetwork');
    return { chainId: this.chainId };
  }

  async estimateGas(transaction: providers.TransactionRequest): Promise<EthersBigNumber> {
    this.failIf('estimateGas');
    this.gasEstimates.push(transaction);
    return EthersBigNumber.from(this.gasEstimate);
  }

  async call(transaction: providers.TransactionRequest): Promise<string> {
    this.failIf('call');
    const symbol = transaction.to ? this.symbols.get(transaction.to.toLowerCase()) : undefined;
    if (symbol === undefined) {
      throw new Error('execution reverted');
    }
    return ERC20_INTERFACE.encodeFunctionResult('symbol', [symbol]);
  }

  async send(method: string): Promise<unknown> {
    this.failIf('send');
    if (method === 'eth_maxPriorityFeePerGas' && this.maxPriorityFeePerGas !== null) {
      return EthersBigNumber.from(this.maxPriorityFeePerGas).toHexString();
    }
    throw new Error(`method ${method} not supported`);
  }

  async sendTransaction(signedTransaction: string): Promise<{ hash: string }> {
    this.failIf('sendTransaction');
    this.broadcast.push(signedTransaction);
    const { from, nonce } = utils.parseTransaction(signedTransaction);
    if (from) {
      this.nonces.set(from.toLowerCase(), nonce + 1);
    }
    return { hash: utils.keccak256(signedTransaction) };
  }

  private failIf(method: FakeNodeMethod): void {
    if (this.failing.has(method)) {
      throw new Error(`connect ECONNREFUSED (${method})`);
    }
  }
}
