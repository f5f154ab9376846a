import BigNumber from 'bignumber.js';
import { BigNumber as EthersBigNumber, providers } from 'ethers';

export const LEDGER_NODE = Symbol('LEDGER_NODE');

export const UNKNOWN_ASSET = 'UNKNOWN';

export interface NodeTransaction {
  hash: string;
  from: string;
  to?: string;
  data: string;
  value: EthersBigNumber;
  blockNumber?: number | null;
}

export interface NodeLog {
  topics: string[];
  data: string;
}

export interface NodeReceipt {
  logs: NodeLog[];
}

/**
 * The slice of an ethers provider the engine talks to. `providers.StaticJsonRpcProvider`
 * satisfies it; tests hand in an in-memory node.
 */
export interface LedgerNode {
  getTransaction(hash: string): Promise<NodeTransaction | null>;
  getTransactionReceipt(hash: string): Promise<NodeReceipt | null>;
  getBlockNumber(): Promise<number>;
  getBalance(address: string): Promise<EthersBigNumber>;
  getTransactionCount(address: string): Promise<number>;
  getGasPrice(): Promise<EthersBigNumber>;
  getNetwork(): Promise<{ chainId: number }>;
  estimateGas(transaction: providers.TransactionRequest): Promise<EthersBigNumber>;
  call(transaction: providers.TransactionRequest): Promise<string>;
  send(method: string, params: unknown[]): Promise<unknown>;
  sendTransaction(signedTransaction: string): Promise<{ hash: string }>;
}

export interface LedgerTransaction {
  hash: string;
  from: string;
  to: string | null;
  input: string;
  value: BigNumber;
}

export type TransferAsset = 'native' | 'token';

export interface Transfer {
  asset: TransferAsset;
  from: string;
  to: string | null;
  value: BigNumber;
}

export interface ConfirmationReading {
  confirmations: number;
  // true when the count could not be read and 0 was substituted
  degraded: boolean;
}

export interface GasEstimateRequest {
  from: string;
  to: string;
  data: string;
  value: BigNumber;
}
