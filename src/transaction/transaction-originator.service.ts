import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import BigNumber from 'bignumber.js';
import { utils, Wallet } from 'ethers';
import {
  CustodyError,
  describeError,
  InsufficientBalanceError,
  InvalidRequestError,
  KeyCustodyUnavailableError,
} from '../common/errors';
import { DecimalInput, ValueCodec } from '../common/value-codec';
import { AppConfig } from '../config/configuration';
import { KEY_CUSTODY, KeyCustody, walletKeyId } from '../custody/key-custody.types';
import { TransactionStatus, TransactionType } from '../entities/transaction.entity';
import { EthService } from '../eth/eth.service';
import { TransactionStore } from './transaction.store';

export interface OriginationRequest {
  from?: string;
  to?: string;
  asset?: string;
  value?: DecimalInput;
  contractAddress?: string | null;
}

export interface OriginationResult {
  hash: string;
  status: TransactionStatus;
  // wei
  effectiveFee: string;
  createdAt: Date;
  confirmations: number;
  isConfirmed: boolean;
}

interface UnsignedTransfer {
  to: string;
  value: BigNumber;
  data: string;
  gasLimit: BigNumber;
  contractAddress: string | null;
}

/**
 * Builds, prices, signs and broadcasts transactions for custodied wallets.
 * Requests for the same sender run one at a time so nonces are not reused.
 */
@Injectable()
export class TransactionOriginatorService {
  private _logger = new Logger(TransactionOriginatorService.name);
  private readonly _inFlight = new Map<string, Promise<void>>();
  private readonly _ledger: AppConfig['ledger'];

  constructor(
    private readonly _ethService: EthService,
    private readonly _store: TransactionStore,
    private readonly _codec: ValueCodec,
    @Inject(KEY_CUSTODY) private readonly _keyCustody: KeyCustody,
    config: ConfigService<AppConfig, true>,
  ) {
    this._ledger = config.get('ledger', { infer: true });
  }

  async create(request: OriginationRequest): Promise<OriginationResult> {
    const { from, to, asset, value } = request;
    if (!from || !to || !asset || value === undefined || value === '') {
      this._logger.error(
        `missing required fields - from: ${Boolean(from)}, to: ${Boolean(to)}, asset: ${Boolean(asset)}, value: ${value !== undefined && value !== ''}`,
      );
      throw new InvalidRequestError('Missing required fields: from, to, asset, value');
    }
    if (!utils.isAddress(from) || !utils.isAddress(to)) {
      throw new InvalidRequestError('from and to must be valid addresses', { from, to });
    }

    const amount = this._codec.toSmallestUnit(value);
    this._logger.log(
      `creating ${asset} transfer of ${amount.toFixed()} base units from ${from} to ${to}`,
    );

    return this.serialize(from.toLowerCase(), () =>
      this.originate({ ...request, from, to, asset }, amount),
    );
  }

  private async originate(
    request: OriginationRequest & { from: string; to: string; asset: string },
    amount: BigNumber,
  ): Promise<OriginationResult> {
    const [nonce, chainId, balance, gasPrice] = await Promise.all([
      this._ethService.getTransactionCount(request.from),
      this._ethService.getChainId(),
      this._ethService.getBalance(request.from),
      this._ethService.getGasPrice(),
    ]);

    if (balance.isZero()) {
      throw new InsufficientBalanceError(
        `Address ${request.from} has no native balance to pay fees`,
        { address: request.from },
      );
    }

    const priorityFee =
      (await this._ethService.getMaxPriorityFeePerGas()) ??
      new BigNumber(this._ledger.priorityFeeFallbackWei);
    const maxFeePerGas = gasPrice
      .multipliedBy(this._ledger.feeMargin)
      .integerValue(BigNumber.ROUND_DOWN)
      .plus(priorityFee);

    const isNative = request.asset.toUpperCase() === this._ledger.nativeSymbol;
    const unsigned = isNative
      ? this.buildNativeTransfer(request.to, amount, balance, maxFeePerGas)
      : await this.buildTokenTransfer(request, amount, balance, maxFeePerGas);

    this._logger.log(
      `built ${request.asset} tx: nonce ${nonce}, chain ${chainId}, gas ${unsigned.gasLimit.toFixed()}, maxFeePerGas ${maxFeePerGas.toFixed()}, priority ${priorityFee.toFixed()}`,
    );

    const signer = await this.loadSigner(request.from);
    const signed = await signer.signTransaction({
      type: 2,
      chainId,
      nonce,
      to: unsigned.to,
      value: unsigned.value.toFixed(),
      data: unsigned.data,
      gasLimit: unsigned.gasLimit.toFixed(),
      maxFeePerGas: maxFeePerGas.toFixed(),
      maxPriorityFeePerGas: priorityFee.toFixed(),
    });

    const hash = (await this._ethService.sendRawTransaction(signed)).toLowerCase();
    this._logger.log(`broadcast ${hash}`);

    const effectiveFee = unsigned.gasLimit.multipliedBy(maxFeePerGas);
    const createdAt = new Date();
    await this._store.insertIfAbsent(
      {
        hash,
        asset: request.asset.toUpperCase(),
        addressFrom: request.from,
        addressTo: request.to,
        value: amount.toFixed(),
        isToken: !isNative,
        type: TransactionType.Withdraw,
        status: TransactionStatus.Pending,
        effectiveFee: effectiveFee.toFixed(),
        contractAddress: unsigned.contractAddress,
      },
      createdAt,
    );
    this._logger.log(`recorded ${hash}, fee ${effectiveFee.toFixed()} wei`);

    return {
      hash,
      status: TransactionStatus.Pending,
      effectiveFee: effectiveFee.toFixed(),
      createdAt,
      confirmations: 0,
      isConfirmed: false,
    };
  }

  private buildNativeTransfer(
    to: string,
    amount: BigNumber,
    balance: BigNumber,
    maxFeePerGas: BigNumber,
  ): UnsignedTransfer {
    const gasLimit = new BigNumber(this._ledger.nativeGasLimit);
    const required = amount.plus(gasLimit.multipliedBy(maxFeePerGas));
    if (balance.isLessThan(required)) {
      throw new InsufficientBalanceError(
        `Insufficient balance: ${required.toFixed()} wei required including gas, ${balance.toFixed()} available`,
        { required: required.toFixed(), available: balance.toFixed() },
      );
    }
    return { to, value: amount, data: '0x', gasLimit, contractAddress: null };
  }

  private async buildTokenTransfer(
    request: OriginationRequest & { from: string; to: string },
    amount: BigNumber,
    balance: BigNumber,
    maxFeePerGas: BigNumber,
  ): Promise<UnsignedTransfer> {
    const contractAddress = request.contractAddress;
    if (!contractAddress) {
      throw new InvalidRequestError('contractAddress is required for token transfers');
    }
    if (!utils.isAddress(contractAddress)) {
      throw new InvalidRequestError('contractAddress must be a valid address', {
        contractAddress,
      });
    }

    const data = this._ethService.encodeTokenTransfer(request.to, amount);
    const gasLimit = await this._ethService.estimateGas({
      from: request.from,
      to: contractAddress,
      data,
      value: new BigNumber(0),
    });
    const required = gasLimit.multipliedBy(maxFeePerGas);
    if (balance.isLessThan(required)) {
      throw new InsufficientBalanceError(
        `Insufficient balance for token transfer gas: ${required.toFixed()} wei required, ${balance.toFixed()} available`,
        { required: required.toFixed(), available: balance.toFixed() },
      );
    }
    return {
      to: contractAddress,
      value: new BigNumber(0),
      data,
      gasLimit,
      contractAddress,
    };
  }

  private async loadSigner(address: string): Promise<Wallet> {
    const keyId = walletKeyId(address);
    let privateKey: string;
    try {
      privateKey = await this._keyCustody.getSecret(keyId);
    } catch (e) {
      if (e instanceof CustodyError) {
        throw e;
      }
      throw new KeyCustodyUnavailableError(`Key custody failed for ${keyId}`, {
        keyId,
        cause: describeError(e),
      });
    }

    let signer: Wallet;
    try {
      signer = new Wallet(privateKey);
    } catch (e) {
      throw new KeyCustodyUnavailableError(`Stored key ${keyId} is not a valid private key`, {
        keyId,
        cause: describeError(e),
      });
    }
    if (signer.address.toLowerCase() !== address.toLowerCase()) {
      throw new KeyCustodyUnavailableError(`Stored key ${keyId} does not control ${address}`, {
        keyId,
      });
    }
    return signer;
  }

  private async serialize<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this._inFlight.get(key) ?? Promise.resolve();
    const run = previous.then(task);
    // completion marker for the next request; the outcome itself reaches the caller through `run`
    const settled = run.then(
      () => undefined,
      () => undefined,
    );
    this._inFlight.set(key, settled);
    try {
      return await run;
    } finally {
      if (this._inFlight.get(key) === settled) {
        this._inFlight.delete(key);
      }
    }
  }
}
