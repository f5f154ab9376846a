import BigNumber from 'bignumber.js';
import { InvalidAmountError } from './errors';

const DECIMAL_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

export interface ValueCodecOptions {
  decimals: number;
  // largest accepted amount, in decimal units
  maxSupply: BigNumber.Value;
}

export type DecimalInput = string | number | BigNumber;

/**
 * Exact conversion between wei and ether (or any 10^decimals unit pair).
 * All arithmetic goes through bignumber.js; binary floats never touch an amount.
 */
export class ValueCodec {
  private readonly _decimals: number;
  private readonly _maxSupply: BigNumber;

  constructor(options: ValueCodecOptions) {
    this._decimals = options.decimals;
    this._maxSupply = new BigNumber(options.maxSupply);
  }

  get decimals(): number {
    return this._decimals;
  }

  toSmallestUnit(value: DecimalInput): BigNumber {
    const amount = this.parse(value);
    if (amount === null) {
      throw new InvalidAmountError(`Amount is not a number: ${String(value)}`);
    }
    if (amount.isLessThanOrEqualTo(0)) {
      throw new InvalidAmountError(`Amount must be positive: ${amount.toFixed()}`);
    }
    if (amount.isGreaterThan(this._maxSupply)) {
      throw new InvalidAmountError(
        `Amount ${amount.toFixed()} exceeds maximum supply ${this._maxSupply.toFixed()}`,
      );
    }
    return amount
      .shiftedBy(this._decimals)
      .integerValue(BigNumber.ROUND_DOWN);
  }

  toDecimalUnit(value: BigNumber.Value): BigNumber {
    const amount = new BigNumber(value);
    if (!amount.isFinite() || !amount.isInteger()) {
      throw new InvalidAmountError(`Not an integer amount: ${String(value)}`);
    }
    if (amount.isNegative()) {
      throw new InvalidAmountError(`Amount must be non-negative: ${amount.toFixed()}`);
    }
    return amount.shiftedBy(-this._decimals);
  }

  isValidDecimalAmount(value: DecimalInput): boolean {
    const amount = this.parse(value);
    return amount !== null && amount.isGreaterThan(0);
  }

  private parse(value: DecimalInput): BigNumber | null {
    if (typeof value === 'string' && !DECIMAL_PATTERN.test(value.trim())) {
      return null;
    }
    const amount = new BigNumber(
      typeof value === 'string' ? value.trim().replace(/^\+/, '') : value,
    );
    return amount.isFinite() ? amount : null;
  }
}
