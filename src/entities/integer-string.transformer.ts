import BigNumber from 'bignumber.js';
import { ValueTransformer } from 'typeorm';

// Postgres hands bigint back as a string, sqlite as a number; both become a plain integer string.
export const integerStringTransformer: ValueTransformer = {
  to: (value: string | null | undefined) => value,
  from: (value: string | number | null) =>
    value === null ? null : new BigNumber(value).toFixed(),
};
