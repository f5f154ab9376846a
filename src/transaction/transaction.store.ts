import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { In, MoreThan, Repository } from 'typeorm';
import { InvalidRequestError } from '../common/errors';
import {
  TransactionEntity,
  TransactionStatus,
  TransactionType,
} from '../entities/transaction.entity';

export const MAX_LIST_LIMIT = 1000;

export interface NewTransaction {
  hash: string;
  asset: string;
  addressFrom: string;
  addressTo: string;
  value: string;
  isToken: boolean;
  type: TransactionType;
  status: TransactionStatus;
  effectiveFee: string | null;
  contractAddress: string | null;
}

// statuses a row may be in when it moves to the keyed status
const ALLOWED_PREDECESSORS: Record<TransactionStatus, TransactionStatus[]> = {
  [TransactionStatus.Pending]: [TransactionStatus.Pending],
  [TransactionStatus.Confirmed]: [
    TransactionStatus.Pending,
    TransactionStatus.Confirmed,
  ],
};

const HOUR_MS = 60 * 60 * 1000;

@Injectable()
export class TransactionStore {
  constructor(
    @InjectRepository(TransactionEntity)
    private readonly _transactionRepository: Repository<TransactionEntity>,
  ) {}

  /**
   * INSERT ... ON CONFLICT DO NOTHING: the first write of a hash wins.
   */
  async insertIfAbsent(tx: NewTransaction, now: Date = new Date()): Promise<void> {
    await this._transactionRepository
      .createQueryBuilder()
      .insert()
      .into(TransactionEntity)
      .values({ ...tx, createdAt: now, updatedAt: now })
      .orIgnore()
      .updateEntity(false)
      .execute();
  }

  getByHash(hash: string): Promise<TransactionEntity | null> {
    return this._transactionRepository.findOne({ where: { hash } });
  }

  /**
   * Moves a row forward. Returns false when the hash is unknown or the row is
   * already past `status`; a confirmed row never returns to pending.
   */
  async updateStatus(hash: string, status: TransactionStatus): Promise<boolean> {
    const result = await this._transactionRepository.update(
      { hash, status: In(ALLOWED_PREDECESSORS[status]) },
      { status, updatedAt: new Date() },
    );
    return (result.affected ?? 0) > 0;
  }

  listPending(maxAgeHours: number, now: Date = new Date()): Promise<TransactionEntity[]> {
    const createdAfter = new Date(now.getTime() - maxAgeHours * HOUR_MS);
    return this._transactionRepository.find({
      where: {
        status: TransactionStatus.Pending,
        createdAt: MoreThan(createdAfter),
      },
      order: { createdAt: 'ASC' },
    });
  }

  async list(limit = 100, offset = 0): Promise<TransactionEntity[]> {
    if (!Number.isInteger(limit) || limit < 1 || limit > MAX_LIST_LIMIT) {
      throw new InvalidRequestError(`limit must be between 1 and ${MAX_LIST_LIMIT}`, {
        limit,
      });
    }
    if (!Number.isInteger(offset) || offset < 0) {
      throw new InvalidRequestError('offset must be a non-negative integer', {
        offset,
      });
    }
    return this._transactionRepository.find({
      order: { createdAt: 'DESC' },
      take: limit,
      skip: offset,
    });
  }
}
