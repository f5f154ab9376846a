import { Column, DeleteDateColumn, Entity, PrimaryColumn } from 'typeorm';
import { integerStringTransformer } from './integer-string.transformer';

export enum TransactionType {
  Deposit = 'deposit',
  Withdraw = 'withdraw',
  Unknown = 'unknown',
}

export enum TransactionStatus {
  Pending = 'pending',
  Confirmed = 'confirmed',
}

@Entity({ name: 'transactions' })
export class TransactionEntity {
  @PrimaryColumn({ type: 'varchar' })
  hash!: string;

  @Column({ type: 'varchar' })
  asset!: string;

  @Column({ type: 'varchar' })
  addressFrom!: string;

  @Column({ type: 'varchar' })
  addressTo!: string;

  // wei, or token base units for token transfers
  @Column({ type: 'bigint', transformer: integerStringTransformer })
  value!: string;

  @Column({ type: 'boolean' })
  isToken!: boolean;

  @Column({ type: 'varchar' })
  type!: TransactionType;

  @Column({ type: 'varchar' })
  status!: TransactionStatus;

  @Column({
    type: 'bigint',
    nullable: true,
    transformer: integerStringTransformer,
  })
  effectiveFee!: string | null;

  @Column()
  createdAt!: Date;

  @Column()
  updatedAt!: Date;

  @DeleteDateColumn({ nullable: true })
  deletedAt!: Date | null;

  @Column({ type: 'varchar', nullable: true })
  contractAddress!: string | null;
}
