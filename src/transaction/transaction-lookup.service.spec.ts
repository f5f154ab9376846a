import { Wallet } from 'ethers';
import { DataSource } from 'typeorm';
import { InvalidRequestError, NotFoundError } from '../common/errors';
import {
  TransactionEntity,
  TransactionStatus,
  TransactionType,
} from '../entities/transaction.entity';
import { WalletEntity } from '../entities/wallet.entity';
import { EthService } from '../eth/eth.service';
import { createTestDataSource } from '../testing/database';
import { FakeLedgerNode } from '../testing/fake-ledger-node';
import { testConfigService } from '../testing/test-config';
import { WalletDirectoryService } from '../wallet/wallet-directory.service';
import { TransactionClassifierService } from './transaction-classifier.service';
import { normalizeHash, TransactionLookupService } from './transaction-lookup.service';
import { TransactionStore } from './transaction.store';

const OWNED = new Wallet(`0x${'11'.repeat(32)}`).address;
const OUTSIDER = '0x4444444444444444444444444444444444444444';
const HASH = `0x${'ef'.repeat(32)}`;

describe('normalizeHash', () => {
  it('lower-cases and prefixes', () => {
    expect(normalizeHash(` ${'EF'.repeat(32)} `)).toBe(HASH);
    expect(normalizeHash(HASH.toUpperCase().replace('0X', '0x'))).toBe(HASH);
  });

  it.each(['', '0x1234', `0x${'zz'.repeat(32)}`])('rejects %p', (raw) => {
    expect(() => normalizeHash(raw)).toThrow(InvalidRequestError);
  });
});

describe('TransactionLookupService', () => {
  let dataSource: DataSource;
  let node: FakeLedgerNode;
  let store: TransactionStore;
  let lookup: TransactionLookupService;

  beforeEach(async () => {
    dataSource = await createTestDataSource();
    const wallets = dataSource.getRepository(WalletEntity);
    const now = new Date();
    await wallets.insert({ address: OWNED, createdAt: now, updatedAt: now });

    node = new FakeLedgerNode();
    const ethService = new EthService(node);
    const config = testConfigService({ READ_MIN_CONFIRMATIONS: '12' });
    store = new TransactionStore(dataSource.getRepository(TransactionEntity));
    lookup = new TransactionLookupService(
      ethService,
      new TransactionClassifierService(ethService, new WalletDirectoryService(wallets), config),
      store,
      config,
    );
  });

  afterEach(async () => {
    await dataSource.destroy();
  });

  it('rejects an unknown hash', async () => {
    await expect(lookup.lookup(HASH)).rejects.toBeInstanceOf(NotFoundError);
  });

  it('records a deposit that has reached the read threshold as confirmed', async () => {
    node.addTransaction({ hash: HASH, from: OUTSIDER, to: OWNED, value: '42', blockNumber: 90 });
    node.blockNumber = 104;

    const result = await lookup.lookup(HASH);
    expect(result).toMatchObject({
      hash: HASH,
      isToken: false,
      asset: 'ETH',
      confirmations: 15,
      confirmationsDegraded: false,
      isConfirmed: true,
      minConfirmationsRequired: 12,
      isSourceOwned: false,
      isDestinationOwned: true,
      type: TransactionType.Deposit,
    });

    const row = await store.getByHash(HASH);
    expect(row).toMatchObject({
      asset: 'ETH',
      addressFrom: OUTSIDER,
      addressTo: OWNED,
      value: '42',
      isToken: false,
      type: TransactionType.Deposit,
      status: TransactionStatus.Confirmed,
      effectiveFee: null,
      contractAddress: null,
    });
  });

  it('records a young transaction as pending and keeps the first record', async () => {
    node.addTransaction({ hash: HASH, from: OWNED, to: OUTSIDER, value: '42', blockNumber: 100 });
    node.blockNumber = 104;
    const first = await lookup.lookup(HASH.slice(2).toUpperCase());
    expect(first.confirmations).toBe(5);
    expect(first.isConfirmed).toBe(false);

    node.blockNumber = 200;
    const second = await lookup.lookup(HASH);
    expect(second.isConfirmed).toBe(true);

    const row = await store.getByHash(HASH);
    expect(row?.status).toBe(TransactionStatus.Pending);
    expect(row?.type).toBe(TransactionType.Withdraw);
  });

  it('does not record transactions between foreign addresses', async () => {
    node.addTransaction({
      hash: HASH,
      from: OUTSIDER,
      to: '0x5555555555555555555555555555555555555555',
      value: '1',
    });
    const result = await lookup.lookup(HASH);
    expect(result.type).toBe(TransactionType.Unknown);
    await expect(store.getByHash(HASH)).resolves.toBeNull();
  });

  it('reports degraded confirmation reads as unconfirmed', async () => {
    node.addTransaction({ hash: HASH, from: OUTSIDER, to: OWNED, value: '1', blockNumber: 1 });
    node.failing.add('getBlockNumber');
    const result = await lookup.lookup(HASH);
    expect(result.confirmations).toBe(0);
    expect(result.confirmationsDegraded).toBe(true);
    expect(result.isConfirmed).toBe(false);
  });

  describe('getStoredWithConfirmations', () => {
    it('returns null for a hash that was never recorded', async () => {
      await expect(lookup.getStoredWithConfirmations(HASH)).resolves.toBeNull();
    });

    it('adds live confirmations to the stored row', async () => {
      node.addTransaction({ hash: HASH, from: OUTSIDER, to: OWNED, value: '1', blockNumber: 100 });
      node.blockNumber = 100;
      await lookup.lookup(HASH);

      const view = await lookup.getStoredWithConfirmations(HASH);
      expect(view?.transaction.hash).toBe(HASH);
      expect(view?.confirmations).toBe(1);
      expect(view?.isConfirmed).toBe(true);
    });
  });

  it('lists stored transactions', async () => {
    node.addTransaction({ hash: HASH, from: OUTSIDER, to: OWNED, value: '1' });
    await lookup.lookup(HASH);
    const rows = await lookup.list(10, 0);
    expect(rows.map((row) => row.hash)).toEqual([HASH]);
  });
});
