import { ZodError } from 'zod';
import { DEFAULT_TIERS, loadConfig, logLevelsFrom } from './configuration';

describe('loadConfig', () => {
  it('applies defaults', () => {
    const config = loadConfig({});
    expect(config.ledger.nativeSymbol).toBe('ETH');
    expect(config.ledger.decimals).toBe(18);
    expect(config.ledger.nativeGasLimit).toBe(21000);
    expect(config.ledger.feeMargin).toBe('1.2');
    expect(config.ledger.priorityFeeFallbackWei).toBe('2000000000');
    expect(config.classification.readMinConfirmations).toBe(12);
    expect(config.reconciliation).toEqual({
      tiers: DEFAULT_TIERS,
      checkDelayMs: 500,
      autoStart: true,
    });
    expect(config.database.synchronize).toBe(false);
    expect(config.database.logging).toBe(false);
    expect(config.logLevels).toEqual(['error', 'warn', 'log']);
  });

  it('reads overrides from the environment', () => {
    const config = loadConfig({
      NATIVE_SYMBOL: 'matic',
      DATABASE_PORT: '6543',
      DATABASE_LOGGING: 'true',
      RECONCILIATION_AUTOSTART: 'false',
      RECONCILIATION_TIERS: JSON.stringify([
        { name: 'only', minConfirmations: 3, pollIntervalMs: 1000, maxAgeHours: 0.5 },
      ]),
      LOG_LEVEL: 'debug',
    });
    expect(config.ledger.nativeSymbol).toBe('MATIC');
    expect(config.database.port).toBe(6543);
    expect(config.database.logging).toBe(true);
    expect(config.reconciliation.autoStart).toBe(false);
    expect(config.reconciliation.tiers).toEqual([
      { name: 'only', minConfirmations: 3, pollIntervalMs: 1000, maxAgeHours: 0.5 },
    ]);
    expect(config.logLevels).toEqual(['error', 'warn', 'log', 'debug']);
  });

  it.each([
    { RECONCILIATION_TIERS: 'not json' },
    { RECONCILIATION_TIERS: '[]' },
    { RECONCILIATION_TIERS: '[{"name":"x","minConfirmations":0,"pollIntervalMs":1,"maxAgeHours":1}]' },
    { DATABASE_PORT: 'abc' },
    { LEDGER_RPC_URL: 'not a url' },
    { FEE_MARGIN: 'lots' },
  ])('rejects %p', (env) => {
    expect(() => loadConfig(env)).toThrow(ZodError);
  });
});

describe('logLevelsFrom', () => {
  it('enables every level up to the threshold', () => {
    expect(logLevelsFrom('error')).toEqual(['error']);
    expect(logLevelsFrom('verbose')).toEqual(['error', 'warn', 'log', 'debug', 'verbose']);
  });
});
