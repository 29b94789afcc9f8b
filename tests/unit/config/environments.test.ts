/**
 * Environment Configuration Unit Tests
 */

import path from 'path';

describe('Environment Configuration', () => {
  const originalEnv = { ...process.env };

  const loadEnvironments = async () => {
    jest.resetModules();
    return import('../../../src/config/environments');
  };

  afterEach(() => {
    process.env = { ...originalEnv };
  });

  it('should detect the test environment', async () => {
    const env = await loadEnvironments();

    expect(env.NODE_ENV).toBe('test');
    expect(env.isTest).toBe(true);
    expect(env.isProduction).toBe(false);
  });

  it('should silence logging in tests unless LOG_LEVEL is set', async () => {
    expect((await loadEnvironments()).LOG_CONFIG).toEqual({ level: 'silent', prettyPrint: false });

    process.env.LOG_LEVEL = 'warn';
    expect((await loadEnvironments()).LOG_CONFIG.level).toBe('warn');
  });

  it('should log at info in production', async () => {
    process.env.NODE_ENV = 'production';
    delete process.env.LOG_LEVEL;

    const env = await loadEnvironments();

    expect(env.isProduction).toBe(true);
    expect(env.LOG_CONFIG.level).toBe('info');
  });

  it('should read the port and body limit', async () => {
    process.env.PORT = '4100';
    process.env.API_BODY_LIMIT = '1mb';

    const { API_CONFIG } = await loadEnvironments();

    expect(API_CONFIG).toEqual({ port: 4100, bodyLimit: '1mb' });
  });

  it('should resolve the ledger directory', async () => {
    process.env.LEDGER_DIR = 'exports/ledgers';
    expect((await loadEnvironments()).ATM_CONFIG.ledgerDir).toBe(path.resolve('exports/ledgers'));

    delete process.env.LEDGER_DIR;
    expect((await loadEnvironments()).ATM_CONFIG.ledgerDir).toBe(path.resolve('ledgers'));
  });
});
