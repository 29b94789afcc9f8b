import request from 'supertest';
import { createTestApp, removeTempDir, TestApp } from '../helpers';

describe('Health Endpoints', () => {
  let ctx: TestApp;

  beforeEach(() => {
    ctx = createTestApp();
  });

  afterEach(() => {
    removeTempDir(ctx.ledgerDir);
  });

  it('GET /health should report the account count', async () => {
    ctx.atmService.registerAccount(1, 1, 'Health Check', 0);

    const response = await request(ctx.app).get('/health');

    expect(response.status).toBe(200);
    expect(response.body.status).toBe('healthy');
    expect(response.body.services).toEqual({ atm: { accounts: 1 } });
  });

  it('GET /health/live should return alive', async () => {
    const response = await request(ctx.app).get('/health/live');

    expect(response.status).toBe(200);
    expect(response.body.status).toBe('alive');
    expect(response.body).toHaveProperty('timestamp');
  });

  it('GET / should describe the API', async () => {
    const response = await request(ctx.app).get('/');

    expect(response.status).toBe(200);
    expect(response.body.name).toBe('ATM Ledger API');
  });
});
