import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { MockAgent, getGlobalDispatcher, setGlobalDispatcher } from 'undici';
import type { Dispatcher } from 'undici';
import { z } from 'zod';
import { requestJson } from '../http.js';
import type { RequestPolicy } from '../http.js';

const ORIGIN = 'https://api.example.com';

const policy: RequestPolicy = {
  timeout: 1000,
  maxAttempts: 3,
  retryCodes: [429, 503],
  retryInterval: 0,
};

const ItemSchema = z.object({ ok: z.boolean() });

const request = (path: string, overrides: Partial<RequestPolicy> = {}) =>
  requestJson(`${ORIGIN}${path}`, {
    service: 'Example',
    schema: ItemSchema,
    policy: { ...policy, ...overrides },
  });

describe('requestJson', () => {
  let agent: MockAgent;
  let originalDispatcher: Dispatcher;

  beforeEach(() => {
    originalDispatcher = getGlobalDispatcher();
    agent = new MockAgent();
    agent.disableNetConnect();
    setGlobalDispatcher(agent);
  });

  afterEach(async () => {
    setGlobalDispatcher(originalDispatcher);
    await agent.close();
  });

  it('returns the validated body', async () => {
    agent.get(ORIGIN).intercept({ path: '/item' }).reply(200, { ok: true, extra: 1 });
    expect(await request('/item')).toEqual({ ok: true });
  });

  it('retries retryable statuses', async () => {
    const pool = agent.get(ORIGIN);
    pool.intercept({ path: '/item' }).reply(503, 'busy');
    pool.intercept({ path: '/item' }).reply(429, 'slow down');
    pool.intercept({ path: '/item' }).reply(200, { ok: true });

    expect(await request('/item')).toEqual({ ok: true });
    agent.assertNoPendingInterceptors();
  });

  it('fails after the last attempt', async () => {
    agent.get(ORIGIN).intercept({ path: '/item' }).reply(503, 'busy').times(3);

    await expect(request('/item')).rejects.toMatchObject({
      message: 'Example request failed after 3 attempts',
      code: 'SERVICE_UNAVAILABLE',
      statusCode: 503,
    });
    agent.assertNoPendingInterceptors();
  });

  it('fails immediately on other statuses', async () => {
    agent.get(ORIGIN).intercept({ path: '/item' }).reply(404, 'missing');

    await expect(request('/item')).rejects.toMatchObject({
      code: 'NOT_FOUND',
      statusCode: 404,
      body: 'missing',
    });
  });

  it('rejects a body that does not match the schema', async () => {
    agent.get(ORIGIN).intercept({ path: '/item' }).reply(200, { ok: 'yes' });

    await expect(request('/item')).rejects.toMatchObject({
      code: 'INVALID_RESPONSE',
      body: { ok: 'yes' },
    });
  });

  it('rejects a body that is not JSON', async () => {
    agent.get(ORIGIN).intercept({ path: '/item' }).reply(200, '<html>');

    await expect(request('/item')).rejects.toMatchObject({
      code: 'INVALID_RESPONSE',
      body: '<html>',
    });
  });

  it('sends form bodies', async () => {
    agent
      .get(ORIGIN)
      .intercept({ path: '/form', method: 'POST', body: 'magnet=abc' })
      .reply(200, { ok: true });

    const result = await requestJson(`${ORIGIN}/form`, {
      service: 'Example',
      schema: ItemSchema,
      policy,
      method: 'POST',
      form: { magnet: 'abc' },
    });
    expect(result).toEqual({ ok: true });
  });
});
