import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { MockAgent, getGlobalDispatcher, setGlobalDispatcher } from 'undici';
import type { Dispatcher } from 'undici';
import { RealDebridService } from '../realdebrid.js';
import { createVersion } from '../availability.js';
import {
  HASH_A,
  HASH_B,
  fileEntry,
  makeCandidate,
} from '../../__tests__/fixtures.js';

const ORIGIN = 'https://rd.example.com';

const createService = (batchSize = 200) =>
  new RealDebridService({
    token: 'test-secret',
    baseUrl: `${ORIGIN}/rest/1.0`,
    policy: { timeout: 1000, maxAttempts: 1, retryCodes: [], retryInterval: 0 },
    batchSize,
    concurrency: 2,
  });

describe('RealDebridService', () => {
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

  describe('checkAvailability', () => {
    it('maps cached hashes to their file groups', async () => {
      agent
        .get(ORIGIN)
        .intercept({
          path: `/rest/1.0/torrents/instantAvailability/${HASH_A}/${HASH_B}`,
          method: 'GET',
        })
        .reply(200, {
          [HASH_A]: { rd: [{ '1': { filename: 'Movie.mkv', filesize: 1000 } }] },
          [HASH_B]: [],
        });

      const result = await createService().checkAvailability([HASH_A, HASH_B]);

      expect([...result.keys()]).toEqual([HASH_A]);
      expect(result.get(HASH_A)).toEqual([
        { '1': { filename: 'Movie.mkv', filesize: 1000 } },
      ]);
    });

    it('splits large batches', async () => {
      const pool = agent.get(ORIGIN);
      pool
        .intercept({ path: `/rest/1.0/torrents/instantAvailability/${HASH_A}` })
        .reply(200, { [HASH_A]: { rd: [] } });
      pool
        .intercept({ path: `/rest/1.0/torrents/instantAvailability/${HASH_B}` })
        .reply(200, {
          [HASH_B]: { rd: [{ '2': { filename: 'Show.S01E01.mkv', filesize: 5 } }] },
        });

      const result = await createService(1).checkAvailability([HASH_A, HASH_B]);

      expect([...result.keys()]).toEqual([HASH_B]);
      agent.assertNoPendingInterceptors();
    });

    it('rejects with a service error on failure', async () => {
      agent
        .get(ORIGIN)
        .intercept({ path: `/rest/1.0/torrents/instantAvailability/${HASH_A}` })
        .reply(401, { error: 'bad_token' });

      await expect(createService().checkAvailability([HASH_A])).rejects.toMatchObject({
        name: 'ServiceError',
        code: 'UNAUTHORIZED',
        statusCode: 401,
      });
    });
  });

  describe('download', () => {
    const candidate = makeCandidate({
      title: 'Movie',
      contentHash: HASH_A,
      versions: [
        createVersion([fileEntry({ id: '1' }), fileEntry({ id: '2' })]),
        createVersion([fileEntry({ id: '3' })]),
      ],
    });

    it('falls back to the next version when links are missing', async () => {
      const pool = agent.get(ORIGIN);
      pool
        .intercept({ path: '/rest/1.0/torrents/addMagnet', method: 'POST' })
        .reply(201, { id: 'T1', uri: 'https://rd.example.com/t/T1' });
      pool
        .intercept({
          path: '/rest/1.0/torrents/selectFiles/T1',
          method: 'POST',
          body: 'files=1%2C2',
        })
        .reply(204, '');
      pool
        .intercept({ path: '/rest/1.0/torrents/info/T1', method: 'GET' })
        .reply(200, { id: 'T1', filename: 'Movie.rar', links: ['https://l/1'] });
      pool
        .intercept({ path: '/rest/1.0/torrents/delete/T1', method: 'DELETE' })
        .reply(204, '');
      pool
        .intercept({ path: '/rest/1.0/torrents/addMagnet', method: 'POST' })
        .reply(201, { id: 'T2', uri: 'https://rd.example.com/t/T2' });
      pool
        .intercept({
          path: '/rest/1.0/torrents/selectFiles/T2',
          method: 'POST',
          body: 'files=3',
        })
        .reply(204, '');
      pool
        .intercept({ path: '/rest/1.0/torrents/info/T2', method: 'GET' })
        .reply(200, { id: 'T2', filename: 'Movie.mkv', links: ['https://l/2'] });
      pool
        .intercept({ path: '/rest/1.0/unrestrict/link', method: 'POST' })
        .reply(200, { download: 'https://dl.example.com/Movie.mkv' });

      expect(await createService().download(candidate)).toBe(true);
      agent.assertNoPendingInterceptors();
    });

    it('deletes the torrent when selecting files fails', async () => {
      const pool = agent.get(ORIGIN);
      pool
        .intercept({ path: '/rest/1.0/torrents/addMagnet', method: 'POST' })
        .reply(201, { id: 'T1', uri: 'https://rd.example.com/t/T1' });
      pool
        .intercept({ path: '/rest/1.0/torrents/selectFiles/T1', method: 'POST' })
        .reply(500, 'error');
      pool
        .intercept({ path: '/rest/1.0/torrents/delete/T1', method: 'DELETE' })
        .reply(204, '');
      pool
        .intercept({ path: '/rest/1.0/torrents/addMagnet', method: 'POST' })
        .reply(201, { id: 'T2', uri: 'https://rd.example.com/t/T2' });
      pool
        .intercept({ path: '/rest/1.0/torrents/selectFiles/T2', method: 'POST' })
        .reply(204, '');
      pool
        .intercept({ path: '/rest/1.0/torrents/info/T2', method: 'GET' })
        .reply(200, { id: 'T2', filename: 'Movie.mkv', links: ['https://l/2'] });
      pool
        .intercept({ path: '/rest/1.0/unrestrict/link', method: 'POST' })
        .reply(200, { download: 'https://dl.example.com/Movie.mkv' });

      expect(await createService().download(candidate)).toBe(true);
      agent.assertNoPendingInterceptors();
    });

    it('deletes the torrent when unrestricting fails', async () => {
      const single = makeCandidate({
        title: 'Movie',
        contentHash: HASH_A,
        versions: [createVersion([fileEntry({ id: '3' })])],
      });
      const pool = agent.get(ORIGIN);
      pool
        .intercept({ path: '/rest/1.0/torrents/addMagnet', method: 'POST' })
        .reply(201, { id: 'T3', uri: 'https://rd.example.com/t/T3' });
      pool
        .intercept({ path: '/rest/1.0/torrents/selectFiles/T3', method: 'POST' })
        .reply(204, '');
      pool
        .intercept({ path: '/rest/1.0/torrents/info/T3', method: 'GET' })
        .reply(200, { id: 'T3', filename: 'Movie.mkv', links: ['https://l/3'] });
      pool
        .intercept({ path: '/rest/1.0/unrestrict/link', method: 'POST' })
        .reply(403, { error: 'hoster_unavailable' });
      pool
        .intercept({ path: '/rest/1.0/torrents/delete/T3', method: 'DELETE' })
        .reply(204, '');

      expect(await createService().download(single)).toBe(false);
      agent.assertNoPendingInterceptors();
    });

    it('reports failure when no version can be added', async () => {
      agent
        .get(ORIGIN)
        .intercept({ path: '/rest/1.0/torrents/addMagnet', method: 'POST' })
        .reply(503, 'unavailable')
        .times(2);

      expect(await createService().download(candidate)).toBe(false);
    });
  });

  it('exposes its provider code', () => {
    expect(createService().providerCode).toBe('RD');
  });
});
