import { INestApplication, Logger } from '@nestjs/common';
import request from 'supertest';
import { App } from 'supertest/types';
import { BalanceRecordedResponse, PEER_ID_PATTERN } from '../src/ingestion';
import { availablePrice } from '../src/price/price-quote';
import { InMemoryBalanceRecordStore } from '../src/storage/in-memory.store';
import { createTestApp } from './utils/test-helpers';
import { balanceCsv } from './utils/csv-builder';

/**
 * E2E Tests for POST /update_balance
 *
 * Runs the real AppModule with the record store swapped for an in-memory
 * one, so the written series can be read back without touching disk.
 */
describe('IngestionController (e2e)', () => {
  let app: INestApplication<App>;
  let store: InMemoryBalanceRecordStore;

  const seriesText = async (): Promise<Record<string, string>> => {
    const sources = await store.readSources();
    return Object.fromEntries(
      sources.map((s) => [s.name, s.content.toString('utf-8')]),
    );
  };

  beforeEach(async () => {
    jest.spyOn(Logger.prototype, 'log').mockImplementation();
    jest.spyOn(Logger.prototype, 'warn').mockImplementation();
    ({ app, store } = await createTestApp(availablePrice(0.2)));
  });

  afterEach(async () => {
    await app.close();
    jest.restoreAllMocks();
  });

  it('should record a report and echo the stored values', async () => {
    const response = await request(app.getHttpServer())
      .post('/update_balance')
      .send({
        peer_id: 'QmPeer1',
        balance: '120.5 QUIL',
        timestamp: '2025-10-01T10:00:00Z',
      })
      .expect(200);

    const body: BalanceRecordedResponse = response.body;
    expect(body).toEqual({
      status: 'recorded',
      peerId: 'QmPeer1',
      balance: '120.5 QUIL',
      timestamp: '2025-10-01T10:00:00Z',
    });
    expect(await seriesText()).toEqual({
      'node_balance_QmPeer1.csv': balanceCsv([
        ['2025-10-01T10:00:00Z', 'QmPeer1', '120.5 QUIL'],
      ]),
    });
  });

  it('should append successive reports to the same series', async () => {
    const server = app.getHttpServer();
    await request(server)
      .post('/update_balance')
      .send({ peer_id: 'A', balance: 10, timestamp: '2025-10-01T10:00:00Z' })
      .expect(200);
    await request(server)
      .post('/update_balance')
      .send({ peer_id: 'A', balance: 0, timestamp: '2025-10-01T10:01:00Z' })
      .expect(200);

    expect(await seriesText()).toEqual({
      'node_balance_A.csv': balanceCsv([
        ['2025-10-01T10:00:00Z', 'A', '10'],
        ['2025-10-01T10:01:00Z', 'A', '0'],
      ]),
    });
  });

  it('should return 400 and write nothing when balance is missing', async () => {
    const response = await request(app.getHttpServer())
      .post('/update_balance')
      .send({ peer_id: 'A', timestamp: '2025-10-01T10:00:00Z' })
      .expect(400);

    expect(response.body).toMatchObject({
      statusCode: 400,
      message: 'Missing required fields: balance',
    });
    expect(await store.readSources()).toEqual([]);
  });

  it('should return 400 for a body that is not JSON', async () => {
    await request(app.getHttpServer())
      .post('/update_balance')
      .set('Content-Type', 'application/json')
      .send('{"peer_id": "A",')
      .expect(400);

    expect(await store.readSources()).toEqual([]);
  });

  it('should return 400 for a peer id that is not file-safe', async () => {
    const peerId = '../../etc/passwd';
    expect(PEER_ID_PATTERN.test(peerId)).toBe(false);

    const response = await request(app.getHttpServer())
      .post('/update_balance')
      .send({ peer_id: peerId, balance: '1', timestamp: '2025-10-01T10:00:00Z' })
      .expect(400);

    expect(response.body.message).toMatch(/^Invalid fields: peer_id /);
    expect(await store.readSources()).toEqual([]);
  });
});
