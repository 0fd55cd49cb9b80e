import { INestApplication } from '@nestjs/common';
import { NestExpressApplication } from '@nestjs/platform-express';
import { Test } from '@nestjs/testing';
import request from 'supertest';
import {
  AppSetupOptions,
  InboxModule,
  InboxModuleConfig,
  MemoryMessageStore,
  SignedMessage,
  SignedMessageFactory,
  configureApp,
} from '../../src';

describe('Inbox API', () => {
  let app: INestApplication;
  let store: MemoryMessageStore;

  const createApp = async (
    config: InboxModuleConfig,
    setup: AppSetupOptions = {},
  ): Promise<INestApplication> => {
    const moduleRef = await Test.createTestingModule({
      imports: [InboxModule.forRoot(config)],
    }).compile();

    const nestApp = moduleRef.createNestApplication<NestExpressApplication>({
      bodyParser: false,
      logger: false,
    });
    configureApp(nestApp, { swagger: false, ...setup });
    await nestApp.init();
    return nestApp;
  };

  const post = (message: SignedMessage) =>
    request(app.getHttpServer())
      .post('/webhook')
      .set(message.headers)
      .send(message.body.toString());

  beforeEach(async () => {
    store = new MemoryMessageStore();
    app = await createApp({ webhookSecret: 'test-secret', storage: { store } });
  });

  afterEach(async () => {
    await app.close();
  });

  describe('POST /webhook', () => {
    it('should ingest, query and count a typical session', async () => {
      const m1 = SignedMessageFactory.message({ messageId: 'm1' });

      await post(m1).expect(200, { status: 'ok' });
      await post(m1).expect(200, { status: 'ok' });

      await post(SignedMessageFactory.invalidSignature({ messageId: 'm2' })).expect(
        401,
        { message: 'invalid signature', error: 'Unauthorized', statusCode: 401 },
      );

      await post(SignedMessageFactory.invalidPhone({ messageId: 'm3' })).expect(
        422,
        {
          statusCode: 422,
          message: 'validation failed',
          field: 'from',
          reason: 'from must be a phone number: optional + followed by 7-15 digits',
        },
      );

      await post(SignedMessageFactory.invalidTimestamp({ messageId: 'm4' })).expect(
        422,
        {
          statusCode: 422,
          message: 'validation failed',
          field: 'ts',
          reason: 'ts must be an ISO-8601 timestamp with Z or a UTC offset',
        },
      );

      await request(app.getHttpServer())
        .get('/messages')
        .expect(200, {
          data: [
            {
              message_id: 'm1',
              from: '+919876543210',
              to: '+14155550100',
              ts: '2025-01-15T10:00:00.000Z',
              text: 'Hello',
            },
          ],
          total: 1,
          limit: 50,
          offset: 0,
        });

      await request(app.getHttpServer())
        .get('/stats')
        .expect(200, {
          total_messages: 1,
          senders_count: 1,
          messages_per_sender: [{ from: '+919876543210', count: 1 }],
          first_message_ts: '2025-01-15T10:00:00.000Z',
          last_message_ts: '2025-01-15T10:00:00.000Z',
        });

      const metrics = await request(app.getHttpServer()).get('/metrics').expect(200);
      const lines = metrics.text.split('\n');

      expect(metrics.headers['content-type']).toContain('text/plain');
      expect(metrics.headers['content-type']).toContain('version=0.0.4');
      expect(lines).toEqual(
        expect.arrayContaining([
          'http_requests_total{path="/webhook",status="200"} 2',
          'http_requests_total{path="/webhook",status="401"} 1',
          'http_requests_total{path="/webhook",status="422"} 2',
          'http_requests_total{path="/messages",status="200"} 1',
          'http_requests_total{path="/stats",status="200"} 1',
          'webhook_requests_total{result="created"} 1',
          'webhook_requests_total{result="duplicate"} 1',
          'webhook_requests_total{result="invalid_signature"} 1',
          'webhook_requests_total{result="validation_error"} 2',
          'webhook_requests_total{result="storage_unavailable"} 0',
          'request_latency_ms_count{path="/webhook"} 5',
        ]),
      );
    });

    it('should reject a request without a signature', async () => {
      const message = SignedMessageFactory.message({ messageId: 'm1' });

      await request(app.getHttpServer())
        .post('/webhook')
        .set('content-type', 'application/json')
        .send(message.body.toString())
        .expect(401);
      expect(store.size()).toBe(0);
    });

    it('should verify the body bytes exactly as sent', async () => {
      const raw = '{ "message_id": "m1",  "from": "+919876543210", "to": "+14155550100", "ts": "2025-01-15T10:00:00Z" }\n';
      const message = SignedMessageFactory.fromRaw(raw);

      await post(message).expect(200, { status: 'ok' });

      const page = await store.list({});
      expect(page.items[0].text).toBeNull();
    });

    it('should accept any content type', async () => {
      const message = SignedMessageFactory.message({ messageId: 'm1' });

      await request(app.getHttpServer())
        .post('/webhook')
        .set({ ...message.headers, 'content-type': 'text/plain' })
        .send(message.body.toString())
        .expect(200, { status: 'ok' });
    });

    it('should answer 503 while storage is down', async () => {
      store.setAvailable(false);

      await post(SignedMessageFactory.message({ messageId: 'm1' })).expect(503, {
        message: 'storage unavailable',
        error: 'Service Unavailable',
        statusCode: 503,
      });
    });

    it('should tag every response with a request id', async () => {
      const response = await post(SignedMessageFactory.message({ messageId: 'm1' }));

      expect(response.headers['x-request-id']).toMatch(
        /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/,
      );
    });

    it('should refuse bodies above the configured limit', async () => {
      await app.close();
      app = await createApp(
        { webhookSecret: 'test-secret', storage: { store } },
        { bodyLimit: '100b' },
      );

      await post(
        SignedMessageFactory.message({ messageId: 'm1', text: 'x'.repeat(200) }),
      ).expect(413);
      expect(store.size()).toBe(0);

      const metrics = await request(app.getHttpServer()).get('/metrics').expect(200);
      expect(metrics.text.split('\n')).toContain(
        'http_requests_total{path="/webhook",status="413"} 1',
      );
    });

    it('should count and tag requests that match no route', async () => {
      const response = await request(app.getHttpServer()).get('/nope').expect(404);

      expect(response.headers['x-request-id']).toMatch(/^[0-9a-f-]{36}$/);

      const metrics = await request(app.getHttpServer()).get('/metrics').expect(200);
      expect(metrics.text.split('\n')).toContain(
        'http_requests_total{path="/nope",status="404"} 1',
      );
    });
  });

  describe('GET /messages', () => {
    beforeEach(async () => {
      await post(
        SignedMessageFactory.message({
          messageId: 'm1',
          from: '+15550000001',
          ts: '2025-01-15T09:59:59Z',
          text: 'early bird',
        }),
      ).expect(200);
      await post(
        SignedMessageFactory.message({
          messageId: 'm2',
          from: '+15550000002',
          ts: '2025-01-15T10:00:00Z',
          text: 'On time',
        }),
      ).expect(200);
      await post(
        SignedMessageFactory.message({
          messageId: 'm3',
          from: '+15550000001',
          ts: '2025-01-15T10:00:01Z',
          omitText: true,
        }),
      ).expect(200);
    });

    const ids = (response: request.Response): string[] => {
      const body: unknown = response.body;
      if (
        typeof body !== 'object' ||
        body === null ||
        !('data' in body) ||
        !Array.isArray(body.data)
      ) {
        throw new Error('unexpected body');
      }
      return body.data.map((item: { message_id: string }) => item.message_id);
    };

    it('should compare since by instant across offsets', async () => {
      const response = await request(app.getHttpServer())
        .get('/messages')
        .query({ since: '2025-01-15T15:30:00+05:30' })
        .expect(200);

      expect(ids(response)).toEqual(['m2', 'm3']);
    });

    it('should filter by sender and text', async () => {
      const bySender = await request(app.getHttpServer())
        .get('/messages')
        .query({ from: '+15550000001' })
        .expect(200);
      const byText = await request(app.getHttpServer())
        .get('/messages')
        .query({ q: 'TIME' })
        .expect(200);

      expect(ids(bySender)).toEqual(['m1', 'm3']);
      expect(ids(byText)).toEqual(['m2']);
    });

    it('should paginate', async () => {
      const response = await request(app.getHttpServer())
        .get('/messages')
        .query({ limit: 1, offset: 1 })
        .expect(200);

      expect(ids(response)).toEqual(['m2']);
      expect(response.body).toMatchObject({ total: 3, limit: 1, offset: 1 });
    });

    it('should reject invalid query parameters with 422', async () => {
      await request(app.getHttpServer())
        .get('/messages')
        .query({ limit: 101 })
        .expect(422, {
          message: ['limit must not be greater than 100'],
          error: 'Unprocessable Entity',
          statusCode: 422,
        });
      await request(app.getHttpServer())
        .get('/messages')
        .query({ since: 'yesterday' })
        .expect(422);
    });

    it('should answer 503 while storage is down', async () => {
      store.setAvailable(false);

      await request(app.getHttpServer()).get('/messages').expect(503);
      await request(app.getHttpServer()).get('/stats').expect(503);
    });
  });

  describe('Health', () => {
    it('should always report alive', async () => {
      await request(app.getHttpServer())
        .get('/health/live')
        .expect(200, { status: 'alive' });
    });

    it('should report ready with a secret and a reachable store', async () => {
      await request(app.getHttpServer())
        .get('/health/ready')
        .expect(200, { status: 'ready' });
    });

    it('should report not ready when the store is down', async () => {
      store.setAvailable(false);

      await request(app.getHttpServer())
        .get('/health/ready')
        .expect(503, { status: 'not ready', reason: 'database not ready' });
    });

    it('should report not ready and reject webhooks without a secret', async () => {
      await app.close();
      store = new MemoryMessageStore();
      app = await createApp({ storage: { store } });

      await request(app.getHttpServer())
        .get('/health/ready')
        .expect(503, { status: 'not ready', reason: 'WEBHOOK_SECRET is not set' });
      await post(SignedMessageFactory.message({ messageId: 'm1' })).expect(401);
      expect(store.size()).toBe(0);
    });
  });
});
