import {
  InsertOutcome,
  InvalidPageError,
  MessageStore,
  ValidMessage,
} from '../../src';

function message(
  messageId: string,
  overrides: Partial<Omit<ValidMessage, 'messageId'>> = {},
): ValidMessage {
  return {
    messageId,
    from: '+919876543210',
    to: '+14155550100',
    ts: '2025-01-15T10:00:00.000Z',
    text: 'Hello',
    ...overrides,
  };
}

function at(second: number): string {
  return `2025-01-15T10:00:${String(second).padStart(2, '0')}.000Z`;
}

/**
 * Behavior every MessageStore implementation must share
 */
export function describeMessageStoreContract(
  createStore: () => Promise<MessageStore>,
): void {
  let store: MessageStore;

  beforeEach(async () => {
    store = await createStore();
  });

  afterEach(async () => {
    await store.close();
  });

  describe('insert', () => {
    it('should create a new message', async () => {
      await expect(store.insert(message('m1'))).resolves.toBe(
        InsertOutcome.CREATED,
      );

      const page = await store.list({});
      expect(page.total).toBe(1);
      expect(page.items[0]).toMatchObject({
        messageId: 'm1',
        from: '+919876543210',
        to: '+14155550100',
        ts: '2025-01-15T10:00:00.000Z',
        text: 'Hello',
      });
      expect(page.items[0].createdAt).toMatch(
        /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/,
      );
    });

    it('should keep the first write for a repeated message id', async () => {
      await store.insert(message('m1', { text: 'first' }));

      await expect(
        store.insert(message('m1', { text: 'second', from: '+447700900123' })),
      ).resolves.toBe(InsertOutcome.ALREADY_EXISTS);

      const page = await store.list({});
      expect(page.total).toBe(1);
      expect(page.items[0].text).toBe('first');
      expect(page.items[0].from).toBe('+919876543210');
    });

    it('should store a message without text', async () => {
      await store.insert(message('m1', { text: null }));

      const page = await store.list({});
      expect(page.items[0].text).toBeNull();
    });

    it('should create exactly once under concurrent inserts', async () => {
      const outcomes = await Promise.all(
        Array.from({ length: 5 }, () => store.insert(message('m1'))),
      );

      expect(outcomes.filter((o) => o === InsertOutcome.CREATED)).toHaveLength(1);
      expect(
        outcomes.filter((o) => o === InsertOutcome.ALREADY_EXISTS),
      ).toHaveLength(4);
    });
  });

  describe('list', () => {
    it('should order by ts then message id', async () => {
      await store.insert(message('b', { ts: at(2) }));
      await store.insert(message('a', { ts: at(2) }));
      await store.insert(message('c', { ts: at(1) }));

      const page = await store.list({});

      expect(page.items.map((m) => m.messageId)).toEqual(['c', 'a', 'b']);
    });

    it('should filter by exact sender', async () => {
      await store.insert(message('m1', { from: '+15550000001' }));
      await store.insert(message('m2', { from: '+15550000002' }));
      await store.insert(message('m3', { from: '+155500000011' }));

      const page = await store.list({ from: '+15550000001' });

      expect(page.items.map((m) => m.messageId)).toEqual(['m1']);
      expect(page.total).toBe(1);
    });

    it('should treat since as an inclusive lower bound', async () => {
      await store.insert(message('m1', { ts: at(1) }));
      await store.insert(message('m2', { ts: at(2) }));
      await store.insert(message('m3', { ts: at(3) }));

      const page = await store.list({ since: at(2) });

      expect(page.items.map((m) => m.messageId)).toEqual(['m2', 'm3']);
    });

    it('should match text case-insensitively and skip messages without text', async () => {
      await store.insert(message('m1', { ts: at(1), text: 'Order SHIPPED' }));
      await store.insert(message('m2', { ts: at(2), text: 'order pending' }));
      await store.insert(message('m3', { ts: at(3), text: null }));

      const page = await store.list({ q: 'shipped' });

      expect(page.items.map((m) => m.messageId)).toEqual(['m1']);
      expect((await store.list({ q: 'ORDER' })).total).toBe(2);
    });

    it('should match non-ASCII text case-insensitively', async () => {
      await store.insert(message('m1', { ts: at(1), text: 'Café ÉCOLE' }));
      await store.insert(message('m2', { ts: at(2), text: 'Straße' }));

      const exact = await store.list({ q: 'ÉCOLE' });
      const lower = await store.list({ q: 'école' });
      const upper = await store.list({ q: 'CAFÉ' });

      expect(exact.items.map((m) => m.messageId)).toEqual(['m1']);
      expect(lower.items.map((m) => m.messageId)).toEqual(['m1']);
      expect(upper.items.map((m) => m.messageId)).toEqual(['m1']);
    });

    it('should match LIKE wildcards literally', async () => {
      await store.insert(message('m1', { ts: at(1), text: '100% done' }));
      await store.insert(message('m2', { ts: at(2), text: '100 percent' }));
      await store.insert(message('m3', { ts: at(3), text: 'snake_case' }));
      await store.insert(message('m4', { ts: at(4), text: 'snakeXcase' }));
      await store.insert(message('m5', { ts: at(5), text: 'C:\\temp' }));

      const percent = await store.list({ q: '%' });
      const underscore = await store.list({ q: '_' });
      const backslash = await store.list({ q: '\\' });

      expect(percent.items.map((m) => m.messageId)).toEqual(['m1']);
      expect(underscore.items.map((m) => m.messageId)).toEqual(['m3']);
      expect(backslash.items.map((m) => m.messageId)).toEqual(['m5']);
    });

    it('should combine filters', async () => {
      await store.insert(message('m1', { ts: at(1), from: '+15550000001', text: 'hi' }));
      await store.insert(message('m2', { ts: at(2), from: '+15550000001', text: 'hi' }));
      await store.insert(message('m3', { ts: at(3), from: '+15550000002', text: 'hi' }));
      await store.insert(message('m4', { ts: at(4), from: '+15550000001', text: 'bye' }));

      const page = await store.list({
        from: '+15550000001',
        since: at(2),
        q: 'HI',
      });

      expect(page.items.map((m) => m.messageId)).toEqual(['m2']);
      expect(page.total).toBe(1);
    });

    it('should paginate with a total over the whole match set', async () => {
      for (let i = 1; i <= 5; i++) {
        await store.insert(message(`m${i}`, { ts: at(i) }));
      }

      const page = await store.list({}, { limit: 2, offset: 2 });

      expect(page.items.map((m) => m.messageId)).toEqual(['m3', 'm4']);
      expect(page).toMatchObject({ total: 5, limit: 2, offset: 2 });
    });

    it('should rebuild the full ordering by walking every page', async () => {
      const ids = Array.from({ length: 25 }, (_, i) => `id-${String(i).padStart(2, '0')}`);
      const shuffled = ids
        .map((id, i) => ({ id, key: (i * 7) % 25 }))
        .sort((a, b) => a.key - b.key)
        .map(({ id }) => id);
      for (const [i, id] of shuffled.entries()) {
        await store.insert(message(id, { ts: at(i % 3) }));
      }

      const walked: string[] = [];
      for (let offset = 0; offset < 25; offset += 4) {
        const page = await store.list({}, { limit: 4, offset });
        expect(page.total).toBe(25);
        walked.push(...page.items.map((m) => m.messageId));
      }
      const all = await store.list({}, { limit: 100 });

      expect(walked).toEqual(all.items.map((m) => m.messageId));
      expect(new Set(walked).size).toBe(25);
      expect(all.items.map((m) => m.ts)).toEqual(
        [...all.items.map((m) => m.ts)].sort(),
      );
    });

    it('should break timestamp ties by byte order of message id', async () => {
      for (const id of ['b', 'B', 'a-2', 'a_1', 'A']) {
        await store.insert(message(id));
      }

      const page = await store.list({});

      expect(page.items.map((m) => m.messageId)).toEqual([
        'A',
        'B',
        'a-2',
        'a_1',
        'b',
      ]);
    });

    it('should return an empty page past the end', async () => {
      await store.insert(message('m1'));

      const page = await store.list({}, { limit: 10, offset: 5 });

      expect(page.items).toEqual([]);
      expect(page.total).toBe(1);
    });

    it('should apply the default page', async () => {
      const page = await store.list({});

      expect(page).toEqual({ items: [], total: 0, limit: 50, offset: 0 });
    });

    it('should reject out-of-range pages', async () => {
      await expect(store.list({}, { limit: 0 })).rejects.toThrow(
        InvalidPageError,
      );
      await expect(store.list({}, { limit: 101 })).rejects.toThrow(
        InvalidPageError,
      );
      await expect(store.list({}, { offset: -1 })).rejects.toThrow(
        InvalidPageError,
      );
    });
  });

  describe('stats', () => {
    it('should report an empty store', async () => {
      await expect(store.stats()).resolves.toEqual({
        totalMessages: 0,
        uniqueSenderCount: 0,
        topSenders: [],
        firstMessageTs: null,
        lastMessageTs: null,
      });
    });

    it('should aggregate stored messages', async () => {
      await store.insert(message('m1', { ts: at(3), from: '+15550000002' }));
      await store.insert(message('m2', { ts: at(1), from: '+15550000001' }));
      await store.insert(message('m3', { ts: at(5), from: '+15550000002' }));

      await expect(store.stats()).resolves.toEqual({
        totalMessages: 3,
        uniqueSenderCount: 2,
        topSenders: [
          { from: '+15550000002', count: 2 },
          { from: '+15550000001', count: 1 },
        ],
        firstMessageTs: at(1),
        lastMessageTs: at(5),
      });
    });

    it('should limit top senders to ten, breaking ties by sender', async () => {
      let id = 0;
      for (const from of ['+15550000020', '+15550000010']) {
        for (let i = 0; i < 3; i++) {
          await store.insert(message(`m${id++}`, { from }));
        }
      }
      for (let sender = 30; sender < 41; sender++) {
        await store.insert(message(`m${id++}`, { from: `+155500000${sender}` }));
      }

      const stats = await store.stats();

      expect(stats.totalMessages).toBe(17);
      expect(stats.uniqueSenderCount).toBe(13);
      expect(stats.topSenders).toEqual([
        { from: '+15550000010', count: 3 },
        { from: '+15550000020', count: 3 },
        ...Array.from({ length: 8 }, (_, i) => ({
          from: `+155500000${30 + i}`,
          count: 1,
        })),
      ]);
    });

    it('should count the same messages as an unfiltered list', async () => {
      for (let i = 1; i <= 4; i++) {
        await store.insert(message(`m${i}`, { ts: at(i) }));
      }
      await store.insert(message('m1'));

      const [stats, page] = await Promise.all([store.stats(), store.list({})]);

      expect(stats.totalMessages).toBe(page.total);
      expect(stats.totalMessages).toBe(4);
    });
  });

  describe('ping', () => {
    it('should report a ready store', async () => {
      await expect(store.ping()).resolves.toBe(true);
    });
  });
}
