import { InMemorySessionStore, KeyedMutex, SessionMemory, TurnRecord, parseSessionSlots } from '../services/session.service';
import { emptyIdentifiers } from '../types';
import { CacheManager } from '../utils/cache-manager';
import { SessionSlots } from '../types/graph';

function turn(question: string, overrides: Partial<TurnRecord> = {}): TurnRecord {
  return {
    question,
    normalizedQuestion: question.toLowerCase(),
    intent: 'retrieval',
    identifiers: emptyIdentifiers(),
    topicShift: false,
    at: '2024-06-12T12:00:00.000Z',
    ...overrides,
  };
}

describe('KeyedMutex', () => {
  test('runs tasks on one key in order, other keys freely', async () => {
    const mutex = new KeyedMutex();
    const order: string[] = [];
    let open: () => void = () => undefined;
    const gate = new Promise<void>(resolve => {
      open = resolve;
    });

    const first = mutex.runExclusive('c1', async () => {
      order.push('first:start');
      await gate;
      order.push('first:end');
    });
    const second = mutex.runExclusive('c1', async () => {
      order.push('second');
    });
    await mutex.runExclusive('c2', async () => {
      order.push('other');
    });

    expect(order).toContain('other');
    expect(order).not.toContain('second');
    expect(mutex.isLocked('c1')).toBe(true);

    open();
    await Promise.all([first, second]);

    expect(order.filter(entry => entry !== 'other')).toEqual(['first:start', 'first:end', 'second']);
    expect(mutex.isLocked('c1')).toBe(false);
  });

  test('a failed task releases the key', async () => {
    const mutex = new KeyedMutex();

    await expect(mutex.runExclusive('c1', async () => Promise.reject(new Error('boom')))).rejects.toThrow('boom');
    await expect(mutex.runExclusive('c1', async () => 'next')).resolves.toBe('next');
    expect(mutex.isLocked('c1')).toBe(false);
  });
});

describe('InMemorySessionStore', () => {
  const slots: SessionSlots = {
    conversationId: 'conv-1',
    turns: [],
    sticky: { identifiers: { ...emptyIdentifiers(), container: ['CAIU1234567'] }, lastIntent: 'retrieval' },
    updatedAt: '2024-06-12T12:00:00.000Z',
  };

  test('hands out copies', async () => {
    const store = new InMemorySessionStore(1000);
    await store.set('conv-1', slots);

    const loaded = await store.get('conv-1');
    loaded?.sticky.identifiers.container.push('MSKU7654321');

    expect((await store.get('conv-1'))?.sticky.identifiers.container).toEqual(['CAIU1234567']);
    expect(slots.sticky.identifiers.container).toEqual(['CAIU1234567']);
  });

  test('expires after the ttl', async () => {
    let now = 1000;
    const store = new InMemorySessionStore(100, () => now);
    await store.set('conv-1', slots);

    now = 1100;
    expect(await store.get('conv-1')).not.toBeNull();
    now = 1101;
    expect(await store.get('conv-1')).toBeNull();
    expect(store.size).toBe(0);
  });
});

describe('CacheManager', () => {
  test('a write sweeps entries that expired without being read', () => {
    let now = 1000;
    const cache = new CacheManager<string>(100, () => now);
    cache.set('conv-1', 'first');
    cache.set('conv-2', 'second', 500);

    now = 1200;
    cache.set('conv-3', 'third');

    expect(cache.getStats().size).toBe(2);
    expect(cache.get('conv-2')).toBe('second');
    expect(cache.get('conv-1')).toBeNull();
  });
});

describe('SessionMemory', () => {
  const memory = new SessionMemory(new InMemorySessionStore(), 2);
  const caiu = { ...emptyIdentifiers(), container: ['CAIU1234567'] };

  test('a first turn starts the slots', () => {
    expect(memory.nextSlots('conv-1', null, turn('Where is CAIU1234567', { identifiers: caiu }))).toEqual({
      conversationId: 'conv-1',
      turns: [
        {
          question: 'Where is CAIU1234567',
          normalizedQuestion: 'where is caiu1234567',
          intent: 'retrieval',
          identifiers: caiu,
          at: '2024-06-12T12:00:00.000Z',
        },
      ],
      sticky: { identifiers: caiu, lastIntent: 'retrieval' },
      updatedAt: '2024-06-12T12:00:00.000Z',
    });
  });

  test('keeps sticky identifiers until a turn names new ones, and trims old turns', () => {
    const one = memory.nextSlots('conv-1', null, turn('Where is CAIU1234567', { identifiers: caiu }));
    const two = memory.nextSlots('conv-1', one, turn('what is its eta'));
    const three = memory.nextSlots('conv-1', two, turn('and the route'));

    expect(three.turns.map(entry => entry.question)).toEqual(['what is its eta', 'and the route']);
    expect(three.sticky.identifiers.container).toEqual(['CAIU1234567']);
  });

  test('a topic shift starts over from the current turn', () => {
    const one = memory.nextSlots('conv-1', null, turn('how many delivered', { intent: 'analytics' }));
    const msku = { ...emptyIdentifiers(), container: ['MSKU7654321'] };
    const two = memory.nextSlots('conv-1', one, turn('where is msku7654321', { identifiers: msku, topicShift: true }));

    expect(two.turns).toHaveLength(1);
    expect(two.sticky).toEqual({ identifiers: msku, lastIntent: 'retrieval' });
  });

  test('prior context prefers the sticky identifiers', () => {
    const one = memory.nextSlots('conv-1', null, turn('Where is CAIU1234567', { identifiers: caiu }));
    const two = memory.nextSlots('conv-1', one, turn('what is its eta'));

    expect(memory.priorContext(null)).toBeNull();
    expect(memory.priorContext(two)).toEqual({ question: 'what is its eta', intent: 'retrieval', identifiers: caiu });
  });

  test('withConversation saves and loads through the store', async () => {
    const slots = memory.nextSlots('conv-9', null, turn('Where is CAIU1234567', { identifiers: caiu }));
    await memory.withConversation('conv-9', () => memory.save('conv-9', slots));

    expect(await memory.load('conv-9')).toEqual(slots);
  });
});

describe('parseSessionSlots', () => {
  test('drops fields that do not fit', () => {
    expect(
      parseSessionSlots({
        conversationId: 'conv-1',
        turns: [{ question: 'where is caiu1234567', intent: 'bogus', identifiers: { container: ['CAIU1234567', 7] } }, 'x'],
        sticky: { lastIntent: 'analytics' },
      })
    ).toEqual({
      conversationId: 'conv-1',
      turns: [
        {
          question: 'where is caiu1234567',
          normalizedQuestion: 'where is caiu1234567',
          intent: null,
          identifiers: { ...emptyIdentifiers(), container: ['CAIU1234567'] },
          at: '',
        },
      ],
      sticky: { identifiers: emptyIdentifiers(), lastIntent: 'analytics' },
      updatedAt: '',
    });
  });

  test('anything without a conversation id is no session', () => {
    expect(parseSessionSlots(null)).toBeNull();
    expect(parseSessionSlots({ turns: [] })).toBeNull();
  });
});
