import {
  extractEntities,
  extractIdentifiers,
  extractTimeWindow,
  isTopicShift,
} from '../graph/nodes/extractor';
import { emptyIdentifiers } from '../types';
import { PriorTurnContext } from '../types/graph';

// Wednesday, local time
const NOW = new Date(2024, 5, 12, 12, 0, 0);

describe('extractIdentifiers', () => {
  test('finds containers by shape and other kinds by their hint word', () => {
    const ids = extractIdentifiers('po 4500123456 and bl obl7788001 for container caiu1234567');

    expect(ids).toEqual({
      container: ['CAIU1234567'],
      purchaseOrder: ['4500123456'],
      billOfLading: ['OBL7788001'],
      booking: [],
    });
  });

  test('the nearest preceding hint decides the kind', () => {
    const ids = extractIdentifiers('booking bk900100 and po 4500999001');

    expect(ids.booking).toEqual(['BK900100']);
    expect(ids.purchaseOrder).toEqual(['4500999001']);
  });

  test('ignores id-like tokens without a hint and deduplicates', () => {
    const ids = extractIdentifiers('status of caiu1234567 and caiu1234567 ref 99887766');

    expect(ids.container).toEqual(['CAIU1234567']);
    expect(ids.purchaseOrder).toEqual([]);
    expect(ids.billOfLading).toEqual([]);
  });

  test('dates after a hint are not identifiers', () => {
    expect(extractIdentifiers('did po 4500012345 arrive by 2024-06-30').purchaseOrder).toEqual(['4500012345']);
    expect(extractIdentifiers('booking bk900100 as of 06/30/2024').booking).toEqual(['BK900100']);
  });
});

describe('extractTimeWindow', () => {
  test('next N days is inclusive of today', () => {
    expect(extractTimeWindow('arriving in the next 5 days', NOW)).toEqual({
      window: { start: '2024-06-12', end: '2024-06-17', label: 'next 5 days' },
      defaulted: false,
    });
  });

  test('this week runs Monday to Sunday', () => {
    expect(extractTimeWindow('arriving this week', NOW).window).toEqual({
      start: '2024-06-10',
      end: '2024-06-16',
      label: 'this week',
    });
  });

  test('last month covers the whole calendar month', () => {
    expect(extractTimeWindow('delivered last month', NOW).window).toEqual({
      start: '2024-05-01',
      end: '2024-05-31',
      label: 'last month',
    });
  });

  test('soon falls back to the default window', () => {
    expect(extractTimeWindow('which containers are arriving soon', NOW)).toEqual({
      window: { start: '2024-06-12', end: '2024-06-19', label: 'next 7 days' },
      defaulted: true,
    });
  });

  test('no date phrase means no window', () => {
    expect(extractTimeWindow('where is container caiu1234567', NOW)).toEqual({ window: null, defaulted: false });
  });
});

describe('extractEntities', () => {
  const priorLookup: PriorTurnContext = {
    question: 'where is container caiu1234567',
    intent: 'retrieval',
    identifiers: { ...emptyIdentifiers(), container: ['CAIU1234567'] },
  };

  test('reuses the previous identifiers for a back-reference', () => {
    const result = extractEntities('what is its eta', NOW, priorLookup);

    expect(result.entities.identifiers.container).toEqual(['CAIU1234567']);
    expect(result.entities.identifierSource).toBe('session');
    expect(result.topicShift).toBe(false);
    expect(result.notices).toEqual([
      { code: 'sticky-identifiers', message: 'Using CAIU1234567 from your previous question.' },
    ]);
  });

  test('does not carry identifiers into an aggregate question', () => {
    const result = extractEntities('how many of those are delayed', NOW, priorLookup);

    expect(result.entities.identifiers.container).toEqual([]);
    expect(result.entities.identifierSource).toBe('text');
  });

  test('emits the default window notice', () => {
    const result = extractEntities('is container caiu1234567 arriving soon', NOW, null);

    expect(result.notices).toEqual([
      { code: 'default-time-window', message: 'No duration provided; using default window of 7 days.' },
    ]);
  });
});

describe('isTopicShift', () => {
  const priorAnalytics: PriorTurnContext = {
    question: 'how many shipments were delivered last month',
    intent: 'analytics',
    identifiers: emptyIdentifiers(),
  };

  test('a new container after an aggregate question is a new topic', () => {
    const ids = extractIdentifiers('where is container msku7654321');
    expect(isTopicShift('where is container msku7654321', ids, priorAnalytics)).toBe(true);
  });

  test('repeating the previous identifier is not a shift', () => {
    const prior: PriorTurnContext = {
      question: 'where is container caiu1234567',
      intent: 'retrieval',
      identifiers: { ...emptyIdentifiers(), container: ['CAIU1234567'] },
    };
    const ids = extractIdentifiers('when will caiu1234567 arrive');
    expect(isTopicShift('when will caiu1234567 arrive', ids, prior)).toBe(false);
  });

  test('there is no shift without a previous turn', () => {
    const ids = extractIdentifiers('where is container msku7654321');
    expect(isTopicShift('where is container msku7654321', ids, null)).toBe(false);
  });
});
