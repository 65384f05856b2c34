import {
  delayReasonHandler,
  etaWindowHandler,
  routeHandler,
  selectHandler,
  statusHandler,
} from '../retrieval/handlers';
import { planRetrieval, rankingQueryText } from '../retrieval/planner';
import { ExecutionError, RequestCancelledError } from '../core/errors';
import { EmbeddingProvider } from '../types/capabilities';
import { entities, hitFor, scopeFor, shipment } from './fixtures';

const NEXT_WEEK = { start: '2024-06-12', end: '2024-06-19', label: 'next 7 days' };

describe('statusHandler', () => {
  test('states status and the latest location with its evidence', () => {
    const output = statusHandler({
      hits: [hitFor(shipment('doc-1'))],
      entities: entities({ container: ['CAIU1234567'] }),
      question: 'where is container caiu1234567',
    });

    expect(output.fragments).toEqual([
      {
        text: 'Container CAIU1234567 is IN_OCEAN; its latest reported location is SAVANNAH.',
        evidenceIds: ['doc-1'],
        subject: 'CAIU1234567',
        factual: true,
      },
    ]);
    expect(output.evidence).toEqual([
      {
        sourceId: 'doc-1',
        containerNumber: 'CAIU1234567',
        fieldsUsed: ['shipment_status', 'discharge_port'],
        snippet: { shipment_status: 'IN_OCEAN', discharge_port: 'SAVANNAH' },
      },
    ]);
    expect(output.table).toBeUndefined();
  });

  test('several shipments are tabulated', () => {
    const output = statusHandler({
      hits: [hitFor(shipment('doc-1')), hitFor(shipment('doc-2'))],
      entities: entities({ container: ['CAIU1234567', 'MSKU7654321'] }),
      question: 'where are containers caiu1234567 and msku7654321',
    });

    expect(output.table).toEqual({
      title: 'Shipment status',
      columns: ['container', 'status', 'location'],
      rows: [
        { container: 'CAIU1234567', status: 'IN_OCEAN', location: 'SAVANNAH' },
        { container: 'MSKU7654321', status: 'DELIVERED', location: 'ATLANTA DC' },
      ],
    });
  });

  test('matches purchase orders through the list field', () => {
    const output = statusHandler({
      hits: [hitFor(shipment('doc-1')), hitFor(shipment('doc-2'))],
      entities: entities({ purchaseOrder: ['4500999001'] }),
      question: 'status of po 4500999001',
    });

    expect(output.evidence.map(item => item.sourceId)).toEqual(['doc-2']);
  });

  test('an identifier nothing matched gets its own sentence', () => {
    const output = statusHandler({
      hits: [hitFor(shipment('doc-1'))],
      entities: entities({ container: ['CAIU1234567', 'TGHU0000000'] }),
      question: 'where are caiu1234567 and tghu0000000',
    });

    expect(output.fragments[1]).toEqual({
      text: "I couldn't find any shipments matching container TGHU0000000.",
      evidenceIds: [],
      subject: 'container TGHU0000000',
      factual: false,
    });
  });

  test('no hits at all reports the identifiers and a notice', () => {
    const output = statusHandler({
      hits: [],
      entities: entities({ container: ['CAIU9988776'] }),
      question: 'where is caiu9988776',
    });

    expect(output.fragments.map(fragment => fragment.text)).toEqual([
      "I couldn't find any shipments matching CAIU9988776.",
    ]);
    expect(output.evidence).toEqual([]);
    expect(output.notices).toEqual([{ code: 'no-matching-shipments', message: 'No matching shipments were found.' }]);
  });
});

describe('etaWindowHandler', () => {
  test('falls back to the estimated date and checks the window', () => {
    const output = etaWindowHandler({
      hits: [hitFor(shipment('doc-1'))],
      entities: entities({ container: ['CAIU1234567'] }, NEXT_WEEK),
      question: 'is caiu1234567 arriving in the next 7 days',
    });

    expect(output.fragments[0].text).toBe(
      'Container CAIU1234567 is expected at the discharge port (SAVANNAH) on 2024-06-18, within the next 7 days.'
    );
    expect(output.evidence[0].fieldsUsed).toEqual(['eta_dp_date', 'discharge_port']);
  });

  test('the final destination uses its own arrival columns', () => {
    const output = etaWindowHandler({
      hits: [hitFor(shipment('doc-1'))],
      entities: entities({ container: ['CAIU1234567'] }),
      question: 'when will caiu1234567 reach the final destination',
    });

    expect(output.fragments[0].text).toBe(
      'Container CAIU1234567 is expected at the final destination (ATLANTA) on 2024-06-24.'
    );
  });
});

describe('delayReasonHandler', () => {
  test('reports days and reason at the final destination', () => {
    const output = delayReasonHandler({
      hits: [hitFor(shipment('doc-1'))],
      entities: entities({ container: ['CAIU1234567'] }),
      question: 'why is container caiu1234567 delayed at the final destination',
    });

    expect(output.fragments[0].text).toBe(
      'Container CAIU1234567 is delayed 4 days at the final destination. Reason: Customs hold.'
    );
    expect(output.evidence[0].fieldsUsed).toEqual(['fd_delayed_dur', 'delay_reason_summary']);
  });

  test('zero days is not a delay', () => {
    const output = delayReasonHandler({
      hits: [hitFor(shipment('doc-3'))],
      entities: entities({ container: ['TGHU1122334'] }),
      question: 'is tghu1122334 delayed',
    });

    expect(output.fragments[0].text).toBe('Container TGHU1122334 is not delayed at the discharge port.');
  });
});

describe('routeHandler', () => {
  test('collapses repeated stops and names the vessel', () => {
    const output = routeHandler({
      hits: [hitFor(shipment('doc-1'))],
      entities: entities({ container: ['CAIU1234567'] }),
      question: 'what is the route for container caiu1234567',
    });

    expect(output.fragments[0].text).toBe(
      'Container CAIU1234567 routes SHANGHAI -> SAVANNAH -> ATLANTA, on vessel NORTHERN STAR.'
    );
    expect(output.evidence[0].fieldsUsed).toEqual(['load_port', 'discharge_port', 'final_destination', 'final_vessel_name']);
  });
});

describe('selectHandler', () => {
  test('maps every sub-intent to its handler', () => {
    expect(selectHandler('status')).toBe(statusHandler);
    expect(selectHandler('eta-window')).toBe(etaWindowHandler);
    expect(selectHandler('delay-reason')).toBe(delayReasonHandler);
    expect(selectHandler('route')).toBe(routeHandler);
  });
});

describe('planRetrieval', () => {
  const failing: EmbeddingProvider = {
    embedQuery: async () => {
      throw new ExecutionError('embedding endpoint down');
    },
  };

  test('ranks by identifiers and attaches the query vector', async () => {
    const embeddings: EmbeddingProvider = { embedQuery: async () => [0.1, 0.2] };
    const { plan, notices } = await planRetrieval(
      {
        scope: await scopeFor('0002000'),
        entities: entities({ container: ['OOLU5566778'] }),
        question: 'where is oolu5566778',
        handler: 'status',
      },
      embeddings,
      { topK: 5, vectorK: 10 }
    );

    expect(plan.filter.expression).toBe(
      "consignee_codes/any(c: search.in(c, '0002000', ',')) and search.in(container_number, 'OOLU5566778', ',')"
    );
    expect(plan.ranking).toEqual({ queryText: 'OOLU5566778', topK: 5, vectorK: 10, vector: [0.1, 0.2] });
    expect(plan.reason).toBe('status lookup for 1 identifier(s)');
    expect(notices).toEqual([]);
  });

  test('falls back to keyword ranking when embedding fails', async () => {
    const { plan, notices } = await planRetrieval(
      {
        scope: await scopeFor('0002000'),
        entities: entities({ container: ['OOLU5566778'] }),
        question: 'where is oolu5566778',
        handler: 'status',
      },
      failing
    );

    expect(plan.ranking.vector).toBeUndefined();
    expect(notices.map(notice => notice.code)).toEqual(['keyword-only-search']);
  });

  test('cancellation is not swallowed', async () => {
    const cancelled: EmbeddingProvider = {
      embedQuery: async () => {
        throw new RequestCancelledError();
      },
    };

    await expect(
      planRetrieval(
        {
          scope: await scopeFor('0002000'),
          entities: entities({ container: ['OOLU5566778'] }),
          question: 'where is oolu5566778',
          handler: 'status',
        },
        cancelled
      )
    ).rejects.toBeInstanceOf(RequestCancelledError);
  });

  test('without identifiers the question is the query text', () => {
    expect(rankingQueryText(entities(), 'containers at savannah')).toBe('containers at savannah');
  });
});
