import { getCatalog } from '../analytics/catalog';
import { compilePlan } from '../analytics/compiler';
import { validatePlan } from '../analytics/validator';
import { BackendTimeoutError, ScopeResolutionError, ValidationError } from '../core/errors';
import { buildSearchFilter, buildTabularFilter } from '../security/filter-builder';
import { parseHierarchy } from '../services/hierarchy.service';
import { InMemorySearchBackend, toShipmentRecord } from '../services/search.service';
import { InMemoryTabularBackend, predicateToMongo, tabularToMongo, toMongoPipeline } from '../services/tabular.service';
import { entities, loadShipments, scopeFor } from './fixtures';

const RANKING = { queryText: 'savannah', topK: 5, vectorK: 30 };
const CALL = { timeoutMs: 1000 };

describe('InMemorySearchBackend', () => {
  test('returns only shipments inside the scope', async () => {
    const backend = new InMemorySearchBackend(loadShipments());
    const filter = buildSearchFilter(await scopeFor('0001234'), entities());

    const hits = await backend.search(filter.expression, RANKING, CALL);

    expect(hits.map(hit => hit.docId)).toEqual(['doc-1', 'doc-2']);
    expect(hits[0]).toMatchObject({ containerNumber: 'CAIU1234567', score: 1 });
  });

  test('an identifier outside the scope finds nothing', async () => {
    const backend = new InMemorySearchBackend(loadShipments());
    const filter = buildSearchFilter(await scopeFor('0000866'), entities({ container: ['CAIU9988776'] }));

    expect(await backend.search(filter.expression, RANKING, CALL)).toEqual([]);
  });

  test('refuses a filter without the scope clause', async () => {
    const backend = new InMemorySearchBackend(loadShipments());

    await expect(
      backend.search("search.in(container_number, 'CAIU9988776', ',')", RANKING, CALL)
    ).rejects.toBeInstanceOf(ScopeResolutionError);
    expect(backend.calls).toEqual([]);
  });

  test('a slow index times out', async () => {
    const backend = new InMemorySearchBackend(loadShipments(), { latencyMs: 50 });
    const filter = buildSearchFilter(await scopeFor('0002000'), entities());

    await expect(backend.search(filter.expression, RANKING, { timeoutMs: 5 })).rejects.toBeInstanceOf(
      BackendTimeoutError
    );
  });
});

describe('toShipmentRecord', () => {
  test('keeps scalars and string lists, drops search metadata and nested values', () => {
    expect(
      toShipmentRecord({
        '@search.score': 2.5,
        container_number: 'CAIU1234567',
        po_numbers: ['4500123456'],
        dp_delayed_dur: 1,
        hot: true,
        nested: { a: 1 },
        mixed: ['a', 1],
      })
    ).toEqual({ container_number: 'CAIU1234567', po_numbers: ['4500123456'], dp_delayed_dur: 1, hot: true });
  });
});

describe('parseHierarchy', () => {
  test('reads parent to children', () => {
    expect(parseHierarchy({ nodes: [{ id: 'A1', children: ['B1', 3] }, { id: 'B1' }] })).toEqual(
      new Map([
        ['A1', ['B1']],
        ['B1', []],
      ])
    );
  });

  test('rejects a node without an id', () => {
    expect(() => parseHierarchy({ nodes: [{ children: [] }] })).toThrow(ValidationError);
  });
});

describe('tabularToMongo', () => {
  test('date ranges include the whole last day', () => {
    expect(
      tabularToMongo({
        kind: 'and',
        clauses: [
          { kind: 'any-in', column: 'consignee_codes', values: ['0002000'] },
          { kind: 'between', column: 'optimal_ata_dp_date', start: '2024-05-01', end: '2024-05-31' },
        ],
      })
    ).toEqual({
      $and: [
        { consignee_codes: { $in: ['0002000'] } },
        { optimal_ata_dp_date: { $gte: '2024-05-01', $lt: '2024-06-01' } },
      ],
    });
  });
});

describe('predicateToMongo', () => {
  test('text equality is exact and case-insensitive, contains is escaped', () => {
    expect(predicateToMongo({ column: 'discharge_port', op: 'eq', value: 'SAVANNAH' })).toEqual({
      discharge_port: /^SAVANNAH$/i,
    });
    expect(predicateToMongo({ column: 'final_vessel_name', op: 'contains', value: 'st. ann' })).toEqual({
      final_vessel_name: { $regex: 'st\\. ann', $options: 'i' },
    });
    expect(predicateToMongo({ column: 'dp_delayed_dur', op: 'gt', value: 0 })).toEqual({ dp_delayed_dur: { $gt: 0 } });
  });
});

describe('toMongoPipeline', () => {
  test('keeps stage order and flattens the group output', async () => {
    const validated = validatePlan(
      {
        metric: { op: 'count', alias: 'shipment_count' },
        groupBy: [{ column: 'discharge_port' }],
        filters: [{ column: 'shipment_status', op: 'eq', value: 'DELIVERED' }],
        sort: { by: 'shipment_count', direction: 'desc' },
        limit: 10,
        subjects: [],
      },
      getCatalog()
    );
    const pipeline = compilePlan(validated, buildTabularFilter(await scopeFor('0002000'), entities()));

    expect(toMongoPipeline(pipeline)).toEqual([
      { $match: { $and: [{ consignee_codes: { $in: ['0002000'] } }] } },
      { $match: { $and: [{ shipment_status: /^DELIVERED$/i }] } },
      { $group: { _id: { discharge_port: '$discharge_port' }, shipment_count: { $sum: 1 } } },
      { $project: { _id: 0, shipment_count: 1, discharge_port: '$_id.discharge_port' } },
      { $sort: { discharge_port: 1 } },
      { $sort: { shipment_count: -1 } },
      { $limit: 10 },
      { $project: { discharge_port: 1, shipment_count: 1 } },
    ]);
  });

  test('averages are rounded and month buckets take the date prefix', async () => {
    const validated = validatePlan(
      {
        metric: { op: 'avg', column: 'dp_delayed_dur', alias: 'avg_dp_delayed_dur' },
        groupBy: [{ column: 'optimal_ata_dp_date', bucket: 'month' }],
        filters: [],
        subjects: [],
      },
      getCatalog()
    );
    const stages = toMongoPipeline(compilePlan(validated, buildTabularFilter(await scopeFor('0002000'), entities())));

    expect(stages[1]).toEqual({
      $group: {
        _id: { optimal_ata_dp_date_month: { $substrCP: ['$optimal_ata_dp_date', 0, 7] } },
        avg_dp_delayed_dur: { $avg: '$dp_delayed_dur' },
      },
    });
    expect(stages[2]).toEqual({
      $project: {
        _id: 0,
        avg_dp_delayed_dur: { $round: ['$avg_dp_delayed_dur', 2] },
        optimal_ata_dp_date_month: '$_id.optimal_ata_dp_date_month',
      },
    });
  });
});

describe('count over a column', () => {
  const countDelays = async () =>
    compilePlan(
      validatePlan(
        { metric: { op: 'count', column: 'dp_delayed_dur', alias: 'n' }, groupBy: [], filters: [], subjects: [] },
        getCatalog()
      ),
      buildTabularFilter(await scopeFor('0002000'), entities())
    );

  test('counts zero and skips missing, null and empty values in the aggregation', async () => {
    const stages = toMongoPipeline(await countDelays());

    expect(stages[1]).toEqual({
      $group: {
        _id: null,
        n: {
          $sum: {
            $cond: [
              {
                $and: [
                  { $ne: [{ $type: '$dp_delayed_dur' }, 'missing'] },
                  { $ne: ['$dp_delayed_dur', null] },
                  { $ne: ['$dp_delayed_dur', ''] },
                ],
              },
              1,
              0,
            ],
          },
        },
      },
    });
  });

  test('the in-memory executor applies the same rule', async () => {
    const backend = new InMemoryTabularBackend([
      { consignee_codes: ['0002000'], dp_delayed_dur: 0 },
      { consignee_codes: ['0002000'], dp_delayed_dur: 3 },
      { consignee_codes: ['0002000'], dp_delayed_dur: '' },
      { consignee_codes: ['0002000'], dp_delayed_dur: null },
      { consignee_codes: ['0002000'] },
    ]);

    expect((await backend.execute(await countDelays(), CALL)).rows).toEqual([{ n: 2 }]);
  });
});

describe('InMemoryTabularBackend', () => {
  test('runs the pipeline and records it', async () => {
    const validated = validatePlan(
      { metric: { op: 'count', alias: 'shipment_count' }, groupBy: [], filters: [], subjects: [] },
      getCatalog()
    );
    const pipeline = compilePlan(validated, buildTabularFilter(await scopeFor('0002000'), entities()));
    const backend = new InMemoryTabularBackend(loadShipments());

    expect(await backend.execute(pipeline, CALL)).toEqual({ columns: ['shipment_count'], rows: [{ shipment_count: 1 }] });
    expect(backend.executed).toEqual([pipeline]);
  });
});
