import { getCatalog } from '../analytics/catalog';
import { chartFor, describeResult } from '../analytics/describe';
import { RulePlanDrafter, draftPlanFromRules, simplifyPlan, timeColumnFor } from '../analytics/drafter';
import { validatePlan } from '../analytics/validator';
import { PlanFormatError, SchemaViolationError } from '../core/errors';
import { AnalyticsPlan, AnalyticsResult } from '../types/analytics';
import { entities } from './fixtures';

const catalog = getCatalog();

function draft(question: string, extracted = entities()): AnalyticsPlan {
  return draftPlanFromRules({ question, entities: extracted, catalog });
}

describe('draftPlanFromRules', () => {
  test('a place becomes a filter and a grouping key', () => {
    expect(draft('average delay at savannah')).toEqual({
      metric: { op: 'avg', column: 'dp_delayed_dur', alias: 'avg_dp_delayed_dur' },
      groupBy: [{ column: 'discharge_port' }],
      filters: [{ column: 'discharge_port', op: 'eq', value: 'SAVANNAH' }],
      subjects: ['SAVANNAH'],
    });
  });

  test('units and month names are not places', () => {
    expect(draft('total weight in kg')).toEqual({
      metric: { op: 'sum', column: 'cargo_weight_kg', alias: 'sum_cargo_weight_kg' },
      groupBy: [],
      filters: [],
      subjects: [],
    });

    const plan = draft('how many shipments arrived in june');
    expect(plan.filters).toEqual([]);
    expect(plan.subjects).toEqual([]);
  });

  test('ranking sets the sort and the limit', () => {
    expect(draft('total weight per carrier top 3')).toEqual({
      metric: { op: 'sum', column: 'cargo_weight_kg', alias: 'sum_cargo_weight_kg' },
      groupBy: [{ column: 'final_carrier_name' }],
      filters: [],
      subjects: [],
      sort: { by: 'sum_cargo_weight_kg', direction: 'desc' },
      limit: 3,
    });
  });

  test('a monthly trend groups by the arrival month', () => {
    const plan = draft('monthly average delay');

    expect(plan.groupBy).toEqual([{ column: 'optimal_ata_dp_date', bucket: 'month' }]);
    expect(plan.sort).toEqual({ by: 'optimal_ata_dp_date_month', direction: 'asc' });
    expect(plan.chart).toBe('line');
  });

  test('the final destination switches the delay column', () => {
    expect(draft('average delay at the final destination by carrier')).toEqual({
      metric: { op: 'avg', column: 'fd_delayed_dur', alias: 'avg_fd_delayed_dur' },
      groupBy: [{ column: 'final_carrier_name' }],
      filters: [],
      subjects: [],
    });
    expect(timeColumnFor('arrivals at the final destination')).toBe('optimal_eta_fd_date');
  });

  test('status words filter and the window is named as a subject', () => {
    const window = { start: '2024-05-14', end: '2024-06-12', label: 'last 30 days' };
    const plan = draft('how many delivered shipments in the last 30 days', entities({}, window));

    expect(plan).toEqual({
      metric: { op: 'count', alias: 'shipment_count' },
      groupBy: [],
      filters: [{ column: 'shipment_status', op: 'eq', value: 'DELIVERED' }],
      subjects: ['delivered', 'the last 30 days'],
    });
  });

  test('an unknown column is kept so validation can reject it', () => {
    const plan = draft('average cargo_volume_liters by carrier');

    expect(plan.metric).toEqual({ op: 'avg', column: 'cargo_volume_liters', alias: 'avg_cargo_volume_liters' });
    expect(() => validatePlan(plan, catalog)).toThrow(SchemaViolationError);
  });

  test('identifiers are listed as subjects', () => {
    const plan = draft('average delay for container caiu1234567', entities({ container: ['CAIU1234567'] }));

    expect(plan.subjects).toEqual(['CAIU1234567']);
    expect(plan.filters).toEqual([]);
  });
});

describe('RulePlanDrafter', () => {
  const drafter = new RulePlanDrafter();
  const request = { question: 'total weight per carrier top 3', entities: entities(), catalog };

  test('drafts the full plan on the first attempt', async () => {
    const plan = await drafter.draft(request, null);
    expect(plan.limit).toBe(3);
  });

  test('drops ordering and limit when regenerating', async () => {
    const feedback = { attempt: 1, error: new PlanFormatError('bad sort'), previous: null };
    const plan = await drafter.draft(request, feedback);

    expect(plan).toEqual(simplifyPlan(draft('total weight per carrier top 3')));
    expect(plan.sort).toBeUndefined();
    expect(plan.limit).toBeUndefined();
  });
});

describe('describeResult', () => {
  const single: AnalyticsResult = {
    name: 'result',
    table: {
      columns: ['discharge_port', 'avg_dp_delayed_dur'],
      rows: [{ discharge_port: 'SAVANNAH', avg_dp_delayed_dur: 2 }],
    },
  };

  test('a single row is stated inline and cites its row', () => {
    const output = describeResult(draft('average delay at savannah'), single, catalog);

    expect(output.fragments).toEqual([
      {
        text: 'The average delay at discharge port (days) for discharge port SAVANNAH is 2.',
        evidenceIds: ['result#0'],
        subject: 'SAVANNAH',
        factual: true,
      },
    ]);
    expect(output.evidence).toEqual([
      {
        sourceId: 'result#0',
        fieldsUsed: ['discharge_port', 'avg_dp_delayed_dur'],
        snippet: { discharge_port: 'SAVANNAH', avg_dp_delayed_dur: 2 },
      },
    ]);
    expect(output.table).toBeUndefined();
  });

  test('several rows come back as a table', () => {
    const result: AnalyticsResult = {
      name: 'result',
      table: {
        columns: ['final_carrier_name', 'shipment_count'],
        rows: [
          { final_carrier_name: 'OCEANLINK', shipment_count: 2 },
          { final_carrier_name: 'PACIFICA', shipment_count: 1 },
        ],
      },
    };
    const output = describeResult(draft('how many shipments per carrier'), result, catalog);

    expect(output.fragments[0].text).toBe('The number of shipments by carrier across 2 groups is shown in the table.');
    expect(output.fragments[0].evidenceIds).toEqual(['result#0', 'result#1']);
    expect(output.table?.rows).toEqual(result.table.rows);
  });

  test('a trend gets a line chart over the month key', () => {
    const plan = draft('monthly average delay');
    const result: AnalyticsResult = {
      name: 'result',
      table: {
        columns: ['optimal_ata_dp_date_month', 'avg_dp_delayed_dur'],
        rows: [
          { optimal_ata_dp_date_month: '2024-05', avg_dp_delayed_dur: 1.5 },
          { optimal_ata_dp_date_month: '2024-06', avg_dp_delayed_dur: 3 },
        ],
      },
    };

    expect(chartFor(plan, result, catalog)).toEqual({
      kind: 'line',
      title: 'average delay at discharge port (days) by arrival at discharge port month',
      data: result.table.rows,
      encodings: { x: 'optimal_ata_dp_date_month', y: 'avg_dp_delayed_dur' },
    });
  });
});
