import { AnswerFragment, ChartSpec, Evidence, FieldValue, HandlerOutput } from '../types';
import { AggregateOp, AnalyticsPlan, AnalyticsResult, Row } from '../types/analytics';
import { MetadataCatalog } from './catalog';
import { groupKeyName } from './compiler';

const OP_WORDS: Record<AggregateOp, string> = {
  count: 'number of shipments',
  avg: 'average',
  sum: 'total',
  min: 'minimum',
  max: 'maximum',
};

function metricPhrase(plan: AnalyticsPlan, catalog: MetadataCatalog): string {
  const { op, column } = plan.metric;
  if (op === 'count' || !column) return `The ${OP_WORDS[op]}`;
  return `The ${OP_WORDS[op]} ${catalog.label(column).toLowerCase()}`;
}

function render(value: FieldValue | undefined): string {
  if (value === null || value === undefined) return 'not available';
  return Array.isArray(value) ? value.join(', ') : String(value);
}

function keyLabel(key: string, plan: AnalyticsPlan, catalog: MetadataCatalog): string {
  const group = plan.groupBy.find(candidate => groupKeyName(candidate) === key);
  if (group?.bucket === 'month') return `${catalog.label(group.column).toLowerCase()} month`;
  return catalog.label(group?.column ?? key).toLowerCase();
}

/** One evidence entry per result row, cited as `<result name>#<row>`. */
export function resultEvidence(result: AnalyticsResult): Evidence[] {
  return result.table.rows.map((row, index) => ({
    sourceId: `${result.name}#${index}`,
    fieldsUsed: result.table.columns,
    snippet: { ...row },
  }));
}

export function chartFor(plan: AnalyticsPlan, result: AnalyticsResult, catalog: MetadataCatalog): ChartSpec | undefined {
  const [firstKey] = plan.groupBy;
  if (!plan.chart || !firstKey || result.table.rows.length === 0) return undefined;
  const x = groupKeyName(firstKey);
  return {
    kind: plan.chart,
    title: `${metricPhrase(plan, catalog).replace(/^The /, '')} by ${keyLabel(x, plan, catalog)}`,
    data: result.table.rows.map(row => ({ [x]: row[x] ?? null, [plan.metric.alias]: row[plan.metric.alias] ?? null })),
    encodings: { x, y: plan.metric.alias },
  };
}

/**
 * Sentences for a computed table. A single row is stated inline; several rows
 * get a summary sentence and the table itself. Every figure cites its row.
 */
export function describeResult(plan: AnalyticsPlan, result: AnalyticsResult, catalog: MetadataCatalog): HandlerOutput {
  const evidence = resultEvidence(result);
  const { rows, columns } = result.table;
  const keys = plan.groupBy.map(groupKeyName);
  const subject = plan.subjects.join(', ');
  const fragments: AnswerFragment[] = [];

  if (rows.length === 1) {
    const row: Row = rows[0];
    const where = keys.map(key => `${keyLabel(key, plan, catalog)} ${render(row[key])}`).join(', ');
    const value = render(row[plan.metric.alias]);
    fragments.push({
      text: `${metricPhrase(plan, catalog)}${where ? ` for ${where}` : ''} is ${value}.`,
      evidenceIds: [evidence[0].sourceId],
      subject,
      factual: true,
    });
    return { fragments, evidence, notices: [] };
  }

  const grouping = keys.map(key => keyLabel(key, plan, catalog)).join(' and ');
  fragments.push({
    text: `${metricPhrase(plan, catalog)} by ${grouping} across ${rows.length} groups is shown in the table.`,
    evidenceIds: evidence.map(item => item.sourceId),
    subject,
    factual: true,
  });

  return {
    fragments,
    evidence,
    notices: [],
    table: { title: chartFor(plan, result, catalog)?.title, columns, rows: rows.map(row => ({ ...row })) },
  };
}
