import { ExecutionError } from '../core/errors';
import { FieldValue, ShipmentRecord, TabularPredicate } from '../types';
import {
  AggregateOp,
  CompiledPipeline,
  GroupKey,
  PipelineStage,
  PlanMetric,
  PlanPredicate,
  Row,
  Table,
} from '../types/analytics';
import { groupKeyName } from './compiler';

// Pure interpreter over the compiled stage list. It only reads the source rows
// and builds new ones, so running the same pipeline twice gives equal tables.

function asList(value: FieldValue | undefined): string[] {
  if (Array.isArray(value)) return value;
  if (value === null || value === undefined) return [];
  return [String(value)];
}

function datePart(value: FieldValue | undefined): string | null {
  return typeof value === 'string' && value.length >= 10 ? value.slice(0, 10) : null;
}

function sameText(a: string, b: string): boolean {
  return a.localeCompare(b, undefined, { sensitivity: 'accent' }) === 0;
}

export function matchesTabular(record: Readonly<ShipmentRecord>, predicate: TabularPredicate): boolean {
  switch (predicate.kind) {
    case 'and':
      return predicate.clauses.every(clause => matchesTabular(record, clause));
    case 'in': {
      const value = record[predicate.column];
      return typeof value === 'string' && predicate.values.includes(value);
    }
    case 'any-in': {
      const allowed = predicate.values;
      return asList(record[predicate.column]).some(value => allowed.includes(value));
    }
    case 'between': {
      const day = datePart(record[predicate.column]);
      return day !== null && day >= predicate.start && day <= predicate.end;
    }
  }
}

function compare(value: FieldValue | undefined, target: number | string): number | null {
  if (typeof value === 'number' && typeof target === 'number') return value - target;
  if (typeof value === 'string' && typeof target === 'string') return value < target ? -1 : value > target ? 1 : 0;
  if (typeof value === 'number' && typeof target === 'string' && target.trim() !== '' && !isNaN(Number(target))) {
    return value - Number(target);
  }
  return null;
}

export function matchesPredicate(record: Readonly<ShipmentRecord>, predicate: PlanPredicate): boolean {
  const value = record[predicate.column];

  switch (predicate.op) {
    case 'eq': {
      const expected = predicate.value;
      if (typeof expected === 'string') {
        return asList(value).some(item => sameText(item, expected));
      }
      return value === expected;
    }
    case 'in': {
      const expected = predicate.value;
      return asList(value).some(item => expected.some(candidate => sameText(item, candidate)));
    }
    case 'contains': {
      const needle = predicate.value.toLowerCase();
      return asList(value).some(item => item.toLowerCase().includes(needle));
    }
    case 'gt':
    case 'gte':
    case 'lt':
    case 'lte': {
      const diff = compare(value, predicate.value);
      if (diff === null) return false;
      if (predicate.op === 'gt') return diff > 0;
      if (predicate.op === 'gte') return diff >= 0;
      if (predicate.op === 'lt') return diff < 0;
      return diff <= 0;
    }
    case 'between': {
      const day = datePart(value);
      return day !== null && day >= predicate.value[0] && day <= predicate.value[1];
    }
  }
}

function keyValue(record: Readonly<ShipmentRecord>, key: GroupKey): FieldValue {
  const value = record[key.column] ?? null;
  if (key.bucket === 'month') {
    return typeof value === 'string' && value.length >= 7 ? value.slice(0, 7) : null;
  }
  return Array.isArray(value) ? value.join(',') : value;
}

function round(value: number): number {
  return Math.round(value * 100) / 100;
}

function aggregate(records: readonly Readonly<ShipmentRecord>[], metric: PlanMetric): FieldValue {
  const op: AggregateOp = metric.op;
  const column = metric.column;

  if (op === 'count') {
    if (!column) return records.length;
    return records.filter(record => {
      const value = record[column];
      return value !== null && value !== undefined && value !== '';
    }).length;
  }
  if (!column) {
    throw new ExecutionError(`${op} needs a column`);
  }

  const values = records.map(record => record[column]);
  const numbers = values.filter((value): value is number => typeof value === 'number' && Number.isFinite(value));

  if (op === 'sum') return round(numbers.reduce((total, value) => total + value, 0));
  if (op === 'avg') {
    return numbers.length === 0 ? null : round(numbers.reduce((total, value) => total + value, 0) / numbers.length);
  }

  // min/max also apply to ISO dates
  if (numbers.length > 0) {
    return op === 'min' ? Math.min(...numbers) : Math.max(...numbers);
  }
  const dates = values.filter((value): value is string => typeof value === 'string' && value !== '').sort();
  if (dates.length === 0) return null;
  return op === 'min' ? dates[0] : dates[dates.length - 1];
}

function orderValues(a: FieldValue | undefined, b: FieldValue | undefined): number {
  // nulls sort last either way
  if (a === null || a === undefined) return b === null || b === undefined ? 0 : 1;
  if (b === null || b === undefined) return -1;
  if (typeof a === 'number' && typeof b === 'number') return a - b;
  return String(a).localeCompare(String(b));
}

function groupRows(records: readonly Readonly<ShipmentRecord>[], keys: GroupKey[], metric: PlanMetric): Row[] {
  if (records.length === 0) return [];

  if (keys.length === 0) {
    return [{ [metric.alias]: aggregate(records, metric) }];
  }

  const groups = new Map<string, { key: Row; members: Readonly<ShipmentRecord>[] }>();
  for (const record of records) {
    const key: Row = {};
    for (const groupKey of keys) {
      key[groupKeyName(groupKey)] = keyValue(record, groupKey);
    }
    const id = JSON.stringify(keys.map(groupKey => key[groupKeyName(groupKey)]));
    const group = groups.get(id);
    if (group) {
      group.members.push(record);
    } else {
      groups.set(id, { key, members: [record] });
    }
  }

  const rows = Array.from(groups.values()).map(({ key, members }) => ({
    ...key,
    [metric.alias]: aggregate(members, metric),
  }));

  const names = keys.map(groupKeyName);
  return rows.sort((a, b) => {
    for (const name of names) {
      const order = orderValues(a[name], b[name]);
      if (order !== 0) return order;
    }
    return 0;
  });
}

interface StageState {
  records: Readonly<ShipmentRecord>[];
  rows: Row[] | null;
}

function applyStage(records: Readonly<ShipmentRecord>[], rows: Row[] | null, stage: PipelineStage): StageState {
  switch (stage.stage) {
    case 'scope': {
      const scope = stage.filter.predicate;
      return { records: records.filter(record => matchesTabular(record, scope)), rows };
    }
    case 'filter': {
      const predicates = stage.predicates;
      return {
        records: records.filter(record => predicates.every(predicate => matchesPredicate(record, predicate))),
        rows,
      };
    }
    case 'group':
      return { records, rows: groupRows(records, stage.keys, stage.aggregate) };
    case 'sort': {
      if (!rows) throw new ExecutionError('sort stage before group stage');
      const sign = stage.direction === 'asc' ? 1 : -1;
      const by = stage.by;
      const sorted = rows
        .map((row, index) => ({ row, index }))
        .sort((a, b) => {
          const va = a.row[by];
          const vb = b.row[by];
          if (va === null || va === undefined || vb === null || vb === undefined) {
            return orderValues(va, vb) || a.index - b.index;
          }
          return sign * orderValues(va, vb) || a.index - b.index;
        })
        .map(({ row }) => row);
      return { records, rows: sorted };
    }
    case 'limit':
      if (!rows) throw new ExecutionError('limit stage before group stage');
      return { records, rows: rows.slice(0, stage.count) };
    case 'project': {
      if (!rows) throw new ExecutionError('project stage before group stage');
      const columns = stage.columns;
      return {
        records,
        rows: rows.map(row => {
          const projected: Row = {};
          for (const column of columns) {
            projected[column] = row[column] ?? null;
          }
          return projected;
        }),
      };
    }
  }
}

/**
 * Runs a compiled pipeline over in-memory rows. The scope stage must come first.
 */
export function executePipeline(pipeline: CompiledPipeline, source: readonly Readonly<ShipmentRecord>[]): Table {
  const [first] = pipeline.stages;
  if (!first || first.stage !== 'scope') {
    throw new ExecutionError('Pipeline does not start with the scope stage');
  }

  let records: Readonly<ShipmentRecord>[] = [...source];
  let rows: Row[] | null = null;

  for (const stage of pipeline.stages) {
    ({ records, rows } = applyStage(records, rows, stage));
  }

  if (!rows) {
    throw new ExecutionError('Pipeline has no group stage');
  }
  return { columns: [...pipeline.columns], rows };
}
