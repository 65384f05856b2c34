import { isValid, parseISO } from 'date-fns';
import { PlanFormatError, SchemaViolationError } from '../core/errors';
import {
  AggregateOp,
  AnalyticsPlan,
  FilterOp,
  GroupKey,
  PlanMetric,
  PlanPredicate,
} from '../types/analytics';
import { MetadataCatalog } from './catalog';

const VALIDATOR_TOKEN = Symbol('plan-validator');

const CALENDAR_DAY = /^\d{4}-\d{2}-\d{2}$/;

/** A plan that passed catalog validation. Only `validatePlan` produces one. */
export class ValidatedPlan {
  readonly plan: Readonly<AnalyticsPlan>;

  constructor(token: typeof VALIDATOR_TOKEN, plan: AnalyticsPlan) {
    if (token !== VALIDATOR_TOKEN) {
      throw new SchemaViolationError('Plans must pass validation before compilation');
    }
    this.plan = Object.freeze({ ...plan });
    Object.freeze(this);
  }
}

const AGGREGATE_OPS: readonly AggregateOp[] = ['sum', 'avg', 'count', 'min', 'max'];
const FILTER_OPS: readonly FilterOp[] = ['eq', 'in', 'contains', 'gt', 'gte', 'lt', 'lte', 'between'];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isAggregateOp(value: unknown): value is AggregateOp {
  return typeof value === 'string' && AGGREGATE_OPS.some(op => op === value);
}

function isFilterOp(value: unknown): value is FilterOp {
  return typeof value === 'string' && FILTER_OPS.some(op => op === value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(item => typeof item === 'string');
}

function parseMetric(raw: unknown): PlanMetric {
  if (!isRecord(raw) || !isAggregateOp(raw.op)) {
    throw new PlanFormatError('metric.op must be one of sum, avg, count, min, max');
  }
  const column = typeof raw.column === 'string' && raw.column ? raw.column : undefined;
  const alias = typeof raw.alias === 'string' && raw.alias ? raw.alias : column ? `${raw.op}_${column}` : raw.op;
  return column ? { op: raw.op, column, alias } : { op: raw.op, alias };
}

function parseGroupKey(raw: unknown): GroupKey {
  if (typeof raw === 'string') return { column: raw };
  if (isRecord(raw) && typeof raw.column === 'string') {
    return raw.bucket === 'month' ? { column: raw.column, bucket: 'month' } : { column: raw.column };
  }
  throw new PlanFormatError('groupBy entries must name a column');
}

function parsePredicate(raw: unknown): PlanPredicate {
  if (!isRecord(raw) || typeof raw.column !== 'string' || !isFilterOp(raw.op)) {
    throw new PlanFormatError('filters entries need a column and a known op');
  }
  const column = raw.column;
  const op = raw.op;
  const value = raw.value;

  switch (op) {
    case 'eq':
      if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
        return { column, op, value };
      }
      break;
    case 'in':
      if (isStringArray(value)) return { column, op, value };
      break;
    case 'contains':
      if (typeof value === 'string') return { column, op, value };
      break;
    case 'gt':
    case 'gte':
    case 'lt':
    case 'lte':
      if (typeof value === 'number' || typeof value === 'string') return { column, op, value };
      break;
    case 'between':
      if (isStringArray(value) && value.length === 2) return { column, op, value: [value[0], value[1]] };
      break;
  }
  throw new PlanFormatError(`filter on "${column}" has a value that does not fit "${op}"`);
}

/**
 * Shape check for a drafted plan (for instance parsed model output).
 * Says nothing about whether the columns exist; that is `validatePlan`.
 */
export function parsePlan(raw: unknown): AnalyticsPlan {
  if (!isRecord(raw)) {
    throw new PlanFormatError('Plan must be a JSON object');
  }

  const plan: AnalyticsPlan = {
    metric: parseMetric(raw.metric),
    groupBy: Array.isArray(raw.groupBy) ? raw.groupBy.map(parseGroupKey) : [],
    filters: Array.isArray(raw.filters) ? raw.filters.map(parsePredicate) : [],
    subjects: isStringArray(raw.subjects) ? raw.subjects : [],
  };

  if (isRecord(raw.sort) && typeof raw.sort.by === 'string') {
    plan.sort = { by: raw.sort.by, direction: raw.sort.direction === 'asc' ? 'asc' : 'desc' };
  }
  if (typeof raw.limit === 'number' && Number.isInteger(raw.limit)) {
    plan.limit = raw.limit;
  }
  if (raw.chart === 'bar' || raw.chart === 'line') {
    plan.chart = raw.chart;
  }

  return plan;
}

function violation(column: string, reason: string): SchemaViolationError {
  return new SchemaViolationError(`Column "${column}" ${reason}`, { column, reason });
}

function requireColumn(catalog: MetadataCatalog, column: string) {
  const spec = catalog.get(column);
  if (!spec) {
    throw violation(column, 'is not in the catalog');
  }
  return spec;
}

function checkMetric(metric: PlanMetric, catalog: MetadataCatalog): void {
  if (!metric.column) {
    if (metric.op !== 'count') {
      throw new SchemaViolationError(`${metric.op} needs a measurable column`, { reason: 'missing-column' });
    }
    return;
  }

  const spec = requireColumn(catalog, metric.column);
  if (!spec.allowedOps.has(metric.op)) {
    throw violation(metric.column, `does not support ${metric.op}`);
  }
}

function checkGroupKey(key: GroupKey, catalog: MetadataCatalog): void {
  const spec = requireColumn(catalog, key.column);
  if (!spec.allowedOps.has('group')) {
    throw violation(key.column, 'cannot be grouped');
  }
  if (key.bucket === 'month' && spec.type !== 'datetime') {
    throw violation(key.column, 'is not a date and cannot be bucketed by month');
  }
}

function isCalendarDay(value: string): boolean {
  return CALENDAR_DAY.test(value) && isValid(parseISO(value));
}

function checkPredicate(predicate: PlanPredicate, catalog: MetadataCatalog): void {
  const spec = requireColumn(catalog, predicate.column);
  if (!spec.allowedOps.has('filter')) {
    throw violation(predicate.column, 'cannot be filtered');
  }

  switch (predicate.op) {
    case 'eq':
      if (spec.type === 'datetime') throw violation(predicate.column, 'needs a date range, not equality');
      if (spec.type === 'numeric' && typeof predicate.value !== 'number') {
        throw violation(predicate.column, 'needs a number to compare with');
      }
      return;
    case 'in':
    case 'contains':
      if (spec.type !== 'categorical') throw violation(predicate.column, `does not support ${predicate.op}`);
      return;
    case 'gt':
    case 'gte':
    case 'lt':
    case 'lte':
      if (spec.type !== 'numeric') throw violation(predicate.column, `does not support ${predicate.op}`);
      if (typeof predicate.value !== 'number' || !Number.isFinite(predicate.value)) {
        throw violation(predicate.column, 'needs a number to compare with');
      }
      return;
    case 'between': {
      if (spec.type !== 'datetime') throw violation(predicate.column, 'does not support between');
      const [start, end] = predicate.value;
      if (!isCalendarDay(start) || !isCalendarDay(end) || start > end) {
        throw violation(predicate.column, 'needs a yyyy-MM-dd range with start before end');
      }
      return;
    }
  }
}

/**
 * Every referenced column must exist in the catalog with a type that fits its
 * use. Fails closed with SchemaViolationError; nothing is dropped silently.
 */
export function validatePlan(plan: AnalyticsPlan, catalog: MetadataCatalog): ValidatedPlan {
  checkMetric(plan.metric, catalog);
  plan.groupBy.forEach(key => checkGroupKey(key, catalog));
  plan.filters.forEach(predicate => checkPredicate(predicate, catalog));
  return new ValidatedPlan(VALIDATOR_TOKEN, plan);
}
