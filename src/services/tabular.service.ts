import mongoose from 'mongoose';
import { addDays, format, parseISO } from 'date-fns';
import { logger } from '../core/logger';
import { BackendTimeoutError, ExecutionError, RequestCancelledError, errorMessage } from '../core/errors';
import { executePipeline } from '../analytics/executor';
import { groupKeyName } from '../analytics/compiler';
import { IShipment, Shipment } from '../models/Shipment';
import { ShipmentRecord, TabularPredicate } from '../types';
import { CompiledPipeline, GroupKey, PlanMetric, PlanPredicate, Row, Table } from '../types/analytics';
import { CallOptions, TabularBackend } from '../types/capabilities';
import { callWithDeadline, withTimeout } from '../utils/timeout';
import { toShipmentRecord } from './search.service';

/** Runs compiled pipelines over a fixed set of records with the pure interpreter. */
export class InMemoryTabularBackend implements TabularBackend {
  readonly executed: CompiledPipeline[] = [];

  constructor(private readonly records: readonly ShipmentRecord[]) {}

  async execute(pipeline: CompiledPipeline, options: CallOptions): Promise<Table> {
    this.executed.push(pipeline);
    const run = Promise.resolve().then(() => executePipeline(pipeline, this.records));
    return withTimeout(run, options.timeoutMs, 'tabular', options.signal);
  }
}

type MongoFilter = Record<string, unknown>;
type MongoStage = Record<string, unknown>;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function exactText(value: string): RegExp {
  return new RegExp(`^${escapeRegExp(value)}$`, 'i');
}

function dayRange(start: string, end: string): MongoFilter {
  return { $gte: start, $lt: format(addDays(parseISO(end), 1), 'yyyy-MM-dd') };
}

export function tabularToMongo(predicate: TabularPredicate): MongoFilter {
  switch (predicate.kind) {
    case 'and':
      return { $and: predicate.clauses.map(tabularToMongo) };
    case 'in':
    case 'any-in':
      return { [predicate.column]: { $in: predicate.values } };
    case 'between':
      return { [predicate.column]: dayRange(predicate.start, predicate.end) };
  }
}

export function predicateToMongo(predicate: PlanPredicate): MongoFilter {
  switch (predicate.op) {
    case 'eq':
      return {
        [predicate.column]: typeof predicate.value === 'string' ? exactText(predicate.value) : predicate.value,
      };
    case 'in':
      return { [predicate.column]: { $in: predicate.value.map(exactText) } };
    case 'contains':
      return { [predicate.column]: { $regex: escapeRegExp(predicate.value), $options: 'i' } };
    case 'gt':
    case 'gte':
    case 'lt':
    case 'lte':
      return { [predicate.column]: { [`$${predicate.op}`]: predicate.value } };
    case 'between':
      return { [predicate.column]: dayRange(predicate.value[0], predicate.value[1]) };
  }
}

function keyExpression(key: GroupKey): unknown {
  return key.bucket === 'month' ? { $substrCP: [`$${key.column}`, 0, 7] } : `$${key.column}`;
}

// present means not missing, not null and not the empty string; zero counts
function presentExpression(column: string): Record<string, unknown> {
  const field = `$${column}`;
  return { $and: [{ $ne: [{ $type: field }, 'missing'] }, { $ne: [field, null] }, { $ne: [field, ''] }] };
}

function accumulator(metric: PlanMetric): Record<string, unknown> {
  const column = metric.column;
  if (metric.op === 'count') {
    return column ? { $sum: { $cond: [presentExpression(column), 1, 0] } } : { $sum: 1 };
  }
  if (!column) {
    throw new ExecutionError(`${metric.op} needs a column`);
  }
  return { [`$${metric.op}`]: `$${column}` };
}

/**
 * Compiled stages -> aggregation pipeline. Stage order is kept one to one;
 * the group stage is followed by a flattening projection and a key sort.
 */
export function toMongoPipeline(pipeline: CompiledPipeline): MongoStage[] {
  const stages: MongoStage[] = [];

  for (const stage of pipeline.stages) {
    switch (stage.stage) {
      case 'scope':
        stages.push({ $match: tabularToMongo(stage.filter.predicate) });
        break;
      case 'filter':
        stages.push({ $match: { $and: stage.predicates.map(predicateToMongo) } });
        break;
      case 'group': {
        const names = stage.keys.map(groupKeyName);
        const id: Record<string, unknown> = {};
        stage.keys.forEach((key, index) => {
          id[names[index]] = keyExpression(key);
        });
        const alias = stage.aggregate.alias;
        const rounded = stage.aggregate.op === 'sum' || stage.aggregate.op === 'avg';

        const flatten: Record<string, unknown> = { _id: 0, [alias]: rounded ? { $round: [`$${alias}`, 2] } : 1 };
        for (const name of names) flatten[name] = `$_id.${name}`;

        stages.push({ $group: { _id: names.length > 0 ? id : null, [alias]: accumulator(stage.aggregate) } });
        stages.push({ $project: flatten });
        if (names.length > 0) {
          stages.push({ $sort: Object.fromEntries(names.map(name => [name, 1])) });
        }
        break;
      }
      case 'sort':
        stages.push({ $sort: { [stage.by]: stage.direction === 'asc' ? 1 : -1 } });
        break;
      case 'limit':
        stages.push({ $limit: stage.count });
        break;
      case 'project':
        stages.push({ $project: Object.fromEntries(stage.columns.map(column => [column, 1])) });
        break;
    }
  }

  return stages;
}

function projectRow(raw: unknown, columns: string[]): Row {
  const record = toShipmentRecord(raw);
  const row: Row = {};
  for (const column of columns) row[column] = record[column] ?? null;
  return row;
}

/** Aggregation over the shipments collection. */
export class MongoTabularBackend implements TabularBackend {
  constructor(private readonly model: mongoose.Model<IShipment> = Shipment) {}

  async execute(pipeline: CompiledPipeline, options: CallOptions): Promise<Table> {
    const [first] = pipeline.stages;
    if (!first || first.stage !== 'scope') {
      throw new ExecutionError('Pipeline does not start with the scope stage');
    }

    const stages = toMongoPipeline(pipeline);
    try {
      const documents = await callWithDeadline('tabular', options, () =>
        this.model.collection.aggregate(stages, { maxTimeMS: options.timeoutMs }).toArray()
      );
      logger.debug('Aggregation completed', { stages: stages.length, rows: documents.length });
      return { columns: [...pipeline.columns], rows: documents.map(document => projectRow(document, pipeline.columns)) };
    } catch (error) {
      if (error instanceof BackendTimeoutError || error instanceof RequestCancelledError) throw error;
      logger.error('Aggregation failed', { error: errorMessage(error) });
      throw new ExecutionError(`Aggregation failed: ${errorMessage(error)}`);
    }
  }
}
