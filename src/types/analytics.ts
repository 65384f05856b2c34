import { FieldValue, TabularFilter } from '.';

export type ColumnType = 'numeric' | 'datetime' | 'categorical';

export type AggregateOp = 'sum' | 'avg' | 'count' | 'min' | 'max';

export type CatalogOp = 'select' | 'filter' | 'group' | 'sort' | AggregateOp;

export interface ColumnSpec {
  type: ColumnType;
  allowedOps: ReadonlySet<CatalogOp>;
  label: string;
  description: string;
  /** Stored as a list of values (po_numbers, obl_nos). */
  list: boolean;
}

export type FilterOp = 'eq' | 'in' | 'contains' | 'gt' | 'gte' | 'lt' | 'lte' | 'between';

export type PlanPredicate =
  | { column: string; op: 'eq'; value: string | number | boolean }
  | { column: string; op: 'in'; value: string[] }
  | { column: string; op: 'contains'; value: string }
  | { column: string; op: 'gt' | 'gte' | 'lt' | 'lte'; value: number | string }
  | { column: string; op: 'between'; value: [string, string] };

export interface GroupKey {
  column: string;
  bucket?: 'month';
}

export interface PlanMetric {
  op: AggregateOp;
  column?: string;
  alias: string;
}

/** Declarative description of a computation. Never executable text. */
export interface AnalyticsPlan {
  metric: PlanMetric;
  groupBy: GroupKey[];
  filters: PlanPredicate[];
  sort?: { by: string; direction: 'asc' | 'desc' };
  limit?: number;
  chart?: 'bar' | 'line';
  /** Human labels of the user filters, used when nothing matches. */
  subjects: string[];
}

export type PipelineStage =
  | { stage: 'scope'; filter: TabularFilter }
  | { stage: 'filter'; predicates: PlanPredicate[] }
  | { stage: 'group'; keys: GroupKey[]; aggregate: PlanMetric }
  | { stage: 'sort'; by: string; direction: 'asc' | 'desc' }
  | { stage: 'limit'; count: number }
  | { stage: 'project'; columns: string[] };

export interface CompiledPipeline {
  resultName: string;
  stages: readonly PipelineStage[];
  columns: string[];
}

export type Row = Record<string, FieldValue>;

export interface Table {
  columns: string[];
  rows: Row[];
}

export interface AnalyticsResult {
  name: string;
  table: Table;
}
