import { ErrorCode } from '../core/errors';

export type IdentifierKind = 'container' | 'purchaseOrder' | 'billOfLading' | 'booking';

export const IDENTIFIER_KINDS: readonly IdentifierKind[] = [
  'container',
  'purchaseOrder',
  'billOfLading',
  'booking',
];

export type IdentifierSet = Record<IdentifierKind, string[]>;

/** Calendar dates (yyyy-MM-dd), both ends inclusive. */
export interface TimeWindow {
  start: string;
  end: string;
  label: string;
}

export interface ExtractedEntities {
  identifiers: IdentifierSet;
  timeWindow: TimeWindow | null;
  /** 'session' when identifiers were carried over from the previous turn. */
  identifierSource: 'text' | 'session';
}

export type Intent = 'retrieval' | 'analytics' | 'unsupported';

export type RetrievalHandlerKind = 'status' | 'eta-window' | 'delay-reason' | 'route';

export interface IntentClassification {
  intent: Intent;
  confidence: number;
  fallback: boolean;
  subIntent: RetrievalHandlerKind | null;
  aggregationSignals: string[];
}

export type UnsupportedReason =
  | 'insufficient-identifiers'
  | 'too-many-identifiers'
  | 'no-signal'
  | 'no-analytics-precursor';

export type RouteDecision =
  | { kind: 'retrieval'; handler: RetrievalHandlerKind }
  | { kind: 'analytics' }
  | { kind: 'unsupported'; reason: UnsupportedReason };

export type FieldValue = string | number | boolean | null | string[];

export type ShipmentRecord = Record<string, FieldValue>;

export interface Hit {
  docId: string;
  containerNumber: string | null;
  score: number;
  record: Readonly<ShipmentRecord>;
}

export interface RankingParams {
  queryText: string;
  topK: number;
  vectorK: number;
  vector?: number[];
}

export interface SearchFilter {
  backend: 'search';
  expression: string;
}

export type TabularPredicate =
  | { kind: 'in'; column: string; values: string[] }
  | { kind: 'any-in'; column: string; values: string[] }
  | { kind: 'between'; column: string; start: string; end: string }
  | { kind: 'and'; clauses: TabularPredicate[] };

export interface TabularFilter {
  backend: 'tabular';
  predicate: { kind: 'and'; clauses: TabularPredicate[] };
}

export interface RetrievalPlan {
  filter: SearchFilter;
  ranking: RankingParams;
  reason: string;
}

export interface Evidence {
  sourceId: string;
  containerNumber?: string;
  fieldsUsed: string[];
  snippet: Record<string, FieldValue>;
}

export interface AnswerFragment {
  text: string;
  evidenceIds: string[];
  /** What the sentence is about; used for the "couldn't find" phrasing. */
  subject: string;
  factual: boolean;
}

export interface TableSpec {
  title?: string;
  columns: string[];
  rows: Record<string, FieldValue>[];
}

export interface ChartSpec {
  kind: 'bar' | 'line';
  title: string;
  data: Record<string, FieldValue>[];
  encodings: { x: string; y: string };
}

export interface HandlerOutput {
  fragments: AnswerFragment[];
  evidence: Evidence[];
  table?: TableSpec;
  notices: Notice[];
}

export type NoticeCode =
  | 'default-time-window'
  | 'context-reset'
  | 'sticky-identifiers'
  | 'too-many-identifiers'
  | 'no-matching-shipments'
  | 'keyword-only-search'
  | 'analytics-regenerated';

export interface Notice {
  code: NoticeCode;
  message: string;
}

export interface StageError {
  code: ErrorCode;
  stage: string;
  message: string;
  subject?: string;
}

export interface Principal {
  consigneeIds: string[];
}

export interface ChatRequest {
  question: string;
  principal: Principal;
  conversationId?: string;
}

export interface ChatResponse {
  conversationId: string;
  traceId: string;
  intent: Intent | null;
  answer: string;
  notices: string[];
  evidence: Evidence[];
  table?: TableSpec;
  chartSpec?: ChartSpec;
}

export function emptyIdentifiers(): IdentifierSet {
  return { container: [], purchaseOrder: [], billOfLading: [], booking: [] };
}

export function allIdentifiers(ids: IdentifierSet): string[] {
  return IDENTIFIER_KINDS.flatMap(kind => ids[kind]);
}

export function identifierCount(ids: IdentifierSet): number {
  return allIdentifiers(ids).length;
}
