import { isDeepStrictEqual } from 'util';
import { Annotation } from '@langchain/langgraph';
import { StateOverwriteError } from '../core/errors';
import { ScopeSet } from '../security/scope';
import {
  ChartSpec,
  Evidence,
  ExtractedEntities,
  HandlerOutput,
  Hit,
  IntentClassification,
  Notice,
  RetrievalPlan,
  RouteDecision,
  StageError,
  TableSpec,
} from '../types';
import { AnalyticsPlan, AnalyticsResult } from '../types/analytics';
import { PriorTurnContext } from '../types/graph';

/**
 * Reducer for a field a stage writes once. A second write is accepted only
 * when it equals the first; anything else raises StateOverwriteError.
 */
export function writeOnceReducer<T>(field: string) {
  return (current: T | null, update: T | null): T | null => {
    if (update === null || update === undefined) return current;
    if (current === null || current === undefined) return update;
    if (isDeepStrictEqual(current, update)) return current;
    throw new StateOverwriteError(field);
  };
}

export function appendReducer<T>(current: T[], update: T[]): T[] {
  return current.concat(update);
}

function writeOnce<T>(field: string, initial: () => T | null = () => null) {
  return Annotation<T | null>({
    reducer: writeOnceReducer<T>(field),
    default: initial,
  });
}

function appendOnly<T>() {
  return Annotation<T[]>({
    reducer: appendReducer,
    default: () => [],
  });
}

export const GraphStateAnnotation = Annotation.Root({
  traceId: Annotation<string>,
  conversationId: Annotation<string>,
  /** ISO timestamp every relative date resolves against. */
  now: Annotation<string>,
  question: Annotation<string>,
  scope: Annotation<ScopeSet>,
  prior: Annotation<PriorTurnContext | null>,

  normalizedQuestion: writeOnce<string>('normalizedQuestion'),
  entities: writeOnce<ExtractedEntities>('entities'),
  topicShift: writeOnce<boolean>('topicShift'),
  classification: writeOnce<IntentClassification>('classification'),
  route: writeOnce<RouteDecision>('route'),

  retrievalPlan: writeOnce<RetrievalPlan>('retrievalPlan'),
  hits: writeOnce<readonly Hit[]>('hits'),
  handlerOutput: writeOnce<HandlerOutput>('handlerOutput'),

  analyticsPlan: writeOnce<AnalyticsPlan>('analyticsPlan'),
  analyticsResult: writeOnce<AnalyticsResult>('analyticsResult'),
  analyticsAttempts: writeOnce<number>('analyticsAttempts'),

  answer: writeOnce<string>('answer'),
  evidence: writeOnce<Evidence[]>('evidence'),
  table: writeOnce<TableSpec>('table'),
  chartSpec: writeOnce<ChartSpec>('chartSpec'),

  notices: appendOnly<Notice>(),
  errors: appendOnly<StageError>(),
});

export type GraphState = typeof GraphStateAnnotation.State;
export type GraphUpdate = typeof GraphStateAnnotation.Update;
