import { InsufficientIdentifiersError } from '../../core/errors';
import { logger } from '../../core/logger';
import { MAX_RETRIEVAL_IDENTIFIERS } from '../../core/constants';
import { NOTICE_TEMPLATES } from '../../prompts/templates';
import {
  ExtractedEntities,
  IntentClassification,
  Notice,
  RetrievalHandlerKind,
  StageError,
  identifierCount,
} from '../../types';
import { GraphState } from '../state';
import { route } from './router';

const AGGREGATION_SIGNALS: ReadonlyArray<[string, RegExp]> = [
  ['average', /\b(?:average|avg|mean|median)\b/],
  ['total', /\b(?:total|sum)\b/],
  ['count', /\b(?:count|how many|number of)\b/],
  ['trend', /\b(?:trend|trends|over time|monthly|month over month)\b/],
  ['distribution', /\b(?:distribution|breakdown|broken down|split by)\b/],
  ['extreme', /\b(?:max|maximum|min|minimum|highest|lowest|longest|shortest)\b/],
  ['ranking', /\b(?:top|bottom)\s+\d+\b/],
  ['grouping', /\b(?:per|each|grouped by|by (?:carrier|carriers|port|ports|month|week|status|supplier|vendor|vessel|mode|lane|shipper))\b/],
  ['percentage', /\b(?:percentage|percent|ratio|proportion|share of)\b/],
  ['set-wide', /\ball (?:my |of my |the )?(?:shipments|containers)\b/],
];

const SUB_INTENT_PATTERNS: ReadonlyArray<[RetrievalHandlerKind, RegExp]> = [
  ['delay-reason', /\b(?:delay|delays|delayed|late|why|reason|held|hold|stuck)\b/],
  ['eta-window', /\b(?:eta|etas|arrive|arrives|arriving|arrival|when will|due|expected)\b/],
  ['route', /\b(?:route|routing|vessel|vessels|voyage|transship\w*|via|leg|legs|load port|discharge port|port of loading|port of discharge)\b/],
];

const LOOKUP_SHAPE = /\b(?:where|status|track|tracking|container|containers|shipment|shipments|po|booking|obl|bl|bill of lading)\b/;

/** Names of the aggregation signals present, in declaration order. */
export function aggregationSignals(question: string): string[] {
  return AGGREGATION_SIGNALS.filter(([, pattern]) => pattern.test(question)).map(([name]) => name);
}

export function hasAggregationSignal(question: string): boolean {
  return aggregationSignals(question).length > 0;
}

/** First match wins: delay-reason, eta-window, route. Null means the status default. */
export function detectSubIntent(question: string, entities?: Pick<ExtractedEntities, 'timeWindow'>): RetrievalHandlerKind | null {
  for (const [kind, pattern] of SUB_INTENT_PATTERNS) {
    if (pattern.test(question)) return kind;
    if (kind === 'eta-window' && entities?.timeWindow) return kind;
  }
  return null;
}

/**
 * 1-5 identifiers and no aggregation signal: retrieval. Any aggregation signal:
 * analytics, including when identifiers are present too. Otherwise unsupported.
 */
export function classifyIntent(question: string, entities: ExtractedEntities): IntentClassification {
  const signals = aggregationSignals(question);
  const count = identifierCount(entities.identifiers);
  const subIntent = detectSubIntent(question, entities);

  if (signals.length > 0) {
    return {
      intent: 'analytics',
      confidence: count > 0 ? 0.6 : 0.9,
      fallback: false,
      subIntent: null,
      aggregationSignals: signals,
    };
  }

  if (count >= 1 && count <= MAX_RETRIEVAL_IDENTIFIERS) {
    return {
      intent: 'retrieval',
      confidence: entities.identifierSource === 'session' ? 0.8 : 0.95,
      fallback: false,
      subIntent,
      aggregationSignals: [],
    };
  }

  // a lookup-shaped question keeps its sub-intent so routing can ask for identifiers
  const lookupShaped = count === 0 && (subIntent !== null || LOOKUP_SHAPE.test(question));
  return {
    intent: 'unsupported',
    confidence: count > MAX_RETRIEVAL_IDENTIFIERS ? 0.5 : 0.3,
    fallback: true,
    subIntent: lookupShaped ? subIntent ?? 'status' : null,
    aggregationSignals: [],
  };
}

export async function intentNode(state: GraphState): Promise<Partial<GraphState>> {
  const question = state.normalizedQuestion ?? '';
  const entities = state.entities;
  if (!entities) {
    return {};
  }

  const classification = classifyIntent(question, entities);
  const entityCount = identifierCount(entities.identifiers);
  const decision = route({
    intent: classification.intent,
    entityCount,
    subIntent: classification.subIntent,
    hasAnalyticsPrecursor: classification.aggregationSignals.length > 0,
  });

  const notices: Notice[] = [];
  const errors: StageError[] = [];

  if (decision.kind === 'unsupported') {
    if (decision.reason === 'too-many-identifiers') {
      notices.push({ code: 'too-many-identifiers', message: NOTICE_TEMPLATES.TOO_MANY_IDENTIFIERS(entityCount) });
    } else if (decision.reason === 'insufficient-identifiers') {
      const error = new InsufficientIdentifiersError('Retrieval intent without shipment identifiers', {
        subIntent: classification.subIntent,
      });
      errors.push({ code: error.code, stage: 'intent', message: error.message });
    }
  }

  logger.info('Classified intent', {
    traceId: state.traceId,
    intent: classification.intent,
    confidence: classification.confidence,
    route: decision.kind === 'retrieval' ? `retrieval:${decision.handler}` : decision.kind,
    signals: classification.aggregationSignals,
  });

  return { classification, route: decision, notices, errors };
}
