import { MAX_RETRIEVAL_IDENTIFIERS } from '../../core/constants';
import { Intent, RetrievalHandlerKind, RouteDecision } from '../../types';

export interface RouteInput {
  intent: Intent;
  entityCount: number;
  /** Set for lookup-shaped questions, with or without identifiers. */
  subIntent: RetrievalHandlerKind | null;
  /** At least one aggregation signal a plan can be drafted from. */
  hasAnalyticsPrecursor: boolean;
}

export function assertNever(value: never): never {
  throw new Error(`Unhandled variant: ${JSON.stringify(value)}`);
}

/**
 * Pure handler selection. A handler is only chosen when its input exists;
 * otherwise the decision is the unsupported path with a reason.
 */
export function route(input: RouteInput): RouteDecision {
  switch (input.intent) {
    case 'retrieval':
      if (input.entityCount === 0) return { kind: 'unsupported', reason: 'insufficient-identifiers' };
      if (input.entityCount > MAX_RETRIEVAL_IDENTIFIERS) return { kind: 'unsupported', reason: 'too-many-identifiers' };
      return { kind: 'retrieval', handler: input.subIntent ?? 'status' };

    case 'analytics':
      return input.hasAnalyticsPrecursor ? { kind: 'analytics' } : { kind: 'unsupported', reason: 'no-analytics-precursor' };

    case 'unsupported':
      if (input.entityCount > MAX_RETRIEVAL_IDENTIFIERS) return { kind: 'unsupported', reason: 'too-many-identifiers' };
      if (input.entityCount === 0 && input.subIntent !== null) {
        return { kind: 'unsupported', reason: 'insufficient-identifiers' };
      }
      return { kind: 'unsupported', reason: 'no-signal' };

    default:
      return assertNever(input.intent);
  }
}
