import { config } from '../core/config';
import { logger } from '../core/logger';
import { ANALYTICS_RESULT_NAME, MAX_ANALYTICS_ATTEMPTS } from '../core/constants';
import {
  EmptyResultError,
  ExecutionError,
  RequestCancelledError,
  ShipmentQnAError,
  errorMessage,
  isShipmentQnAError,
} from '../core/errors';
import { buildTabularFilter } from '../security/filter-builder';
import { ScopeSet } from '../security/scope';
import { ExtractedEntities, TabularFilter } from '../types';
import { AnalyticsPlan, AnalyticsResult } from '../types/analytics';
import { TabularBackend } from '../types/capabilities';
import { throwIfAborted } from '../utils/timeout';
import { MetadataCatalog } from './catalog';
import { CompileOptions, compilePlan } from './compiler';
import { DraftFeedback, PlanDrafter, timeColumnFor } from './drafter';
import { validatePlan } from './validator';

export interface AnalyticsRequest {
  /** Normalized question text. */
  question: string;
  entities: ExtractedEntities;
  scope: ScopeSet;
}

export interface AnalyticsDeps {
  drafter: PlanDrafter;
  catalog: MetadataCatalog;
  backend: TabularBackend;
  draftTimeoutMs?: number;
  executeTimeoutMs?: number;
  compile?: CompileOptions;
  signal?: AbortSignal;
}

export type AnalyticsOutcome =
  | { status: 'ok'; plan: AnalyticsPlan; result: AnalyticsResult; attempts: number }
  | { status: 'failed'; plan: AnalyticsPlan | null; error: ShipmentQnAError; attempts: number };

type Phase = 'draft' | 'validate' | 'compile' | 'execute';

/** Compilation and execution failures get one regeneration. */
function isRetryable(error: ShipmentQnAError): boolean {
  return error.code === 'PLAN_FORMAT' || error.code === 'EXECUTION_ERROR';
}

function asQnAError(error: unknown, phase: Phase): ShipmentQnAError {
  if (isShipmentQnAError(error)) return error;
  return new ExecutionError(`Analytics ${phase} failed`, { reason: errorMessage(error) });
}

export function emptySubject(plan: AnalyticsPlan): string {
  return plan.subjects.length > 0 ? plan.subjects.join(', ') : 'your question';
}

/**
 * Scope filter for the computation. Identifiers and the time window ride
 * along as push-down predicates, so an aggregate over named shipments only
 * ever sees those shipments.
 */
export function analyticsScopeFilter(request: AnalyticsRequest): TabularFilter {
  return buildTabularFilter(request.scope, request.entities, { windowField: timeColumnFor(request.question) });
}

/**
 * draft -> validate -> compile -> execute, with at most one regeneration.
 * Schema violations end the run without touching the backend; timeouts are
 * reported, never retried.
 */
export async function runAnalytics(request: AnalyticsRequest, deps: AnalyticsDeps): Promise<AnalyticsOutcome> {
  let scopeFilter: TabularFilter;
  try {
    scopeFilter = analyticsScopeFilter(request);
  } catch (error) {
    return { status: 'failed', plan: null, error: asQnAError(error, 'compile'), attempts: 0 };
  }

  let feedback: DraftFeedback | null = null;
  let lastPlan: AnalyticsPlan | null = null;

  for (let attempt = 1; attempt <= MAX_ANALYTICS_ATTEMPTS; attempt++) {
    let phase: Phase = 'draft';
    try {
      throwIfAborted(deps.signal, 'analytics');

      const plan = await deps.drafter.draft(
        { question: request.question, entities: request.entities, catalog: deps.catalog },
        feedback,
        { timeoutMs: deps.draftTimeoutMs ?? config.execution.llmTimeout, signal: deps.signal }
      );
      lastPlan = plan;

      phase = 'validate';
      const validated = validatePlan(plan, deps.catalog);

      phase = 'compile';
      const pipeline = compilePlan(validated, scopeFilter, deps.compile);

      phase = 'execute';
      const table = await deps.backend.execute(pipeline, {
        timeoutMs: deps.executeTimeoutMs ?? config.execution.tabularTimeout,
        signal: deps.signal,
      });

      if (table.rows.length === 0) {
        return {
          status: 'failed',
          plan,
          error: new EmptyResultError('Computation matched no rows', { subject: emptySubject(plan) }),
          attempts: attempt,
        };
      }

      logger.info('Analytics computed', { drafter: deps.drafter.name, attempt, rows: table.rows.length });
      return { status: 'ok', plan, result: { name: pipeline.resultName || ANALYTICS_RESULT_NAME, table }, attempts: attempt };
    } catch (error) {
      if (error instanceof RequestCancelledError) throw error;
      const failure = asQnAError(error, phase);

      logger.warn('Analytics attempt failed', { attempt, phase, code: failure.code, error: failure.message });

      if (!isRetryable(failure) || attempt >= MAX_ANALYTICS_ATTEMPTS) {
        return { status: 'failed', plan: lastPlan, error: failure, attempts: attempt };
      }
      feedback = { attempt, error: failure, previous: lastPlan };
    }
  }

  // unreachable: the last attempt always returns
  return {
    status: 'failed',
    plan: lastPlan,
    error: new ExecutionError('Analytics attempts exhausted'),
    attempts: MAX_ANALYTICS_ATTEMPTS,
  };
}
