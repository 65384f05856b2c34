import { RunnableConfig } from '@langchain/core/runnables';
import { logger } from '../../core/logger';
import { chartFor, describeResult } from '../../analytics/describe';
import { emptySubject, runAnalytics } from '../../analytics/engine';
import { NOTICE_TEMPLATES } from '../../prompts/templates';
import { Notice } from '../../types';
import { throwIfAborted } from '../../utils/timeout';
import { PipelineDeps } from '../deps';
import { GraphState } from '../state';

/** Runs the analytics state machine and records plan, result and outcome. */
export function createAnalyticsNode(deps: PipelineDeps) {
  return async function analyticsNode(state: GraphState, options?: RunnableConfig): Promise<Partial<GraphState>> {
    const signal = options?.signal;
    throwIfAborted(signal, 'analytics');

    const entities = state.entities;
    if (!entities || state.route?.kind !== 'analytics') {
      return {};
    }

    const outcome = await runAnalytics(
      { question: state.normalizedQuestion ?? '', entities, scope: state.scope },
      {
        drafter: deps.drafter,
        catalog: deps.catalog,
        backend: deps.tabular,
        draftTimeoutMs: deps.timeouts.llmMs,
        executeTimeoutMs: deps.timeouts.tabularMs,
        signal,
      }
    );

    if (outcome.status === 'failed') {
      logger.info('Analytics ended without a result', {
        traceId: state.traceId,
        code: outcome.error.code,
        attempts: outcome.attempts,
      });

      const notices: Notice[] = outcome.error.code === 'EMPTY_RESULT'
        ? [{ code: 'no-matching-shipments', message: NOTICE_TEMPLATES.NO_MATCHING_SHIPMENTS() }]
        : [];

      return {
        ...(outcome.plan ? { analyticsPlan: outcome.plan } : {}),
        analyticsAttempts: outcome.attempts,
        notices,
        errors: [
          {
            code: outcome.error.code,
            stage: 'analytics',
            message: outcome.error.message,
            ...(outcome.plan ? { subject: emptySubject(outcome.plan) } : {}),
          },
        ],
      };
    }

    const { plan, result, attempts } = outcome;
    const output = describeResult(plan, result, deps.catalog);
    const chartSpec = chartFor(plan, result, deps.catalog);
    const notices: Notice[] = attempts > 1
      ? [{ code: 'analytics-regenerated', message: NOTICE_TEMPLATES.ANALYTICS_REGENERATED() }]
      : [];

    return {
      analyticsPlan: plan,
      analyticsResult: result,
      analyticsAttempts: attempts,
      handlerOutput: output,
      ...(chartSpec ? { chartSpec } : {}),
      notices,
    };
  };
}
