import { RunnableConfig } from '@langchain/core/runnables';
import { logger } from '../../core/logger';
import { RequestCancelledError, errorMessage, isShipmentQnAError } from '../../core/errors';
import { throwIfAborted } from '../../utils/timeout';
import { PipelineDeps } from '../deps';
import { GraphState } from '../state';

/** One search call per request; hits are frozen once fetched. */
export function createRetrieverNode(deps: PipelineDeps) {
  return async function retrieverNode(state: GraphState, options?: RunnableConfig): Promise<Partial<GraphState>> {
    const signal = options?.signal;
    throwIfAborted(signal, 'retrieval');

    const plan = state.retrievalPlan;
    if (!plan) {
      return {};
    }

    const startTime = Date.now();
    try {
      const hits = await deps.search.search(plan.filter.expression, plan.ranking, {
        timeoutMs: deps.timeouts.searchMs,
        signal,
      });

      logger.info('Retrieved hits', {
        traceId: state.traceId,
        hits: hits.length,
        durationMs: Date.now() - startTime,
      });

      return { hits: Object.freeze(hits.map(hit => Object.freeze({ ...hit }))) };
    } catch (error) {
      if (error instanceof RequestCancelledError || !isShipmentQnAError(error)) throw error;
      logger.warn('Retrieval failed', { traceId: state.traceId, code: error.code, durationMs: Date.now() - startTime });
      return { errors: [{ code: error.code, stage: 'retrieve', message: errorMessage(error) }] };
    }
  };
}
