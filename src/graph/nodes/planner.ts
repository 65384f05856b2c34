import { RunnableConfig } from '@langchain/core/runnables';
import { logger } from '../../core/logger';
import { RequestCancelledError, errorMessage, isShipmentQnAError } from '../../core/errors';
import { planRetrieval } from '../../retrieval/planner';
import { throwIfAborted } from '../../utils/timeout';
import { PipelineDeps } from '../deps';
import { GraphState } from '../state';

export function createRetrievalPlannerNode(deps: PipelineDeps) {
  return async function retrievalPlannerNode(state: GraphState, options?: RunnableConfig): Promise<Partial<GraphState>> {
    const signal = options?.signal;
    throwIfAborted(signal, 'retrieval planning');

    const { entities, route } = state;
    if (!entities || route?.kind !== 'retrieval') {
      return {};
    }

    try {
      const { plan, notices } = await planRetrieval(
        { scope: state.scope, entities, question: state.normalizedQuestion ?? '', handler: route.handler },
        deps.embeddings,
        { embeddingTimeoutMs: deps.timeouts.llmMs, signal }
      );

      logger.info('Retrieval planned', {
        traceId: state.traceId,
        handler: route.handler,
        vector: Boolean(plan.ranking.vector),
        topK: plan.ranking.topK,
      });

      return { retrievalPlan: plan, notices };
    } catch (error) {
      if (error instanceof RequestCancelledError || !isShipmentQnAError(error)) throw error;
      logger.warn('Retrieval planning failed', { traceId: state.traceId, code: error.code });
      return { errors: [{ code: error.code, stage: 'plan_retrieval', message: errorMessage(error) }] };
    }
  };
}
