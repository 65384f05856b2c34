import { logger } from '../../core/logger';
import { selectHandler } from '../../retrieval/handlers';
import { GraphState } from '../state';

export async function interpreterNode(state: GraphState): Promise<Partial<GraphState>> {
  const { route, hits, entities } = state;
  if (route?.kind !== 'retrieval' || !hits || !entities) {
    return {};
  }

  const output = selectHandler(route.handler)({ hits, entities, question: state.normalizedQuestion ?? '' });

  logger.debug('Interpreted hits', {
    traceId: state.traceId,
    handler: route.handler,
    fragments: output.fragments.length,
    evidence: output.evidence.length,
  });

  return { handlerOutput: output, notices: output.notices };
}
