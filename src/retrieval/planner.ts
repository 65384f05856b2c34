import { config } from '../core/config';
import { logger } from '../core/logger';
import { RequestCancelledError, errorMessage } from '../core/errors';
import { NOTICE_TEMPLATES } from '../prompts/templates';
import { buildSearchFilter } from '../security/filter-builder';
import { ScopeSet } from '../security/scope';
import { ExtractedEntities, Notice, RankingParams, RetrievalHandlerKind, RetrievalPlan, allIdentifiers } from '../types';
import { EmbeddingProvider } from '../types/capabilities';

export interface PlannerOptions {
  topK?: number;
  vectorK?: number;
  embeddingTimeoutMs?: number;
  signal?: AbortSignal;
}

export interface PlannerInput {
  scope: ScopeSet;
  entities: ExtractedEntities;
  question: string;
  handler: RetrievalHandlerKind;
}

/** Identifiers when there are any, else the question itself. */
export function rankingQueryText(entities: ExtractedEntities, question: string): string {
  const ids = allIdentifiers(entities.identifiers);
  return ids.length > 0 ? ids.join(' ') : question;
}

/**
 * Composes the filter and ranking for one retrieval call. A query vector is
 * added when an embeddings provider is configured; if embedding fails the plan
 * falls back to keyword ranking and says so in a notice.
 */
export async function planRetrieval(
  input: PlannerInput,
  embeddings: EmbeddingProvider | null,
  options: PlannerOptions = {}
): Promise<{ plan: RetrievalPlan; notices: Notice[] }> {
  const filter = buildSearchFilter(input.scope, input.entities);
  const queryText = rankingQueryText(input.entities, input.question);
  const notices: Notice[] = [];

  const ranking: RankingParams = {
    queryText,
    topK: options.topK ?? config.search.topK,
    vectorK: options.vectorK ?? config.search.vectorK,
  };

  if (embeddings) {
    try {
      ranking.vector = await embeddings.embedQuery(queryText, {
        timeoutMs: options.embeddingTimeoutMs ?? config.execution.llmTimeout,
        signal: options.signal,
      });
    } catch (error) {
      if (error instanceof RequestCancelledError) throw error;
      logger.warn('Embedding failed, continuing with keyword ranking', { error: errorMessage(error) });
      notices.push({ code: 'keyword-only-search', message: NOTICE_TEMPLATES.KEYWORD_ONLY_SEARCH() });
    }
  }

  const reason = `${input.handler} lookup for ${allIdentifiers(input.entities.identifiers).length} identifier(s)`;
  return { plan: { filter, ranking, reason }, notices };
}
