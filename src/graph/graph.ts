import { StateGraph, END, START } from '@langchain/langgraph';
import { v4 as uuidv4 } from 'uuid';
import { GraphStateAnnotation, GraphState, GraphUpdate } from './state';
import { PipelineDeps } from './deps';
import { normalizerNode } from './nodes/normalizer';
import { extractorNode } from './nodes/extractor';
import { intentNode } from './nodes/intent';
import { assertNever } from './nodes/router';
import { createRetrievalPlannerNode } from './nodes/planner';
import { createRetrieverNode } from './nodes/retriever';
import { interpreterNode } from './nodes/interpreter';
import { createAnalyticsNode } from './nodes/executor';
import { responderNode } from './nodes/responder';
import { logger } from '../core/logger';
import {
  BackendTimeoutError,
  RequestCancelledError,
  ScopeResolutionError,
  ValidationError,
  errorMessage,
  isShipmentQnAError,
} from '../core/errors';
import { RESPONSE_TEMPLATES, canonicalAnswer } from '../prompts/templates';
import { ScopeSet, resolveScope } from '../security/scope';
import { ChatRequest, ChatResponse, Notice, emptyIdentifiers } from '../types';
import { isValidConversationId, maskConversationId, sanitizeQuestion } from '../utils/security';
import { callWithDeadline } from '../utils/timeout';

function afterClassify(state: GraphState): 'plan_retrieval' | 'compute_analytics' | 'respond' {
  const decision = state.route;
  if (!decision || state.errors.length > 0) return 'respond';

  switch (decision.kind) {
    case 'retrieval':
      return 'plan_retrieval';
    case 'analytics':
      return 'compute_analytics';
    case 'unsupported':
      return 'respond';
    default:
      return assertNever(decision);
  }
}

function afterRetrievalPlan(state: GraphState): 'retrieve' | 'respond' {
  return state.retrievalPlan ? 'retrieve' : 'respond';
}

function afterRetrieve(state: GraphState): 'interpret' | 'respond' {
  return state.hits && state.errors.length === 0 ? 'interpret' : 'respond';
}

export function createShipmentGraph(deps: PipelineDeps) {
  const workflow = new StateGraph(GraphStateAnnotation)
    .addNode('normalize', normalizerNode)
    .addNode('extract', extractorNode)
    .addNode('classify', intentNode)
    .addNode('plan_retrieval', createRetrievalPlannerNode(deps))
    .addNode('retrieve', createRetrieverNode(deps))
    .addNode('interpret', interpreterNode)
    .addNode('compute_analytics', createAnalyticsNode(deps))
    .addNode('respond', responderNode);

  workflow.addEdge(START, 'normalize');
  workflow.addEdge('normalize', 'extract');
  workflow.addEdge('extract', 'classify');

  workflow.addConditionalEdges('classify', afterClassify, {
    plan_retrieval: 'plan_retrieval',
    compute_analytics: 'compute_analytics',
    respond: 'respond',
  });

  workflow.addConditionalEdges('plan_retrieval', afterRetrievalPlan, {
    retrieve: 'retrieve',
    respond: 'respond',
  });

  workflow.addConditionalEdges('retrieve', afterRetrieve, {
    interpret: 'interpret',
    respond: 'respond',
  });

  workflow.addEdge('interpret', 'respond');
  workflow.addEdge('compute_analytics', 'respond');
  workflow.addEdge('respond', END);

  return workflow.compile();
}

export type ShipmentGraph = ReturnType<typeof createShipmentGraph>;

const compiledGraphs = new WeakMap<PipelineDeps, ShipmentGraph>();

function graphFor(deps: PipelineDeps): ShipmentGraph {
  const cached = compiledGraphs.get(deps);
  if (cached) return cached;
  const graph = createShipmentGraph(deps);
  compiledGraphs.set(deps, graph);
  return graph;
}

export interface RunOptions {
  /** Cancels the request; nothing is written to session memory afterwards. */
  signal?: AbortSignal;
  /** Clock for relative dates. Defaults to the current time. */
  now?: Date;
}

/** One notice per code, first message wins. */
export function noticeMessages(notices: readonly Notice[]): string[] {
  const byCode = new Map<string, string>();
  for (const notice of notices) {
    if (!byCode.has(notice.code)) byCode.set(notice.code, notice.message);
  }
  return Array.from(byCode.values());
}

function fixedResponse(conversationId: string, traceId: string, answer: string): ChatResponse {
  return { conversationId, traceId, intent: null, answer, notices: [], evidence: [] };
}

/**
 * Answers one question for one principal. The consignee scope is resolved
 * before anything else; the conversation lock is held from the session read
 * to the session write, and a cancelled or timed-out run writes nothing.
 */
export async function runQuestion(
  request: ChatRequest,
  deps: PipelineDeps,
  options: RunOptions = {}
): Promise<ChatResponse> {
  const traceId = uuidv4();
  const conversationId =
    request.conversationId && isValidConversationId(request.conversationId) ? request.conversationId : uuidv4();
  const question = sanitizeQuestion(request.question);
  const now = options.now ?? new Date();

  if (!question) {
    throw new ValidationError('Question must not be empty');
  }

  logger.info('Starting question', {
    traceId,
    conversationId: maskConversationId(conversationId),
    questionLength: question.length,
  });

  let scope: ScopeSet;
  try {
    scope = await resolveScope(request.principal, deps.hierarchy);
  } catch (error) {
    if (error instanceof ScopeResolutionError) {
      return fixedResponse(conversationId, traceId, RESPONSE_TEMPLATES.NO_SCOPE());
    }
    throw error;
  }

  const startTime = Date.now();
  try {
    return await deps.memory.withConversation(conversationId, async () => {
      const slots = await deps.memory.load(conversationId);

      const initial: GraphUpdate = {
        traceId,
        conversationId,
        now: now.toISOString(),
        question,
        scope,
        prior: deps.memory.priorContext(slots),
      };

      const final = await callWithDeadline(
        'question pipeline',
        { timeoutMs: deps.timeouts.totalMs, signal: options.signal },
        signal => graphFor(deps).invoke(initial, { signal })
      );

      if (options.signal?.aborted) {
        throw new RequestCancelledError('Request cancelled before session update');
      }

      const intent = final.classification?.intent ?? null;
      await deps.memory.save(
        conversationId,
        deps.memory.nextSlots(conversationId, slots, {
          question,
          normalizedQuestion: final.normalizedQuestion ?? '',
          intent,
          identifiers: final.entities?.identifiers ?? emptyIdentifiers(),
          topicShift: final.topicShift ?? false,
          at: now.toISOString(),
        })
      );

      logger.info('Question answered', {
        traceId,
        intent,
        route: final.route?.kind ?? null,
        errors: final.errors.map(error => error.code),
        durationMs: Date.now() - startTime,
      });

      const response: ChatResponse = {
        conversationId,
        traceId,
        intent,
        answer: final.answer ?? RESPONSE_TEMPLATES.INTERNAL(),
        notices: noticeMessages(final.notices),
        evidence: final.evidence ?? [],
      };
      if (final.table) response.table = final.table;
      if (final.chartSpec) response.chartSpec = final.chartSpec;
      return response;
    });
  } catch (error) {
    if (error instanceof RequestCancelledError || options.signal?.aborted) {
      logger.info('Question cancelled', { traceId, durationMs: Date.now() - startTime });
      return fixedResponse(conversationId, traceId, RESPONSE_TEMPLATES.CANCELLED());
    }
    if (error instanceof BackendTimeoutError) {
      logger.warn('Question exceeded its deadline', { traceId, timeoutMs: deps.timeouts.totalMs });
      return fixedResponse(conversationId, traceId, RESPONSE_TEMPLATES.TEMPORARILY_UNAVAILABLE());
    }

    logger.error('Question pipeline failed', { traceId, error: errorMessage(error) });
    const answer = isShipmentQnAError(error) ? canonicalAnswer(error.code) : RESPONSE_TEMPLATES.INTERNAL();
    return fixedResponse(conversationId, traceId, answer);
  }
}
