import { DEFAULT_TIME_WINDOW_DAYS, MAX_RETRIEVAL_IDENTIFIERS } from '../core/constants';
import { ErrorCode } from '../core/errors';

/**
 * Canonical user-facing phrasings. Stage errors and notices are only ever
 * surfaced through these; backend error text never reaches the answer.
 */
export const RESPONSE_TEMPLATES = {
  COULDNT_FIND: (subject: string) => `I couldn't find any shipments matching ${subject}.`,

  METRIC_UNAVAILABLE: () => "Sorry, that metric isn't available.",

  TEMPORARILY_UNAVAILABLE: () =>
    'Shipment data is temporarily unavailable. Please try again in a few minutes.',

  INSUFFICIENT_IDENTIFIERS: () =>
    'Please include a container, PO, bill of lading or booking number so I can look that shipment up.',

  UNSUPPORTED: () =>
    'I can answer questions about specific shipments (by container, PO, bill of lading or booking number) ' +
    'or about aggregate figures such as average delay or shipment counts. Could you rephrase your question?',

  TOO_MANY_IDENTIFIERS: () =>
    `I can look up at most ${MAX_RETRIEVAL_IDENTIFIERS} shipments at once. ` +
    'Please narrow the list, or ask an aggregate question instead.',

  NO_SCOPE: () => "I can't answer that because no shipments are linked to your account.",

  ANALYTICS_FAILED: () => "Sorry, I couldn't compute that figure. Please try rephrasing the question.",

  CANCELLED: () => 'The request was cancelled.',

  INTERNAL: () => 'Something went wrong while answering. Please try again.',
};

export const NOTICE_TEMPLATES = {
  DEFAULT_TIME_WINDOW: () => `No duration provided; using default window of ${DEFAULT_TIME_WINDOW_DAYS} days.`,
  CONTEXT_RESET: () => 'This looks like a new topic, so I cleared the earlier shipment context.',
  STICKY_IDENTIFIERS: (ids: string[]) => `Using ${ids.join(', ')} from your previous question.`,
  TOO_MANY_IDENTIFIERS: (count: number) =>
    `Your question mentions ${count} identifiers; at most ${MAX_RETRIEVAL_IDENTIFIERS} can be looked up at once.`,
  NO_MATCHING_SHIPMENTS: () => 'No matching shipments were found.',
  KEYWORD_ONLY_SEARCH: () => 'Semantic ranking was unavailable, so results are based on keyword matching only.',
  ANALYTICS_REGENERATED: () => 'The first computation attempt failed and was retried once.',
};

const RETRIEVAL_STAGES = new Set(['plan_retrieval', 'retrieve']);

/**
 * Error code -> canonical answer. An execution error in a retrieval stage is a
 * failed search, not a failed computation.
 */
export function canonicalAnswer(code: ErrorCode, subject?: string, stage?: string): string {
  if (code === 'EXECUTION_ERROR' && stage !== undefined && RETRIEVAL_STAGES.has(stage)) {
    return RESPONSE_TEMPLATES.TEMPORARILY_UNAVAILABLE();
  }
  switch (code) {
    case 'SCOPE_RESOLUTION':
      return RESPONSE_TEMPLATES.NO_SCOPE();
    case 'INSUFFICIENT_IDENTIFIERS':
      return RESPONSE_TEMPLATES.INSUFFICIENT_IDENTIFIERS();
    case 'UNSUPPORTED_PREDICATE':
      return RESPONSE_TEMPLATES.UNSUPPORTED();
    case 'SCHEMA_VIOLATION':
      return RESPONSE_TEMPLATES.METRIC_UNAVAILABLE();
    case 'PLAN_FORMAT':
    case 'EXECUTION_ERROR':
      return RESPONSE_TEMPLATES.ANALYTICS_FAILED();
    case 'EMPTY_RESULT':
      return RESPONSE_TEMPLATES.COULDNT_FIND(subject || 'your question');
    case 'BACKEND_TIMEOUT':
      return RESPONSE_TEMPLATES.TEMPORARILY_UNAVAILABLE();
    case 'REQUEST_CANCELLED':
      return RESPONSE_TEMPLATES.CANCELLED();
    case 'STATE_OVERWRITE':
    case 'VALIDATION_ERROR':
      return RESPONSE_TEMPLATES.INTERNAL();
  }
}
