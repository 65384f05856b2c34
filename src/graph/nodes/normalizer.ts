import { logger } from '../../core/logger';
import { GraphState } from '../state';

const LEADING_FILLER =
  /^(?:hi|hello|hey|good (?:morning|afternoon|evening)|please|kindly|can you|could you|would you|will you|tell me|show me|let me know|i(?:'d| would) like to know|i want to know)\b[\s,!.:;-]*/;

const STANDALONE_FILLER = /\b(?:please|kindly)\b/g;

/**
 * Lowercase, trim, collapse whitespace, drop greetings and politeness, drop
 * trailing punctuation. Total: any string in, a string out.
 */
export function normalizeQuestion(text: string): string {
  let normalized = text.toLowerCase().replace(/\s+/g, ' ').trim();

  let previous = '';
  while (previous !== normalized) {
    previous = normalized;
    normalized = normalized.replace(LEADING_FILLER, '').trim();
  }

  return normalized
    .replace(STANDALONE_FILLER, ' ')
    .replace(/[\s?.!,;:]+$/, '')
    .replace(/\s+/g, ' ')
    .trim();
}

export async function normalizerNode(state: GraphState): Promise<Partial<GraphState>> {
  const normalizedQuestion = normalizeQuestion(state.question);

  logger.debug('Normalized question', {
    traceId: state.traceId,
    rawLength: state.question.length,
    normalizedLength: normalizedQuestion.length,
  });

  return { normalizedQuestion };
}
