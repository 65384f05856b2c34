import { logger } from '../../core/logger';
import { RESPONSE_TEMPLATES, canonicalAnswer } from '../../prompts/templates';
import {
  AnswerFragment,
  ChartSpec,
  Evidence,
  HandlerOutput,
  RouteDecision,
  StageError,
  TableSpec,
  UnsupportedReason,
} from '../../types';
import { GraphState } from '../state';
import { assertNever } from './router';

export interface AssemblyInput {
  route: RouteDecision | null;
  handlerOutput: HandlerOutput | null;
  errors: readonly StageError[];
  chartSpec?: ChartSpec | null;
}

export interface AssembledResponse {
  answer: string;
  evidence: Evidence[];
  table?: TableSpec;
  chartSpec?: ChartSpec;
  downgraded: number;
}

const HAS_NUMBER = /\d/;

function unsupportedAnswer(reason: UnsupportedReason): string {
  switch (reason) {
    case 'insufficient-identifiers':
      return RESPONSE_TEMPLATES.INSUFFICIENT_IDENTIFIERS();
    case 'too-many-identifiers':
      return RESPONSE_TEMPLATES.TOO_MANY_IDENTIFIERS();
    case 'no-signal':
    case 'no-analytics-precursor':
      return RESPONSE_TEMPLATES.UNSUPPORTED();
    default:
      return assertNever(reason);
  }
}

/**
 * A fragment stating a number or a fact stands only if every evidence id it
 * cites is present. Otherwise it becomes the "couldn't find" phrasing.
 */
export function groundFragment(fragment: AnswerFragment, evidenceIds: ReadonlySet<string>): AnswerFragment {
  const claims = fragment.factual || HAS_NUMBER.test(fragment.text);
  if (!claims) return fragment;

  const grounded = fragment.evidenceIds.length > 0 && fragment.evidenceIds.every(id => evidenceIds.has(id));
  if (grounded) return fragment;

  return {
    text: RESPONSE_TEMPLATES.COULDNT_FIND(fragment.subject || 'your question'),
    evidenceIds: [],
    subject: fragment.subject,
    factual: false,
  };
}

/**
 * Final answer from whatever the stages produced. Stage errors win and are
 * shown only through their canonical phrasing; the table and chart pass
 * through unchanged.
 */
export function assembleResponse(input: AssemblyInput): AssembledResponse {
  const [firstError] = input.errors;
  if (firstError) {
    return { answer: canonicalAnswer(firstError.code, firstError.subject, firstError.stage), evidence: [], downgraded: 0 };
  }

  if (!input.route) {
    return { answer: RESPONSE_TEMPLATES.INTERNAL(), evidence: [], downgraded: 0 };
  }
  if (input.route.kind === 'unsupported') {
    return { answer: unsupportedAnswer(input.route.reason), evidence: [], downgraded: 0 };
  }

  const output = input.handlerOutput;
  if (!output || output.fragments.length === 0) {
    return { answer: RESPONSE_TEMPLATES.COULDNT_FIND('your question'), evidence: [], downgraded: 0 };
  }

  const evidenceIds = new Set(output.evidence.map(item => item.sourceId));
  const grounded = output.fragments.map(fragment => groundFragment(fragment, evidenceIds));
  const downgraded = grounded.filter((fragment, index) => fragment !== output.fragments[index]).length;

  const sentences = Array.from(new Set(grounded.map(fragment => fragment.text)));
  const cited = new Set(grounded.flatMap(fragment => fragment.evidenceIds));

  return {
    answer: sentences.join(' '),
    evidence: output.evidence.filter(item => cited.has(item.sourceId)),
    ...(output.table ? { table: output.table } : {}),
    ...(input.chartSpec ? { chartSpec: input.chartSpec } : {}),
    downgraded,
  };
}

export async function responderNode(state: GraphState): Promise<Partial<GraphState>> {
  const assembled = assembleResponse({
    route: state.route,
    handlerOutput: state.handlerOutput,
    errors: state.errors,
    chartSpec: state.chartSpec,
  });

  logger.info('Response assembled', {
    traceId: state.traceId,
    evidence: assembled.evidence.length,
    table: Boolean(assembled.table),
    downgraded: assembled.downgraded,
    errors: state.errors.map(error => error.code),
  });

  return {
    answer: assembled.answer,
    evidence: assembled.evidence,
    ...(assembled.table ? { table: assembled.table } : {}),
    ...(assembled.chartSpec ? { chartSpec: assembled.chartSpec } : {}),
  };
}
