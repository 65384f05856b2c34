import nlp from 'compromise';
import {
  addDays,
  addMonths,
  addWeeks,
  endOfMonth,
  endOfWeek,
  format,
  startOfMonth,
  startOfWeek,
  subDays,
  subMonths,
  subWeeks,
} from 'date-fns';
import { logger } from '../../core/logger';
import { DEFAULT_TIME_WINDOW_DAYS } from '../../core/constants';
import { NOTICE_TEMPLATES } from '../../prompts/templates';
import {
  ExtractedEntities,
  IDENTIFIER_KINDS,
  IdentifierKind,
  IdentifierSet,
  Intent,
  Notice,
  TimeWindow,
  allIdentifiers,
  emptyIdentifiers,
  identifierCount,
} from '../../types';
import { PriorTurnContext } from '../../types/graph';
import { GraphState } from '../state';
import { hasAggregationSignal } from './intent';

const CONTAINER_RE = /\b([a-z]{4}\d{7})\b/gi;

// alphanumeric with optional hyphen or slash, at least six characters
const IDISH_RE = /\b([a-z0-9][a-z0-9\-/]{5,})\b/gi;

const DATE_LIKE = /^(?:\d{4}[-/]\d{1,2}[-/]\d{1,2}|\d{1,2}[-/]\d{1,2}[-/]\d{2,4})$/;

const KIND_HINTS: ReadonlyArray<[IdentifierKind, RegExp]> = [
  ['purchaseOrder', /\b(?:purchase orders?|pos?)\b/g],
  ['billOfLading', /\b(?:bills? of lading|obls?|bols?|bls?|b\/l)\b/g],
  ['booking', /\b(?:bookings?)\b/g],
];

const BACK_REFERENCE = /\b(?:it|its|it's|that|this|those|these|them|they|their|same|the shipment|the container)\b|^(?:and|what about|how about)\b/;

const WEEK_OPTIONS = { weekStartsOn: 1 } as const;

const NOUN_STOPWORDS = new Set(['what', 'where', 'when', 'which', 'who', 'how', 'shipment', 'shipments', 'me', 'my']);

export interface ExtractionResult {
  entities: ExtractedEntities;
  topicShift: boolean;
  notices: Notice[];
}

function dedupe(values: string[]): string[] {
  return Array.from(new Set(values));
}

interface HintPosition {
  kind: IdentifierKind;
  end: number;
}

function hintPositions(text: string): HintPosition[] {
  const positions: HintPosition[] = [];
  for (const [kind, pattern] of KIND_HINTS) {
    for (const match of text.matchAll(pattern)) {
      positions.push({ kind, end: (match.index ?? 0) + match[0].length });
    }
  }
  return positions.sort((a, b) => a.end - b.end);
}

/**
 * Identifiers literally present in the text. Containers by shape; PO, bill of
 * lading and booking numbers only when a kind hint precedes them, the nearest
 * hint deciding the kind.
 */
export function extractIdentifiers(text: string): IdentifierSet {
  const identifiers = emptyIdentifiers();

  identifiers.container = dedupe(Array.from(text.matchAll(CONTAINER_RE), match => match[1].toUpperCase()));
  const containers = new Set(identifiers.container);

  const hints = hintPositions(text);
  for (const match of text.matchAll(IDISH_RE)) {
    const token = match[1].toUpperCase();
    if (containers.has(token) || !/\d/.test(token) || DATE_LIKE.test(token)) continue;

    const start = match.index ?? 0;
    let kind: IdentifierKind | null = null;
    for (const hint of hints) {
      if (hint.end > start) break;
      kind = hint.kind;
    }
    if (kind) {
      identifiers[kind].push(token);
    }
  }

  for (const kind of IDENTIFIER_KINDS) {
    identifiers[kind] = dedupe(identifiers[kind]);
  }
  return identifiers;
}

function day(date: Date): string {
  return format(date, 'yyyy-MM-dd');
}

function dateRange(start: Date, end: Date, label: string): TimeWindow {
  return { start: day(start), end: day(end), label };
}

function unitDays(amount: number, unit: string): number {
  return unit.startsWith('week') ? amount * 7 : amount;
}

/**
 * Natural-language date range against the caller's clock. Both ends inclusive.
 * `defaulted` is set when only a vague phrase ("soon") was present.
 */
export function extractTimeWindow(text: string, now: Date): { window: TimeWindow | null; defaulted: boolean } {
  const ahead = text.match(/\b(?:(?:within|in|over)\s+)?(?:the\s+)?(?:next|coming)\s+(\d{1,3})\s*(days?|weeks?)\b/)
    ?? text.match(/\b(?:within|in)\s+(\d{1,3})\s*(days?|weeks?)\b/);
  if (ahead) {
    const amount = parseInt(ahead[1], 10);
    const days = unitDays(amount, ahead[2]);
    return { window: dateRange(now, addDays(now, days), `next ${amount} ${ahead[2]}`), defaulted: false };
  }

  const behind = text.match(/\b(?:last|past|previous)\s+(\d{1,3})\s*(days?|weeks?)\b/);
  if (behind) {
    const amount = parseInt(behind[1], 10);
    const days = unitDays(amount, behind[2]);
    return { window: dateRange(subDays(now, days), now, `last ${amount} ${behind[2]}`), defaulted: false };
  }

  if (/\btoday\b/.test(text)) return { window: dateRange(now, now, 'today'), defaulted: false };
  if (/\btomorrow\b/.test(text)) {
    const tomorrow = addDays(now, 1);
    return { window: dateRange(tomorrow, tomorrow, 'tomorrow'), defaulted: false };
  }
  if (/\byesterday\b/.test(text)) {
    const yesterday = subDays(now, 1);
    return { window: dateRange(yesterday, yesterday, 'yesterday'), defaulted: false };
  }

  const week = text.match(/\b(this|next|last)\s+week\b/);
  if (week) {
    const anchor = week[1] === 'next' ? addWeeks(now, 1) : week[1] === 'last' ? subWeeks(now, 1) : now;
    return {
      window: dateRange(startOfWeek(anchor, WEEK_OPTIONS), endOfWeek(anchor, WEEK_OPTIONS), `${week[1]} week`),
      defaulted: false,
    };
  }

  const month = text.match(/\b(this|next|last)\s+month\b/);
  if (month) {
    const anchor = month[1] === 'next' ? addMonths(now, 1) : month[1] === 'last' ? subMonths(now, 1) : now;
    return { window: dateRange(startOfMonth(anchor), endOfMonth(anchor), `${month[1]} month`), defaulted: false };
  }

  if (/\b(?:soon|shortly|upcoming)\b/.test(text)) {
    return {
      window: dateRange(now, addDays(now, DEFAULT_TIME_WINDOW_DAYS), `next ${DEFAULT_TIME_WINDOW_DAYS} days`),
      defaulted: true,
    };
  }

  return { window: null, defaulted: false };
}

/** Lowercased single-word nouns, without identifiers and question words. */
export function contentNouns(text: string): Set<string> {
  const raw: unknown = nlp(text).match('#Noun').out('array');
  const nouns = new Set<string>();
  if (!Array.isArray(raw)) return nouns;

  for (const phrase of raw) {
    if (typeof phrase !== 'string') continue;
    for (const word of phrase.toLowerCase().split(/\s+/)) {
      const cleaned = word.replace(/[^a-z]/g, '');
      if (cleaned.length > 2 && !NOUN_STOPWORDS.has(cleaned) && !/\d/.test(word)) {
        nouns.add(cleaned);
      }
    }
  }
  return nouns;
}

function coarseIntent(text: string, ids: IdentifierSet): Intent {
  if (hasAggregationSignal(text)) return 'analytics';
  return identifierCount(ids) > 0 ? 'retrieval' : 'unsupported';
}

/**
 * New identifiers not seen in the previous turn, no shared content nouns, and
 * a different coarse intent.
 */
export function isTopicShift(text: string, identifiers: IdentifierSet, prior: PriorTurnContext | null): boolean {
  if (!prior) return false;

  const priorIds = new Set(allIdentifiers(prior.identifiers));
  const current = allIdentifiers(identifiers);
  const introducesNew = current.length > 0 && current.some(id => !priorIds.has(id));
  if (!introducesNew) return false;

  const priorNouns = contentNouns(prior.question);
  const sharesNoun = Array.from(contentNouns(text)).some(noun => priorNouns.has(noun));
  if (sharesNoun) return false;

  return prior.intent !== null && coarseIntent(text, identifiers) !== prior.intent;
}

export function extractEntities(text: string, now: Date, prior: PriorTurnContext | null): ExtractionResult {
  const notices: Notice[] = [];
  let identifiers = extractIdentifiers(text);
  let identifierSource: ExtractedEntities['identifierSource'] = 'text';

  const { window: timeWindow, defaulted } = extractTimeWindow(text, now);
  if (defaulted) {
    notices.push({ code: 'default-time-window', message: NOTICE_TEMPLATES.DEFAULT_TIME_WINDOW() });
  }

  const topicShift = isTopicShift(text, identifiers, prior);
  if (topicShift) {
    notices.push({ code: 'context-reset', message: NOTICE_TEMPLATES.CONTEXT_RESET() });
  } else if (
    prior &&
    identifierCount(identifiers) === 0 &&
    identifierCount(prior.identifiers) > 0 &&
    BACK_REFERENCE.test(text) &&
    !hasAggregationSignal(text)
  ) {
    identifiers = {
      container: [...prior.identifiers.container],
      purchaseOrder: [...prior.identifiers.purchaseOrder],
      billOfLading: [...prior.identifiers.billOfLading],
      booking: [...prior.identifiers.booking],
    };
    identifierSource = 'session';
    notices.push({
      code: 'sticky-identifiers',
      message: NOTICE_TEMPLATES.STICKY_IDENTIFIERS(allIdentifiers(identifiers)),
    });
  }

  return {
    entities: { identifiers, timeWindow, identifierSource },
    topicShift,
    notices,
  };
}

export async function extractorNode(state: GraphState): Promise<Partial<GraphState>> {
  const text = state.normalizedQuestion ?? '';
  const { entities, topicShift, notices } = extractEntities(text, new Date(state.now), state.prior);

  logger.info('Extracted entities', {
    traceId: state.traceId,
    containers: entities.identifiers.container.length,
    purchaseOrders: entities.identifiers.purchaseOrder.length,
    billsOfLading: entities.identifiers.billOfLading.length,
    bookings: entities.identifiers.booking.length,
    identifierSource: entities.identifierSource,
    timeWindow: entities.timeWindow?.label ?? null,
    topicShift,
  });

  return { entities, topicShift, notices };
}
