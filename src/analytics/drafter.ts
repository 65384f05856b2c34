import { DELAY_DURATION_FIELDS, ETA_FIELDS, delayBasisFor } from '../core/constants';
import { ShipmentQnAError } from '../core/errors';
import { ExtractedEntities, allIdentifiers } from '../types';
import { AggregateOp, AnalyticsPlan, GroupKey, PlanMetric, PlanPredicate } from '../types/analytics';
import { CallOptions } from '../types/capabilities';
import { MetadataCatalog } from './catalog';
import { groupKeyName } from './compiler';

export interface DraftRequest {
  /** Normalized question text. */
  question: string;
  entities: ExtractedEntities;
  catalog: MetadataCatalog;
}

/** What went wrong with the previous attempt; present only when regenerating. */
export interface DraftFeedback {
  attempt: number;
  error: ShipmentQnAError;
  previous: AnalyticsPlan | null;
}

export interface PlanDrafter {
  readonly name: string;
  draft(request: DraftRequest, feedback: DraftFeedback | null, options: CallOptions): Promise<AnalyticsPlan>;
}

const OPS: ReadonlyArray<[AggregateOp, RegExp]> = [
  ['count', /\b(?:how many|number of|count)\b/],
  ['avg', /\b(?:average|avg|mean)\b/],
  ['sum', /\b(?:total|sum)\b/],
  ['max', /\b(?:max|maximum|highest|longest)\b/],
  ['min', /\b(?:min|minimum|lowest|shortest|earliest)\b/],
];

const GROUP_LEAD = /\b(?:grouped by|broken down by|split by|for each|by|per|across)\s+([a-z][a-z_ ]*)/g;

const TREND = /\b(?:trend|trends|over time|monthly|per month|by month|month over month)\b/;
const DISTRIBUTION = /\b(?:distribution|breakdown|broken down|split by)\b/;
const RANKING = /\b(top|bottom)\s+(\d{1,4})\b/;

const PLACE_LEAD = /\b(?:at|in|into|to|port of)\s+(?:the\s+)?(?:port of\s+)?([a-z][a-z.'-]*(?:\s+[a-z][a-z.'-]*){0,2})/g;

const NOT_A_PLACE = new Set([
  'next', 'last', 'this', 'past', 'coming', 'a', 'an', 'transit', 'ocean', 'total', 'progress', 'time',
  'day', 'days', 'week', 'weeks', 'month', 'months', 'year', 'all', 'my', 'our', 'each', 'per', 'average',
  'today', 'tomorrow', 'yesterday', 'hot', 'terms', 'general', 'particular', 'port', 'transshipment',
  // months
  'january', 'february', 'march', 'april', 'may', 'june', 'july', 'august', 'september', 'october',
  'november', 'december', 'jan', 'feb', 'mar', 'apr', 'jun', 'jul', 'aug', 'sep', 'sept', 'oct', 'nov', 'dec',
  // units
  'kg', 'kgs', 'kilograms', 'kilogram', 'lb', 'lbs', 'pounds', 'tons', 'tonnes', 'cbm', 'teu', 'teus',
  'hours', 'hour', 'percent', 'usd', 'dollars',
]);

const PLACE_BOUNDARY = new Set([
  'for', 'by', 'per', 'over', 'during', 'in', 'this', 'last', 'next', 'within', 'since', 'from', 'with',
  'and', 'or', 'on', 'port', 'terminal', 'the', 'of', 'between', 'vs', 'today', 'tomorrow', 'yesterday',
  'soon', 'arriving', 'delayed', 'grouped', 'across', 'month', 'week',
]);

const STATUS_FILTERS: ReadonlyArray<[RegExp, string, string]> = [
  [/\bdelivered\b/, 'DELIVERED', 'delivered'],
  [/\b(?:in transit|in ocean|on the water|at sea)\b/, 'IN_OCEAN', 'in transit'],
  [/\bready for pickup\b/, 'READY_FOR_PICKUP', 'ready for pickup'],
];

const SNAKE_TOKEN = /\b[a-z][a-z0-9]*(?:_[a-z0-9]+)+\b/g;

interface Mention {
  column: string;
  index: number;
  length: number;
  known: boolean;
}

/** Arrival column that time windows and monthly trends are measured on. */
export function timeColumnFor(question: string): string {
  return ETA_FIELDS[delayBasisFor(question)][0];
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Every column the question names: synonyms, column names written with
 * spaces or underscores, and snake_case tokens the catalog does not know.
 */
function columnMentions(question: string, catalog: MetadataCatalog): Mention[] {
  const found: Mention[] = [];
  const terms = new Set([...catalog.synonymTerms(), ...catalog.names()]);

  for (const term of terms) {
    const column = catalog.resolve(term);
    if (!column) continue;
    const spaced = term.replace(/_/g, ' ');
    for (const variant of new Set([term, spaced])) {
      const pattern = new RegExp(`\\b${escapeRegExp(variant)}\\b`, 'g');
      for (const match of question.matchAll(pattern)) {
        found.push({ column, index: match.index ?? 0, length: match[0].length, known: true });
      }
    }
  }

  for (const match of question.matchAll(SNAKE_TOKEN)) {
    if (!catalog.resolve(match[0]) && !catalog.isInternal(match[0])) {
      found.push({ column: match[0], index: match.index ?? 0, length: match[0].length, known: false });
    }
  }

  // longest match wins where mentions overlap
  found.sort((a, b) => a.index - b.index || b.length - a.length);
  const accepted: Mention[] = [];
  let coveredUntil = -1;
  for (const mention of found) {
    if (mention.index < coveredUntil) continue;
    accepted.push(mention);
    coveredUntil = mention.index + mention.length;
  }

  const basis = delayBasisFor(question);
  return accepted.map(mention =>
    mention.column === DELAY_DURATION_FIELDS.dischargePort ? { ...mention, column: DELAY_DURATION_FIELDS[basis] } : mention
  );
}

function resolvePhrase(words: string[], catalog: MetadataCatalog): string | null {
  for (let size = Math.min(3, words.length); size >= 1; size--) {
    const phrase = words.slice(0, size).join('_');
    const column = catalog.resolve(phrase) ?? (phrase.endsWith('s') ? catalog.resolve(phrase.slice(0, -1)) : null);
    if (column) return column;
  }
  return null;
}

function groupColumns(question: string, catalog: MetadataCatalog): { known: string[]; unknown: string[] } {
  const known: string[] = [];
  const unknown: string[] = [];

  for (const match of question.matchAll(GROUP_LEAD)) {
    const words = match[1].trim().split(/\s+/);
    if (words[0] === 'month' || words[0] === 'the' && words[1] === 'month') continue;
    const column = resolvePhrase(words, catalog);
    if (column) {
      if (!known.includes(column)) known.push(column);
    } else if (/_/.test(words[0])) {
      unknown.push(words[0]);
    }
  }
  return { known, unknown };
}

function placeMentioned(question: string, catalog: MetadataCatalog): string | null {
  for (const match of question.matchAll(PLACE_LEAD)) {
    const words: string[] = [];
    for (const word of match[1].split(/\s+/)) {
      if (PLACE_BOUNDARY.has(word)) break;
      words.push(word);
    }
    if (words.length === 0 || NOT_A_PLACE.has(words[0])) continue;
    if (resolvePhrase(words, catalog)) continue;
    return words.join(' ').toUpperCase();
  }
  return null;
}

function pickMetric(question: string, mentions: Mention[], grouped: string[], catalog: MetadataCatalog): PlanMetric {
  const op = OPS.find(([, pattern]) => pattern.test(question))?.[0] ?? 'count';
  if (op === 'count') {
    return { op, alias: 'shipment_count' };
  }

  const candidates = mentions.filter(mention => !grouped.includes(mention.column));
  const fits = (column: string) => {
    const spec = catalog.get(column);
    if (!spec) return false;
    return op === 'sum' || op === 'avg' ? spec.type === 'numeric' : spec.type !== 'categorical';
  };
  const chosen = candidates.find(mention => !mention.known) ?? candidates.find(mention => fits(mention.column));
  if (!chosen) {
    return { op, alias: op };
  }
  return { op, column: chosen.column, alias: `${op}_${chosen.column}` };
}

/**
 * Deterministic drafting from keywords and the catalog's synonyms. Columns the
 * catalog does not know are kept in the plan so validation rejects them.
 */
export function draftPlanFromRules(request: DraftRequest): AnalyticsPlan {
  const { question, entities, catalog } = request;
  const mentions = columnMentions(question, catalog);
  const groups = groupColumns(question, catalog);
  const timeColumn = timeColumnFor(question);

  const groupBy: GroupKey[] = [...groups.known, ...groups.unknown].map(column => ({ column }));
  const filters: PlanPredicate[] = [];
  const subjects: string[] = [];

  const place = placeMentioned(question, catalog);
  if (place) {
    filters.push({ column: 'discharge_port', op: 'eq', value: place });
    if (!groupBy.some(key => key.column === 'discharge_port')) {
      groupBy.push({ column: 'discharge_port' });
    }
    subjects.push(place);
  }

  for (const [pattern, status, label] of STATUS_FILTERS) {
    if (pattern.test(question)) {
      filters.push({ column: 'shipment_status', op: 'eq', value: status });
      subjects.push(label);
    }
  }
  if (/\bdelayed\b/.test(question)) {
    filters.push({ column: DELAY_DURATION_FIELDS[delayBasisFor(question)], op: 'gt', value: 0 });
    subjects.push('delayed');
  }
  if (/\bhot\b/.test(question)) {
    filters.push({ column: 'hot_container_flag', op: 'eq', value: 'Y' });
    subjects.push('hot containers');
  }

  // identifiers and the time window are pushed down with the scope filter
  subjects.push(...allIdentifiers(entities.identifiers));
  if (entities.timeWindow) {
    subjects.push(`the ${entities.timeWindow.label}`);
  }

  const metric = pickMetric(question, mentions, groupBy.map(key => key.column), catalog);
  const plan: AnalyticsPlan = { metric, groupBy, filters, subjects };

  if (TREND.test(question)) {
    const monthKey: GroupKey = { column: timeColumn, bucket: 'month' };
    plan.groupBy = [monthKey, ...groupBy];
    plan.sort = { by: groupKeyName(monthKey), direction: 'asc' };
    plan.chart = 'line';
  } else if (DISTRIBUTION.test(question) && groupBy.length > 0) {
    plan.chart = 'bar';
  }

  const ranking = question.match(RANKING);
  if (ranking) {
    plan.sort = { by: metric.alias, direction: ranking[1] === 'top' ? 'desc' : 'asc' };
    plan.limit = parseInt(ranking[2], 10);
  } else if (!plan.sort && groupBy.length > 0 && /\b(?:highest|longest|most)\b/.test(question)) {
    plan.sort = { by: metric.alias, direction: 'desc' };
  } else if (!plan.sort && groupBy.length > 0 && /\b(?:lowest|shortest|least)\b/.test(question)) {
    plan.sort = { by: metric.alias, direction: 'asc' };
  }

  return plan;
}

/** Second attempt: same plan without the optional ordering, limit and chart. */
export function simplifyPlan(plan: AnalyticsPlan): AnalyticsPlan {
  return { metric: plan.metric, groupBy: plan.groupBy, filters: plan.filters, subjects: plan.subjects };
}

export class RulePlanDrafter implements PlanDrafter {
  readonly name = 'rules';

  async draft(request: DraftRequest, feedback: DraftFeedback | null): Promise<AnalyticsPlan> {
    const plan = draftPlanFromRules(request);
    return feedback ? simplifyPlan(plan) : plan;
  }
}
