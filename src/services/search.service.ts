import axios, { AxiosInstance } from 'axios';
import { config } from '../core/config';
import { logger } from '../core/logger';
import {
  BackendTimeoutError,
  ExecutionError,
  RequestCancelledError,
  ScopeResolutionError,
  errorMessage,
} from '../core/errors';
import { matchesTabular } from '../analytics/executor';
import { isScopedSearchExpression } from '../security/filter-builder';
import { FieldValue, Hit, RankingParams, ShipmentRecord, TabularPredicate } from '../types';
import { CallOptions, SearchBackend } from '../types/capabilities';
import { callWithDeadline, withTimeout } from '../utils/timeout';

function isFieldValue(value: unknown): value is FieldValue {
  if (value === null) return true;
  if (Array.isArray(value)) return value.every(item => typeof item === 'string');
  return typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';
}

/** Keeps the scalar and string-list fields of a raw document, drops the rest. */
export function toShipmentRecord(raw: unknown): ShipmentRecord {
  const record: ShipmentRecord = {};
  if (typeof raw !== 'object' || raw === null) return record;
  for (const [key, value] of Object.entries(raw)) {
    if (!key.startsWith('@') && isFieldValue(value)) {
      record[key] = value;
    }
  }
  return record;
}

function assertScoped(expression: string): void {
  if (!isScopedSearchExpression(expression)) {
    throw new ScopeResolutionError('Search filter does not start with the consignee scope');
  }
}

function toHit(record: ShipmentRecord, score: number, idField: string): Hit {
  const id = record[idField];
  const container = record.container_number;
  return {
    docId: typeof id === 'string' ? id : String(id ?? ''),
    containerNumber: typeof container === 'string' && container !== '' ? container : null,
    score,
    record: Object.freeze(record),
  };
}

interface SearchResponseBody {
  value?: unknown[];
}

/**
 * Hybrid keyword + vector search over the shipments index. The filter string
 * is sent as-is after the scope check.
 */
export class AzureSearchBackend implements SearchBackend {
  private client: AxiosInstance;

  constructor(
    private readonly settings: typeof config.search = config.search
  ) {
    this.client = axios.create({
      baseURL: settings.endpoint,
      headers: {
        'api-key': settings.apiKey,
        'Content-Type': 'application/json',
      },
    });
  }

  async search(filterExpression: string, ranking: RankingParams, options: CallOptions): Promise<Hit[]> {
    assertScoped(filterExpression);

    const body: Record<string, unknown> = {
      search: ranking.queryText,
      filter: filterExpression,
      top: ranking.topK,
      queryType: 'simple',
    };
    if (ranking.vector) {
      body.vectorQueries = [
        { kind: 'vector', vector: ranking.vector, fields: this.settings.vectorField, k: ranking.vectorK },
      ];
    }

    try {
      const response = await callWithDeadline('search', options, signal =>
        this.client.post<SearchResponseBody>(`/indexes/${this.settings.indexName}/docs/search`, body, {
          params: { 'api-version': this.settings.apiVersion },
          signal,
        })
      );

      const documents = response.data.value ?? [];
      const hits = documents.map(document => {
        const score = typeof document === 'object' && document !== null && '@search.score' in document
          ? Number(document['@search.score'])
          : 0;
        return toHit(toShipmentRecord(document), score, this.settings.idField);
      });

      logger.debug('Search completed', { hits: hits.length, vector: Boolean(ranking.vector) });
      return hits;
    } catch (error) {
      if (error instanceof BackendTimeoutError || error instanceof RequestCancelledError) throw error;
      logger.error('Search failed', { error: errorMessage(error) });
      throw new ExecutionError(`Search request failed: ${errorMessage(error)}`);
    }
  }
}

const ANY_IN = /^([a-z_]+)\/any\(\w+: search\.in\(\w+, '((?:[^']|'')*)', ','\)\)/;
const IN = /^search\.in\(([a-z_]+), '((?:[^']|'')*)', ','\)/;
const BETWEEN = /^\(([a-z_]+) ge (\d{4}-\d{2}-\d{2})T00:00:00Z and \1 le (\d{4}-\d{2}-\d{2})T23:59:59Z\)/;

function splitValues(joined: string): string[] {
  return joined.split(',').map(value => value.replace(/''/g, "'"));
}

/**
 * Reads back the filter dialect the filter builder writes. Anything else is
 * rejected rather than ignored.
 */
export function parseSearchExpression(expression: string): TabularPredicate {
  const clauses: TabularPredicate[] = [];
  let rest = expression.trim();

  while (rest.length > 0) {
    let match = rest.match(ANY_IN);
    if (match) {
      clauses.push({ kind: 'any-in', column: match[1], values: splitValues(match[2]) });
    } else if ((match = rest.match(IN))) {
      clauses.push({ kind: 'in', column: match[1], values: splitValues(match[2]) });
    } else if ((match = rest.match(BETWEEN))) {
      clauses.push({ kind: 'between', column: match[1], start: match[2], end: match[3] });
    } else {
      throw new ExecutionError('Unsupported filter expression', { at: rest.slice(0, 40) });
    }

    rest = rest.slice(match[0].length).trim();
    if (rest.startsWith('and ')) {
      rest = rest.slice(4).trim();
    } else if (rest.length > 0) {
      throw new ExecutionError('Unsupported filter expression', { at: rest.slice(0, 40) });
    }
  }

  return { kind: 'and', clauses };
}

function keywordScore(record: ShipmentRecord, terms: string[]): number {
  const haystack = Object.values(record)
    .map(value => (Array.isArray(value) ? value.join(' ') : String(value ?? '')))
    .join(' ')
    .toLowerCase();
  return terms.filter(term => haystack.includes(term)).length;
}

/**
 * In-process index for tests and the demo CLI. Applies the scoped filter to
 * every record, then ranks by how many query terms a record mentions.
 */
export class InMemorySearchBackend implements SearchBackend {
  readonly calls: string[] = [];

  constructor(
    private readonly records: readonly ShipmentRecord[],
    private readonly options: { idField?: string; latencyMs?: number } = {}
  ) {}

  async search(filterExpression: string, ranking: RankingParams, options: CallOptions): Promise<Hit[]> {
    assertScoped(filterExpression);
    this.calls.push(filterExpression);

    const work = async (): Promise<Hit[]> => {
      if (this.options.latencyMs) {
        await new Promise(resolve => setTimeout(resolve, this.options.latencyMs));
      }
      const predicate = parseSearchExpression(filterExpression);
      const terms = ranking.queryText.toLowerCase().split(/\s+/).filter(term => term.length > 2);
      const idField = this.options.idField ?? 'document_id';

      return this.records
        .filter(record => matchesTabular(record, predicate))
        .map(record => toHit({ ...record }, keywordScore(record, terms), idField))
        .sort((a, b) => b.score - a.score)
        .slice(0, ranking.topK);
    };

    return withTimeout(work(), options.timeoutMs, 'search', options.signal);
  }
}
