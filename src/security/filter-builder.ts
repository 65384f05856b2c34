import { UnsupportedPredicateError, ScopeResolutionError } from '../core/errors';
import {
  ExtractedEntities,
  IDENTIFIER_KINDS,
  IdentifierKind,
  SearchFilter,
  TabularFilter,
  TabularPredicate,
  TimeWindow,
} from '../types';
import { ScopeSet } from './scope';

export type BackendTag = 'search' | 'tabular';

export interface FieldBinding {
  field: string;
  /** Collection fields are matched with any(). */
  collection: boolean;
}

export type FieldMap = Partial<Record<IdentifierKind, FieldBinding>>;

export const SCOPE_FIELD = 'consignee_codes';

export const SEARCH_FIELDS: FieldMap = {
  container: { field: 'container_number', collection: false },
  purchaseOrder: { field: 'po_numbers', collection: true },
  billOfLading: { field: 'obl_nos', collection: true },
  booking: { field: 'booking_numbers', collection: true },
};

export const TABULAR_FIELDS: FieldMap = {
  container: { field: 'container_number', collection: false },
  purchaseOrder: { field: 'po_numbers', collection: true },
  billOfLading: { field: 'obl_nos', collection: true },
  booking: { field: 'booking_numbers', collection: true },
};

export type FilterEntities = Pick<ExtractedEntities, 'identifiers' | 'timeWindow'>;

export interface FilterOptions {
  fields?: FieldMap;
  /** Date column the time window restricts. Without it the window stays out of the filter. */
  windowField?: string;
}

interface EntityClause {
  kind: IdentifierKind;
  binding: FieldBinding;
  values: string[];
}

/** OData string literal: single quotes doubled. */
function quote(value: string): string {
  return value.replace(/'/g, "''");
}

function requireScope(scope: ScopeSet): string[] {
  const ids = scope.ids;
  if (ids.length === 0) {
    throw new ScopeResolutionError('Refusing to build a filter without scope');
  }
  return ids;
}

function entityClauses(entities: FilterEntities, fields: FieldMap, backend: BackendTag): EntityClause[] {
  const clauses: EntityClause[] = [];
  const seen = new Set<string>();

  for (const kind of IDENTIFIER_KINDS) {
    // an id already constrained under another kind adds nothing
    const values = entities.identifiers[kind].filter(value => {
      if (seen.has(value)) return false;
      seen.add(value);
      return true;
    });
    if (values.length === 0) continue;

    const binding = fields[kind];
    if (!binding) {
      throw new UnsupportedPredicateError(`No ${backend} field for ${kind} identifiers`, { kind, backend });
    }
    clauses.push({ kind, binding, values });
  }

  return clauses;
}

export function scopeSearchPredicate(scope: ScopeSet): string {
  const joined = requireScope(scope).map(quote).join(',');
  return `${SCOPE_FIELD}/any(c: search.in(c, '${joined}', ','))`;
}

function searchClause({ binding, values }: EntityClause): string {
  const joined = values.map(quote).join(',');
  if (binding.collection) {
    return `${binding.field}/any(v: search.in(v, '${joined}', ','))`;
  }
  return `search.in(${binding.field}, '${joined}', ',')`;
}

function searchWindow(field: string, window: TimeWindow): string {
  return `(${field} ge ${window.start}T00:00:00Z and ${field} le ${window.end}T23:59:59Z)`;
}

/**
 * OData filter for the search index. The scope predicate always comes first
 * and every other clause is ANDed onto it.
 */
export function buildSearchFilter(scope: ScopeSet, entities: FilterEntities, options: FilterOptions = {}): SearchFilter {
  const parts = [scopeSearchPredicate(scope)];

  for (const clause of entityClauses(entities, options.fields ?? SEARCH_FIELDS, 'search')) {
    parts.push(searchClause(clause));
  }
  if (options.windowField && entities.timeWindow) {
    parts.push(searchWindow(options.windowField, entities.timeWindow));
  }

  return { backend: 'search', expression: parts.join(' and ') };
}

export function scopeTabularPredicate(scope: ScopeSet): TabularPredicate {
  return { kind: 'any-in', column: SCOPE_FIELD, values: requireScope(scope) };
}

export function buildTabularFilter(scope: ScopeSet, entities: FilterEntities, options: FilterOptions = {}): TabularFilter {
  const clauses: TabularPredicate[] = [scopeTabularPredicate(scope)];

  for (const { binding, values } of entityClauses(entities, options.fields ?? TABULAR_FIELDS, 'tabular')) {
    clauses.push({ kind: binding.collection ? 'any-in' : 'in', column: binding.field, values });
  }
  if (options.windowField && entities.timeWindow) {
    clauses.push({
      kind: 'between',
      column: options.windowField,
      start: entities.timeWindow.start,
      end: entities.timeWindow.end,
    });
  }

  return { backend: 'tabular', predicate: { kind: 'and', clauses } };
}

export function buildFilter(scope: ScopeSet, entities: FilterEntities, backend: 'search', options?: FilterOptions): SearchFilter;
export function buildFilter(scope: ScopeSet, entities: FilterEntities, backend: 'tabular', options?: FilterOptions): TabularFilter;
export function buildFilter(
  scope: ScopeSet,
  entities: FilterEntities,
  backend: BackendTag,
  options: FilterOptions = {}
): SearchFilter | TabularFilter {
  return backend === 'search'
    ? buildSearchFilter(scope, entities, options)
    : buildTabularFilter(scope, entities, options);
}

/** True when the expression opens with the consignee scope predicate. */
export function isScopedSearchExpression(expression: string): boolean {
  return expression.startsWith(`${SCOPE_FIELD}/any(c: search.in(c, '`) && !expression.startsWith(`${SCOPE_FIELD}/any(c: search.in(c, ''`);
}
