import fs from 'fs';
import path from 'path';
import { logger } from '../core/logger';
import { DEFAULT_DELAY_BASIS, DELAY_DURATION_FIELDS } from '../core/constants';
import { ValidationError } from '../core/errors';
import { CatalogOp, ColumnSpec, ColumnType } from '../types/analytics';

const DEFAULT_CATALOG_PATH = path.resolve(__dirname, '../../data/analytics-catalog.json');

const OPS_BY_TYPE: Record<ColumnType, CatalogOp[]> = {
  numeric: ['select', 'filter', 'sort', 'sum', 'avg', 'min', 'max', 'count'],
  datetime: ['select', 'filter', 'group', 'sort', 'min', 'max', 'count'],
  categorical: ['select', 'filter', 'group', 'sort', 'count'],
};

// list columns can be matched and counted, not grouped or ordered
const LIST_OPS: CatalogOp[] = ['select', 'filter', 'count'];

const COLUMN_TYPES: readonly ColumnType[] = ['numeric', 'datetime', 'categorical'];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isColumnType(value: unknown): value is ColumnType {
  return typeof value === 'string' && COLUMN_TYPES.some(type => type === value);
}

function stringArray(value: unknown, where: string): string[] {
  if (!Array.isArray(value) || !value.every(item => typeof item === 'string')) {
    throw new ValidationError(`Catalog ${where} must be a list of strings`);
  }
  return value;
}

/**
 * Column name -> {type, allowed operations}. Built once, read-only afterwards.
 */
export class MetadataCatalog {
  private readonly columns: ReadonlyMap<string, ColumnSpec>;
  private readonly synonyms: ReadonlyMap<string, string>;
  private readonly internal: ReadonlySet<string>;

  constructor(columns: Map<string, ColumnSpec>, synonyms: Map<string, string>, internal: Set<string>) {
    for (const name of internal) {
      columns.delete(name);
    }
    for (const [term, column] of synonyms) {
      if (!columns.has(column)) synonyms.delete(term);
    }
    this.columns = columns;
    this.synonyms = synonyms;
    this.internal = internal;
    Object.freeze(this);
  }

  has(name: string): boolean {
    return this.columns.has(name);
  }

  get(name: string): ColumnSpec | undefined {
    return this.columns.get(name);
  }

  isInternal(name: string): boolean {
    return this.internal.has(name);
  }

  /** Exposed column names, catalog order. */
  names(): string[] {
    return Array.from(this.columns.keys());
  }

  /**
   * Maps a user term to a column: a synonym, or the column name itself
   * ("cargo weight kg" and "cargo_weight_kg" both resolve).
   */
  resolve(term: string): string | null {
    const key = term.trim().toLowerCase().replace(/[\s-]+/g, '_');
    if (this.columns.has(key)) return key;
    return this.synonyms.get(key) ?? null;
  }

  synonymTerms(): string[] {
    return Array.from(this.synonyms.keys());
  }

  allows(name: string, op: CatalogOp): boolean {
    return this.columns.get(name)?.allowedOps.has(op) ?? false;
  }

  label(name: string): string {
    return this.columns.get(name)?.label ?? name;
  }

  /** One line per column, for the plan drafting prompt. */
  describe(): string {
    return this.names()
      .map(name => {
        const spec = this.columns.get(name);
        if (!spec) return name;
        const ops = Array.from(spec.allowedOps).join('|');
        return `- ${name} (${spec.type}${spec.list ? ', list' : ''}; ${ops}): ${spec.description}`;
      })
      .join('\n');
  }
}

export function parseCatalog(raw: unknown): MetadataCatalog {
  if (!isRecord(raw) || !isRecord(raw.columns)) {
    throw new ValidationError('Catalog must have a "columns" object');
  }

  const columns = new Map<string, ColumnSpec>();
  for (const [name, entry] of Object.entries(raw.columns)) {
    if (!isRecord(entry) || !isColumnType(entry.type)) {
      throw new ValidationError(`Catalog column "${name}" has no valid type`, { column: name });
    }
    const list = entry.list === true;
    columns.set(name, {
      type: entry.type,
      list,
      allowedOps: new Set(list ? LIST_OPS : OPS_BY_TYPE[entry.type]),
      label: typeof entry.label === 'string' ? entry.label : name,
      description: typeof entry.description === 'string' ? entry.description : '',
    });
  }

  const synonyms = new Map<string, string>();
  if (isRecord(raw.synonyms)) {
    for (const [term, column] of Object.entries(raw.synonyms)) {
      if (typeof column === 'string') synonyms.set(term, column);
    }
  }

  const delayField = DELAY_DURATION_FIELDS[DEFAULT_DELAY_BASIS];
  synonyms.set('delay', delayField);
  synonyms.set('delays', delayField);
  synonyms.set('delay_days', delayField);
  synonyms.set('delivery_delay', DELAY_DURATION_FIELDS.finalDestination);

  const internal = new Set(raw.internal === undefined ? [] : stringArray(raw.internal, 'internal'));

  return new MetadataCatalog(columns, synonyms, internal);
}

export function loadCatalog(filePath: string = DEFAULT_CATALOG_PATH): MetadataCatalog {
  const raw: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  const catalog = parseCatalog(raw);
  logger.debug('Loaded analytics catalog', { columns: catalog.names().length, file: path.basename(filePath) });
  return catalog;
}

let defaultCatalog: MetadataCatalog | null = null;

export function getCatalog(): MetadataCatalog {
  if (!defaultCatalog) {
    defaultCatalog = loadCatalog();
  }
  return defaultCatalog;
}
