import {
  DELAY_BASIS_LABELS,
  DELAY_DURATION_FIELDS,
  ETA_FIELDS,
  LOCATION_FIELDS,
  delayBasisFor,
} from '../core/constants';
import { NOTICE_TEMPLATES, RESPONSE_TEMPLATES } from '../prompts/templates';
import {
  AnswerFragment,
  Evidence,
  ExtractedEntities,
  FieldValue,
  HandlerOutput,
  Hit,
  IDENTIFIER_KINDS,
  IdentifierKind,
  RetrievalHandlerKind,
  TableSpec,
} from '../types';
import { assertNever } from '../graph/nodes/router';

export interface HandlerInput {
  hits: readonly Hit[];
  entities: ExtractedEntities;
  /** Normalized question text. */
  question: string;
}

export type RetrievalHandler = (input: HandlerInput) => HandlerOutput;

interface Described {
  hit: Hit;
  subject: string;
  fields: string[];
  sentence: string;
  row: Record<string, FieldValue>;
}

const RECORD_FIELD: Record<IdentifierKind, string> = {
  container: 'container_number',
  purchaseOrder: 'po_numbers',
  billOfLading: 'obl_nos',
  booking: 'booking_numbers',
};

const KIND_LABEL: Record<IdentifierKind, string> = {
  container: 'container',
  purchaseOrder: 'PO',
  billOfLading: 'bill of lading',
  booking: 'booking',
};

function text(value: FieldValue | undefined): string | null {
  if (value === null || value === undefined) return null;
  if (Array.isArray(value)) return value.length > 0 ? value.join(', ') : null;
  const rendered = String(value).trim();
  return rendered === '' ? null : rendered;
}

function dateText(value: FieldValue | undefined): string | null {
  const rendered = text(value);
  return rendered && /^\d{4}-\d{2}-\d{2}/.test(rendered) ? rendered.slice(0, 10) : rendered;
}

function firstPresent(hit: Hit, fields: readonly string[]): { field: string; value: string } | null {
  for (const field of fields) {
    const value = text(hit.record[field]);
    if (value) return { field, value };
  }
  return null;
}

function hitMatches(hit: Hit, kind: IdentifierKind, id: string): boolean {
  if (kind === 'container') {
    return hit.containerNumber === id || hit.record.container_number === id;
  }
  const value = hit.record[RECORD_FIELD[kind]];
  return Array.isArray(value) ? value.includes(id) : value === id;
}

function label(hit: Hit): string {
  return hit.containerNumber ? `Container ${hit.containerNumber}` : `Shipment ${hit.docId}`;
}

function snippet(hit: Hit, fields: string[]): Record<string, FieldValue> {
  const picked: Record<string, FieldValue> = {};
  for (const field of fields) {
    picked[field] = hit.record[field] ?? null;
  }
  return picked;
}

/**
 * Shared skeleton: match hits to requested identifiers, describe each distinct
 * hit once, report identifiers nothing matched, tabulate when several rows.
 */
function interpret(input: HandlerInput, title: string, describe: (hit: Hit) => Omit<Described, 'hit' | 'subject'>): HandlerOutput {
  const { hits, entities } = input;

  if (hits.length === 0) {
    const subjects = IDENTIFIER_KINDS.flatMap(kind => entities.identifiers[kind]);
    return {
      fragments: [
        {
          text: RESPONSE_TEMPLATES.COULDNT_FIND(subjects.join(', ') || 'your question'),
          evidenceIds: [],
          subject: subjects.join(', '),
          factual: false,
        },
      ],
      evidence: [],
      notices: [{ code: 'no-matching-shipments', message: NOTICE_TEMPLATES.NO_MATCHING_SHIPMENTS() }],
    };
  }

  const selected = new Map<string, Hit>();
  const missing: string[] = [];

  for (const kind of IDENTIFIER_KINDS) {
    for (const id of entities.identifiers[kind]) {
      const matched = hits.filter(hit => hitMatches(hit, kind, id));
      if (matched.length === 0) {
        missing.push(`${KIND_LABEL[kind]} ${id}`);
      }
      for (const hit of matched) {
        if (!selected.has(hit.docId)) selected.set(hit.docId, hit);
      }
    }
  }

  // nothing lined up with a requested id: describe the best-ranked hit
  if (selected.size === 0) {
    selected.set(hits[0].docId, hits[0]);
  }

  const described: Described[] = Array.from(selected.values()).map(hit => ({
    hit,
    subject: hit.containerNumber ?? hit.docId,
    ...describe(hit),
  }));

  const fragments: AnswerFragment[] = described.map(item => ({
    text: item.sentence,
    evidenceIds: [item.hit.docId],
    subject: item.subject,
    factual: true,
  }));
  for (const subject of missing) {
    fragments.push({ text: RESPONSE_TEMPLATES.COULDNT_FIND(subject), evidenceIds: [], subject, factual: false });
  }

  const evidence: Evidence[] = described.map(item => ({
    sourceId: item.hit.docId,
    ...(item.hit.containerNumber ? { containerNumber: item.hit.containerNumber } : {}),
    fieldsUsed: item.fields,
    snippet: snippet(item.hit, item.fields),
  }));

  let table: TableSpec | undefined;
  if (described.length > 1) {
    const columns = Object.keys(described[0].row);
    table = {
      title,
      columns,
      rows: described.map(item => {
        const row: Record<string, FieldValue> = {};
        for (const column of columns) row[column] = item.row[column] ?? null;
        return row;
      }),
    };
  }

  return { fragments, evidence, notices: [], ...(table ? { table } : {}) };
}

export const statusHandler: RetrievalHandler = input =>
  interpret(input, 'Shipment status', hit => {
    const status = text(hit.record.shipment_status);
    const location = firstPresent(hit, LOCATION_FIELDS);
    const fields = ['shipment_status', ...(location ? [location.field] : [])];

    let sentence: string;
    if (status && location) {
      sentence = `${label(hit)} is ${status}; its latest reported location is ${location.value}.`;
    } else if (status) {
      sentence = `${label(hit)} is ${status}; no location has been reported yet.`;
    } else if (location) {
      sentence = `${label(hit)} was last reported at ${location.value}.`;
    } else {
      sentence = `${label(hit)} has no status or location on record yet.`;
    }

    return {
      fields,
      sentence,
      row: { container: hit.containerNumber, status, location: location?.value ?? null },
    };
  });

export const etaWindowHandler: RetrievalHandler = input =>
  interpret(input, 'Estimated arrival', hit => {
    const basis = delayBasisFor(input.question);
    const place = basis === 'finalDestination' ? text(hit.record.final_destination) : text(hit.record.discharge_port);
    const eta = firstPresent(hit, ETA_FIELDS[basis]);
    const window = input.entities.timeWindow;
    const where = `the ${DELAY_BASIS_LABELS[basis]}${place ? ` (${place})` : ''}`;

    if (!eta) {
      return {
        fields: [...ETA_FIELDS[basis]],
        sentence: `${label(hit)} has no arrival date at ${where} on record yet.`,
        row: { container: hit.containerNumber, eta: null, in_window: null },
      };
    }

    const day = eta.value.slice(0, 10);
    const inWindow = window ? day >= window.start && day <= window.end : null;
    let sentence = `${label(hit)} is expected at ${where} on ${day}`;
    if (window) {
      sentence += inWindow ? `, within the ${window.label}.` : `, outside the ${window.label}.`;
    } else {
      sentence += '.';
    }

    return {
      fields: [eta.field, basis === 'finalDestination' ? 'final_destination' : 'discharge_port'],
      sentence,
      row: { container: hit.containerNumber, eta: day, in_window: inWindow },
    };
  });

export const delayReasonHandler: RetrievalHandler = input =>
  interpret(input, 'Delays', hit => {
    const basis = delayBasisFor(input.question);
    const durationField = DELAY_DURATION_FIELDS[basis];
    const raw = hit.record[durationField];
    const days = typeof raw === 'number' ? raw : null;
    const reason = text(hit.record.delay_reason_summary);
    const where = `the ${DELAY_BASIS_LABELS[basis]}`;
    const fields = [durationField, 'delay_reason_summary'];

    let sentence: string;
    if (days === null) {
      sentence = `${label(hit)} has no delay figure recorded at ${where}.`;
    } else if (days <= 0) {
      sentence = `${label(hit)} is not delayed at ${where}.`;
    } else {
      sentence = `${label(hit)} is delayed ${days} day${days === 1 ? '' : 's'} at ${where}.`;
      if (reason) sentence += ` Reason: ${reason}.`;
    }

    return {
      fields,
      sentence: sentence.replace(/\.\.$/, '.'),
      row: { container: hit.containerNumber, delay_days: days, reason },
    };
  });

export const routeHandler: RetrievalHandler = input =>
  interpret(input, 'Routing', hit => {
    const legs = ['load_port', 'final_load_port', 'discharge_port', 'final_destination'];
    const stops: string[] = [];
    const fields: string[] = [];
    for (const field of legs) {
      const value = text(hit.record[field]);
      if (value && stops[stops.length - 1] !== value) {
        stops.push(value);
        fields.push(field);
      }
    }
    const vessel = firstPresent(hit, ['final_vessel_name', 'first_vessel_name']);
    if (vessel) fields.push(vessel.field);

    let sentence = stops.length > 0
      ? `${label(hit)} routes ${stops.join(' -> ')}`
      : `${label(hit)} has no routing on record yet`;
    sentence += vessel ? `, on vessel ${vessel.value}.` : '.';

    return {
      fields,
      sentence,
      row: { container: hit.containerNumber, route: stops.join(' -> ') || null, vessel: vessel?.value ?? null },
    };
  });

export function selectHandler(kind: RetrievalHandlerKind): RetrievalHandler {
  switch (kind) {
    case 'status':
      return statusHandler;
    case 'eta-window':
      return etaWindowHandler;
    case 'delay-reason':
      return delayReasonHandler;
    case 'route':
      return routeHandler;
    default:
      return assertNever(kind);
  }
}
