import fs from 'fs';
import path from 'path';
import { InMemoryHierarchy } from '../../services/hierarchy.service';
import { toShipmentRecord } from '../../services/search.service';
import { ScopeSet, resolveScope } from '../../security/scope';
import { ExtractedEntities, Hit, IdentifierSet, ShipmentRecord, TimeWindow, emptyIdentifiers } from '../../types';

export function loadShipments(): ShipmentRecord[] {
  const raw: unknown = JSON.parse(fs.readFileSync(path.join(__dirname, 'shipments.json'), 'utf-8'));
  return Array.isArray(raw) ? raw.map(toShipmentRecord) : [];
}

/** The consignee hierarchy shipped in data/. */
export function loadHierarchy(): InMemoryHierarchy {
  return InMemoryHierarchy.fromFile(path.resolve(__dirname, '../../../data/consignee-hierarchy.json'));
}

export function scopeFor(...consigneeIds: string[]): Promise<ScopeSet> {
  return resolveScope({ consigneeIds }, loadHierarchy());
}

export function entities(
  identifiers: Partial<IdentifierSet> = {},
  timeWindow: TimeWindow | null = null
): ExtractedEntities {
  return { identifiers: { ...emptyIdentifiers(), ...identifiers }, timeWindow, identifierSource: 'text' };
}

export function hitFor(record: ShipmentRecord, score = 1): Hit {
  const id = record.document_id;
  const container = record.container_number;
  return {
    docId: typeof id === 'string' ? id : '',
    containerNumber: typeof container === 'string' ? container : null,
    score,
    record,
  };
}

export function shipment(documentId: string): ShipmentRecord {
  const found = loadShipments().find(record => record.document_id === documentId);
  if (!found) throw new Error(`No fixture shipment ${documentId}`);
  return found;
}
