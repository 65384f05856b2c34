import { logger } from '../core/logger';
import { ScopeResolutionError } from '../core/errors';
import { HierarchyLookup } from '../types/capabilities';
import { Principal } from '../types';
import { maskIdentifiers } from '../utils/security';

const RESOLVER_TOKEN = Symbol('scope-resolver');

/**
 * Closed set of consignee ids the current principal may see.
 * Only `resolveScope` can build one; request payload fields never reach it.
 */
export class ScopeSet {
  private readonly members: ReadonlySet<string>;

  constructor(token: typeof RESOLVER_TOKEN, ids: Iterable<string>) {
    if (token !== RESOLVER_TOKEN) {
      throw new ScopeResolutionError('ScopeSet can only be built by the scope resolver');
    }
    this.members = new Set(ids);
    Object.freeze(this);
  }

  get size(): number {
    return this.members.size;
  }

  has(id: string): boolean {
    return this.members.has(id);
  }

  /** Sorted, so filter expressions are stable across requests. */
  get ids(): string[] {
    return Array.from(this.members).sort();
  }

  isSupersetOf(other: ScopeSet): boolean {
    return other.ids.every(id => this.members.has(id));
  }
}

/**
 * Expands each declared consignee to itself plus every descendant.
 * Any unknown consignee fails the whole request; there is no partial scope.
 */
export async function resolveScope(principal: Principal, hierarchy: HierarchyLookup): Promise<ScopeSet> {
  const declared = principal.consigneeIds.map(id => id.trim()).filter(Boolean);

  if (declared.length === 0) {
    throw new ScopeResolutionError('Principal declares no consignee ids');
  }

  const resolved = new Set<string>();
  const queue: string[] = [];

  for (const id of declared) {
    const children = await hierarchy.expand(id);
    if (children === null) {
      logger.warn('Scope resolution rejected unknown consignee', {
        consignee: maskIdentifiers([id])[0],
      });
      throw new ScopeResolutionError('Principal has no valid consignee mapping', { consigneeId: id });
    }
    if (!resolved.has(id)) {
      resolved.add(id);
      queue.push(...children);
    }
  }

  while (queue.length > 0) {
    const id = queue.shift();
    if (id === undefined || resolved.has(id)) continue;
    resolved.add(id);
    const children = await hierarchy.expand(id);
    if (children) queue.push(...children);
  }

  logger.info('Resolved consignee scope', {
    declared: declared.length,
    resolved: resolved.size,
  });

  return new ScopeSet(RESOLVER_TOKEN, resolved);
}
