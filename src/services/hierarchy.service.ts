import fs from 'fs';
import path from 'path';
import mongoose from 'mongoose';
import { config } from '../core/config';
import { logger } from '../core/logger';
import { ValidationError } from '../core/errors';
import { ConsigneeNode, IConsigneeNode } from '../models/ConsigneeNode';
import { HierarchyLookup } from '../types/capabilities';

const DEFAULT_HIERARCHY_PATH = path.resolve(__dirname, '../../data/consignee-hierarchy.json');

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** `{nodes: [{id, children}]}` -> parent id -> child ids. */
export function parseHierarchy(raw: unknown): Map<string, string[]> {
  if (!isRecord(raw) || !Array.isArray(raw.nodes)) {
    throw new ValidationError('Hierarchy must have a "nodes" list');
  }

  const nodes = new Map<string, string[]>();
  for (const node of raw.nodes) {
    if (!isRecord(node) || typeof node.id !== 'string') {
      throw new ValidationError('Hierarchy node needs a string id');
    }
    const children = Array.isArray(node.children)
      ? node.children.filter((child): child is string => typeof child === 'string')
      : [];
    nodes.set(node.id, children);
  }
  return nodes;
}

/** Snapshot held in memory; children of a known node are always known too. */
export class InMemoryHierarchy implements HierarchyLookup {
  private readonly nodes: ReadonlyMap<string, readonly string[]>;

  constructor(nodes: Map<string, string[]>) {
    for (const children of Array.from(nodes.values())) {
      for (const child of children) {
        if (!nodes.has(child)) nodes.set(child, []);
      }
    }
    this.nodes = nodes;
  }

  static fromFile(filePath: string = config.scope.hierarchyPath || DEFAULT_HIERARCHY_PATH): InMemoryHierarchy {
    const raw: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    const hierarchy = new InMemoryHierarchy(parseHierarchy(raw));
    logger.debug('Loaded consignee hierarchy', { nodes: hierarchy.size, file: path.basename(filePath) });
    return hierarchy;
  }

  get size(): number {
    return this.nodes.size;
  }

  async expand(consigneeId: string): Promise<ReadonlySet<string> | null> {
    const children = this.nodes.get(consigneeId);
    return children ? new Set(children) : null;
  }
}

export class MongoHierarchy implements HierarchyLookup {
  constructor(private readonly model: mongoose.Model<IConsigneeNode> = ConsigneeNode) {}

  async expand(consigneeId: string): Promise<ReadonlySet<string> | null> {
    const node = await this.model.findOne({ consigneeId }).lean().exec();
    return node ? new Set(node.children) : null;
  }
}
