import { Hit, RankingParams } from '.';
import { CompiledPipeline, Table } from './analytics';
import { SessionSlots } from './graph';

/** Deadline and cancellation handed to every backend call. */
export interface CallOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

export interface SearchBackend {
  search(filterExpression: string, ranking: RankingParams, options: CallOptions): Promise<Hit[]>;
}

export interface TabularBackend {
  execute(pipeline: CompiledPipeline, options: CallOptions): Promise<Table>;
}

export interface EmbeddingProvider {
  embedQuery(text: string, options: CallOptions): Promise<number[]>;
}

export interface SessionStore {
  get(conversationId: string): Promise<SessionSlots | null>;
  set(conversationId: string, slots: SessionSlots): Promise<void>;
}

/**
 * Children of a consignee in the hierarchy snapshot.
 * Resolves to null when the consignee is unknown.
 */
export interface HierarchyLookup {
  expand(consigneeId: string): Promise<ReadonlySet<string> | null>;
}
