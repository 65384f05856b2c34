import { config } from '../core/config';
import { logger } from '../core/logger';
import { MetadataCatalog, getCatalog } from '../analytics/catalog';
import { PlanDrafter, RulePlanDrafter } from '../analytics/drafter';
import { LlmPlanDrafter } from '../analytics/llm-drafter';
import { OpenAIEmbeddingProvider } from '../services/embeddings.service';
import { InMemoryHierarchy, MongoHierarchy } from '../services/hierarchy.service';
import { LLMService } from '../services/llm.service';
import { AzureSearchBackend } from '../services/search.service';
import { MongoSessionStore, SessionMemory } from '../services/session.service';
import { MongoTabularBackend } from '../services/tabular.service';
import { EmbeddingProvider, HierarchyLookup, SearchBackend, TabularBackend } from '../types/capabilities';

export interface StageTimeouts {
  searchMs: number;
  tabularMs: number;
  llmMs: number;
  totalMs: number;
}

/** Everything the pipeline talks to. Tests pass in-process stand-ins. */
export interface PipelineDeps {
  search: SearchBackend;
  tabular: TabularBackend;
  embeddings: EmbeddingProvider | null;
  drafter: PlanDrafter;
  catalog: MetadataCatalog;
  hierarchy: HierarchyLookup;
  memory: SessionMemory;
  timeouts: StageTimeouts;
}

export function defaultTimeouts(): StageTimeouts {
  return {
    searchMs: config.execution.searchTimeout,
    tabularMs: config.execution.tabularTimeout,
    llmMs: config.execution.llmTimeout,
    totalMs: config.execution.totalTimeout,
  };
}

/** Production wiring from `config`. Expects mongoose to be connected. */
export function createDefaultDeps(): PipelineDeps {
  const drafter: PlanDrafter =
    config.analytics.drafter === 'llm' ? new LlmPlanDrafter(new LLMService()) : new RulePlanDrafter();
  const hierarchy: HierarchyLookup = config.scope.hierarchyPath
    ? InMemoryHierarchy.fromFile(config.scope.hierarchyPath)
    : new MongoHierarchy();

  logger.info('Pipeline dependencies created', {
    drafter: drafter.name,
    embeddings: Boolean(config.openai.apiKey),
    hierarchy: config.scope.hierarchyPath ? 'file' : 'mongodb',
  });

  return {
    search: new AzureSearchBackend(),
    tabular: new MongoTabularBackend(),
    embeddings: config.openai.apiKey ? new OpenAIEmbeddingProvider() : null,
    drafter,
    catalog: getCatalog(),
    hierarchy,
    memory: new SessionMemory(new MongoSessionStore()),
    timeouts: defaultTimeouts(),
  };
}
