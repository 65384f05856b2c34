import { config } from '../core/config';
import { ANALYTICS_RESULT_NAME } from '../core/constants';
import { PlanFormatError, ScopeResolutionError } from '../core/errors';
import { SCOPE_FIELD } from '../security/filter-builder';
import { TabularFilter } from '../types';
import { CompiledPipeline, GroupKey, PipelineStage } from '../types/analytics';
import { ValidatedPlan } from './validator';

export interface CompileOptions {
  defaultLimit?: number;
  maxLimit?: number;
}

/** Output column name of a grouping key. */
export function groupKeyName(key: GroupKey): string {
  return key.bucket === 'month' ? `${key.column}_month` : key.column;
}

function assertScopeFirst(scopeFilter: TabularFilter): void {
  const [first] = scopeFilter.predicate.clauses;
  if (!first || first.kind !== 'any-in' || first.column !== SCOPE_FIELD || first.values.length === 0) {
    throw new ScopeResolutionError('Analytics pipeline requires the consignee scope as its first clause');
  }
}

/**
 * Validated plan -> fixed stage list: scope, filter, group, sort, limit, project.
 * The result is plain data; nothing in it is evaluated as code.
 */
export function compilePlan(
  validated: ValidatedPlan,
  scopeFilter: TabularFilter,
  options: CompileOptions = {}
): CompiledPipeline {
  const { plan } = validated;
  const defaultLimit = options.defaultLimit ?? config.analytics.defaultRowLimit;
  const maxLimit = options.maxLimit ?? config.analytics.maxRowLimit;

  assertScopeFirst(scopeFilter);

  const keyNames = plan.groupBy.map(groupKeyName);
  if (keyNames.includes(plan.metric.alias)) {
    throw new PlanFormatError(`Metric alias "${plan.metric.alias}" collides with a grouping column`);
  }
  const columns = [...keyNames, plan.metric.alias];

  const stages: PipelineStage[] = [{ stage: 'scope', filter: scopeFilter }];

  if (plan.filters.length > 0) {
    stages.push({ stage: 'filter', predicates: [...plan.filters] });
  }

  stages.push({ stage: 'group', keys: [...plan.groupBy], aggregate: { ...plan.metric } });

  if (plan.sort) {
    if (!columns.includes(plan.sort.by)) {
      throw new PlanFormatError(`Cannot sort by "${plan.sort.by}"; output columns are ${columns.join(', ')}`);
    }
    stages.push({ stage: 'sort', by: plan.sort.by, direction: plan.sort.direction });
  }

  const limit = plan.limit ?? defaultLimit;
  if (limit < 1) {
    throw new PlanFormatError(`Row limit must be positive, got ${limit}`);
  }
  stages.push({ stage: 'limit', count: Math.min(limit, maxLimit) });
  stages.push({ stage: 'project', columns });

  return Object.freeze({
    resultName: ANALYTICS_RESULT_NAME,
    stages: Object.freeze(stages),
    columns,
  });
}
