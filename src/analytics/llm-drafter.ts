import { logger } from '../core/logger';
import { SYSTEM_PROMPTS } from '../prompts/system-prompts';
import { LLMMessage, LLMService } from '../services/llm.service';
import { AnalyticsPlan } from '../types/analytics';
import { CallOptions } from '../types/capabilities';
import { DraftFeedback, DraftRequest, PlanDrafter } from './drafter';
import { parsePlan } from './validator';

/**
 * Asks a chat model for the plan. The reply is only ever parsed as data;
 * a malformed reply surfaces as PlanFormatError and counts as a failed attempt.
 */
export class LlmPlanDrafter implements PlanDrafter {
  readonly name = 'llm';

  constructor(private readonly llm: LLMService) {}

  async draft(request: DraftRequest, feedback: DraftFeedback | null, options: CallOptions): Promise<AnalyticsPlan> {
    const messages: LLMMessage[] = [
      { role: 'system', content: SYSTEM_PROMPTS.PLAN_DRAFTER(request.catalog) },
      { role: 'user', content: SYSTEM_PROMPTS.PLAN_REQUEST(request.question, request.entities) },
    ];
    if (feedback) {
      messages.push({ role: 'user', content: SYSTEM_PROMPTS.PLAN_CORRECTION(feedback) });
    }

    const raw = await this.llm.chatWithJSON(messages, options);
    const plan = parsePlan(raw);
    logger.debug('Drafted analytics plan', { drafter: this.name, op: plan.metric.op, groups: plan.groupBy.length });
    return plan;
  }
}
