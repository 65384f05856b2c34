import { getCatalog } from '../analytics/catalog';
import { LlmPlanDrafter } from '../analytics/llm-drafter';
import { PlanFormatError, SchemaViolationError } from '../core/errors';
import { LLMService, extractJson } from '../services/llm.service';
import { entities } from './fixtures';

describe('extractJson', () => {
  test('parses a bare object', () => {
    expect(extractJson('{"metric":{"op":"count"}}')).toEqual({ metric: { op: 'count' } });
  });

  test('finds the object inside prose and code fences', () => {
    const reply = 'Here is the plan:\n```json\n{"metric": {"op": "avg", "column": "dp_delayed_dur"}}\n```';
    expect(extractJson(reply)).toEqual({ metric: { op: 'avg', column: 'dp_delayed_dur' } });
  });

  test('repairs trailing commas and single quotes', () => {
    expect(extractJson("{'groupBy': ['discharge_port',],}")).toEqual({ groupBy: ['discharge_port'] });
  });

  test('a reply without an object is a plan format error', () => {
    expect(() => extractJson('I cannot help with that.')).toThrow(PlanFormatError);
  });
});

describe('LlmPlanDrafter', () => {
  const catalog = getCatalog();
  const request = { question: 'average delay by carrier', entities: entities(), catalog };
  const call = { timeoutMs: 1000 };

  afterEach(() => {
    jest.restoreAllMocks();
  });

  test('parses the model reply into a plan', async () => {
    const llm = new LLMService('test-secret', 'http://localhost:9');
    const spy = jest.spyOn(llm, 'chatWithJSON').mockResolvedValue({
      metric: { op: 'avg', column: 'dp_delayed_dur' },
      groupBy: ['final_carrier_name'],
    });

    const plan = await new LlmPlanDrafter(llm).draft(request, null, call);

    expect(plan).toEqual({
      metric: { op: 'avg', column: 'dp_delayed_dur', alias: 'avg_dp_delayed_dur' },
      groupBy: [{ column: 'final_carrier_name' }],
      filters: [],
      subjects: [],
    });
    const [messages, options] = spy.mock.calls[0];
    expect(messages.map(message => message.role)).toEqual(['system', 'user']);
    expect(messages[1].content).toBe('Question: average delay by carrier');
    expect(options).toBe(call);
  });

  test('a regeneration carries the failure back to the model', async () => {
    const llm = new LLMService('test-secret', 'http://localhost:9');
    const spy = jest.spyOn(llm, 'chatWithJSON').mockResolvedValue({ metric: { op: 'count' } });
    const feedback = {
      attempt: 1,
      error: new SchemaViolationError('Column "cargo_volume_liters" is not in the catalog'),
      previous: null,
    };

    await new LlmPlanDrafter(llm).draft(request, feedback, call);

    const [messages] = spy.mock.calls[0];
    expect(messages).toHaveLength(3);
    expect(messages[2].content).toContain('Your previous plan failed: Column "cargo_volume_liters" is not in the catalog');
  });

  test('a reply that is not a plan is rejected', async () => {
    const llm = new LLMService('test-secret', 'http://localhost:9');
    jest.spyOn(llm, 'chatWithJSON').mockResolvedValue({ answer: 42 });

    await expect(new LlmPlanDrafter(llm).draft(request, null, call)).rejects.toBeInstanceOf(PlanFormatError);
  });
});
