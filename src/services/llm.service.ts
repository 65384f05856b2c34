import axios, { AxiosInstance } from 'axios';
import { jsonrepair } from 'jsonrepair';
import { config } from '../core/config';
import { logger } from '../core/logger';
import { BackendTimeoutError, ExecutionError, PlanFormatError, RequestCancelledError, errorMessage } from '../core/errors';
import { CallOptions } from '../types/capabilities';
import { callWithDeadline } from '../utils/timeout';

export interface LLMMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface LLMResponse {
  content: string;
  model: string;
  usage?: {
    promptTokens: number;
    completionTokens: number;
    totalTokens: number;
  };
}

export interface LLMOptions {
  model?: string;
  temperature?: number;
  maxTokens?: number;
}

interface ChatCompletionBody {
  model?: string;
  choices?: Array<{ message?: { content?: string | null } }>;
  usage?: { prompt_tokens: number; completion_tokens: number; total_tokens: number };
}

/**
 * First JSON object in a model reply. Tolerates prose or code fences around
 * it and repairs trailing commas, single quotes and similar slips.
 */
export function extractJson(content: string): unknown {
  try {
    return JSON.parse(content);
  } catch {
    const first = content.indexOf('{');
    const last = content.lastIndexOf('}');
    if (first === -1 || last <= first) {
      throw new PlanFormatError('Model reply contains no JSON object');
    }
    try {
      return JSON.parse(jsonrepair(content.substring(first, last + 1)));
    } catch (repairError) {
      throw new PlanFormatError('Model reply is not valid JSON', { reason: errorMessage(repairError) });
    }
  }
}

export class LLMService {
  private client: AxiosInstance;

  constructor(apiKey: string = config.openai.apiKey, baseUrl: string = config.openai.baseUrl || 'https://api.openai.com/v1') {
    this.client = axios.create({
      baseURL: baseUrl,
      headers: {
        Authorization: `Bearer ${apiKey}`,
        'Content-Type': 'application/json',
      },
    });
  }

  async chat(messages: LLMMessage[], callOptions: CallOptions, options: LLMOptions = {}): Promise<LLMResponse> {
    const model = options.model || config.openai.plannerModel;
    const payload = {
      model,
      messages,
      temperature: options.temperature ?? 0,
      max_tokens: options.maxTokens ?? 1500,
    };

    logger.debug('LLM Request', { model, messageCount: messages.length });

    try {
      const response = await callWithDeadline(`LLM request for ${model}`, callOptions, signal =>
        this.client.post<ChatCompletionBody>('/chat/completions', payload, { signal })
      );
      const body = response.data;
      const content = body.choices?.[0]?.message?.content ?? '';

      logger.debug('LLM Response', { model, contentLength: content.length, tokens: body.usage?.total_tokens });

      return {
        content,
        model: body.model ?? model,
        usage: body.usage
          ? {
              promptTokens: body.usage.prompt_tokens,
              completionTokens: body.usage.completion_tokens,
              totalTokens: body.usage.total_tokens,
            }
          : undefined,
      };
    } catch (error) {
      if (error instanceof BackendTimeoutError || error instanceof RequestCancelledError) throw error;
      logger.error('LLM Error', { error: errorMessage(error) });
      throw new ExecutionError(`LLM request failed: ${errorMessage(error)}`);
    }
  }

  async chatWithJSON(messages: LLMMessage[], callOptions: CallOptions, options: LLMOptions = {}): Promise<unknown> {
    const response = await this.chat(messages, callOptions, options);
    return extractJson(response.content);
  }
}
