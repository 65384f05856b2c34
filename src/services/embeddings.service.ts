import OpenAI from 'openai';
import { config } from '../core/config';
import { logger } from '../core/logger';
import { BackendTimeoutError, ExecutionError, RequestCancelledError, errorMessage } from '../core/errors';
import { CallOptions, EmbeddingProvider } from '../types/capabilities';
import { callWithDeadline } from '../utils/timeout';

export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  private openai: OpenAI;

  constructor(
    apiKey: string = config.openai.apiKey,
    private readonly model: string = config.openai.embeddingModel
  ) {
    this.openai = new OpenAI({ apiKey, baseURL: config.openai.baseUrl, maxRetries: 0 });
  }

  async embedQuery(text: string, options: CallOptions): Promise<number[]> {
    try {
      const response = await callWithDeadline('embedding', options, signal =>
        this.openai.embeddings.create({ model: this.model, input: text }, { signal })
      );
      const [first] = response.data;
      if (!first) {
        throw new ExecutionError('Embedding response was empty');
      }
      return first.embedding;
    } catch (error) {
      if (
        error instanceof BackendTimeoutError ||
        error instanceof RequestCancelledError ||
        error instanceof ExecutionError
      ) {
        throw error;
      }
      logger.error('Embedding generation failed', { error: errorMessage(error) });
      throw new ExecutionError('Failed to generate query embedding');
    }
  }
}
