/**
 * OpenAI Integration
 *
 * Embedding and chat-completion clients behind the EmbeddingClient and
 * TextGenerator contracts. Built once per process by createOpenAiClients()
 * and injected where needed.
 */

import OpenAI from 'openai';
import { config as defaultConfig, type Config } from '../config';
import { logger } from '../logger';
import { UpstreamCapabilityError } from '../errors';
import {
  llmRequestsCounter,
  llmRequestDurationHistogram,
  embeddingRequestsCounter,
} from '../metrics';
import type { EmbeddingClient, TextGenerator } from './types';

export class OpenAiEmbedder implements EmbeddingClient {
  readonly model: string;

  constructor(
    private readonly openai: OpenAI,
    model: string,
    private readonly dimensions: number
  ) {
    this.model = model;
  }

  async embed(text: string): Promise<number[]> {
    const startTime = Date.now();

    try {
      const response = await this.openai.embeddings.create({
        model: this.model,
        input: text,
        dimensions: this.dimensions,
      });

      const embedding = response.data[0]?.embedding;
      if (!embedding || embedding.length === 0) {
        throw new UpstreamCapabilityError('embedding', 'empty_completion', 'Empty embedding response from OpenAI');
      }

      embeddingRequestsCounter.inc({ model: this.model, status: 'success' });
      logger.debug('Embedding complete', {
        model: this.model,
        dimensions: embedding.length,
        duration_ms: Date.now() - startTime,
      });

      return embedding;
    } catch (error) {
      embeddingRequestsCounter.inc({ model: this.model, status: 'error' });
      logger.error('OpenAI embedding failed', error, { model: this.model });

      if (error instanceof UpstreamCapabilityError) {
        throw error;
      }
      throw new UpstreamCapabilityError('embedding', 'request_failed', 'Embedding request failed', error);
    }
  }
}

export class OpenAiTextGenerator implements TextGenerator {
  readonly model: string;

  constructor(private readonly openai: OpenAI, model: string) {
    this.model = model;
  }

  async generate(prompt: string, temperature: number): Promise<string> {
    const startTime = Date.now();

    try {
      const response = await this.openai.chat.completions.create({
        model: this.model,
        messages: [{ role: 'user', content: prompt }],
        temperature,
      });

      const duration = (Date.now() - startTime) / 1000;
      llmRequestDurationHistogram.observe({ model: this.model }, duration);

      const content = response.choices[0]?.message?.content;
      if (!content || content.trim().length === 0) {
        throw new UpstreamCapabilityError('generation', 'empty_completion', 'Empty completion from OpenAI');
      }

      llmRequestsCounter.inc({ model: this.model, status: 'success' });
      logger.info('OpenAI completion complete', {
        model: this.model,
        request_id: response.id,
        duration_seconds: duration,
        tokens_used: response.usage?.total_tokens,
      });

      return content;
    } catch (error) {
      llmRequestsCounter.inc({ model: this.model, status: 'error' });
      logger.error('OpenAI completion failed', error, { model: this.model });

      if (error instanceof UpstreamCapabilityError) {
        throw error;
      }
      throw new UpstreamCapabilityError('generation', 'request_failed', 'Completion request failed', error);
    }
  }
}

export interface OpenAiClients {
  embedder: EmbeddingClient;
  generator: TextGenerator;
}

/**
 * Build the OpenAI-backed clients. No retries: a failed call fails the request.
 */
export function createOpenAiClients(cfg: Config = defaultConfig): OpenAiClients {
  const openai = new OpenAI({
    apiKey: cfg.openaiApiKey,
    timeout: cfg.llmRequestTimeoutMs,
    maxRetries: 0,
  });

  return {
    embedder: new OpenAiEmbedder(openai, cfg.llmModelEmbedding, cfg.embeddingDimensions),
    generator: new OpenAiTextGenerator(openai, cfg.llmModelText),
  };
}
