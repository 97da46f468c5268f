/**
 * Google Embedding Gateway
 *
 * Embeds receipt text and search queries with Gemini's text embedding model
 * (768 dimensions for text-embedding-004). SDK retries are switched off:
 * embedding calls are billed, and the agent decides whether to try again.
 */

import { embed } from 'ai';
import { createGoogleGenerativeAI } from '@ai-sdk/google';
import type { EmbeddingGateway } from '../store/types.js';

export interface GoogleEmbeddingOptions {
  apiKey?: string;
  model: string;
}

export class GoogleEmbeddingGateway implements EmbeddingGateway {
  private readonly google: ReturnType<typeof createGoogleGenerativeAI>;
  private readonly model: string;

  constructor(options: GoogleEmbeddingOptions) {
    this.google = createGoogleGenerativeAI({ apiKey: options.apiKey });
    this.model = options.model;
  }

  async embed(text: string, signal?: AbortSignal): Promise<number[]> {
    const { embedding } = await embed({
      model: this.google.textEmbeddingModel(this.model),
      value: text,
      maxRetries: 0,
      abortSignal: signal,
    });
    return embedding;
  }
}
