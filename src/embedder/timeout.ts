/**
 * Timeout Embedding Wrapper
 *
 * Rejects with EmbeddingTimeoutError when the wrapped call takes longer than
 * `timeoutMs`. Uses Promise.race, so it works for providers that don't take
 * an AbortSignal.
 */

import { EmbeddingTimeoutError } from './errors.js';
import type { EmbeddingService } from './types.js';

export class TimeoutEmbeddingService implements EmbeddingService {
  constructor(
    private readonly inner: EmbeddingService,
    private readonly timeoutMs: number
  ) {}

  get model(): string {
    return this.inner.model;
  }

  get dimensions(): number {
    return this.inner.dimensions;
  }

  async embed(text: string): Promise<number[]> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new EmbeddingTimeoutError(this.timeoutMs)), this.timeoutMs);
    });

    try {
      return await Promise.race([this.inner.embed(text), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }
}
