import { createLogger, describeError, Logger } from '../util/logger';
import { exponentialBackoff } from '../util/retry';

export interface EmbeddingModel {
  embed(texts: string[]): Promise<number[][]>;
}

type EmbeddingGeneratorOptions = {
  baseUrl: string;
  model: string;
  maxAttempts?: number;
  fetchImpl?: typeof fetch;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
};

class EmbeddingRequestError extends Error {
  constructor(readonly status: number, detail: string) {
    super(detail);
    this.name = 'EmbeddingRequestError';
  }
}

const buildEndpoint = (baseUrl: string): string => {
  try {
    const url = new URL(baseUrl);
    url.pathname = '/api/embeddings';
    url.search = '';
    return url.toString();
  } catch (error) {
    throw new Error(`Invalid embedding service URL "${baseUrl}": ${describeError(error)}`);
  }
};

const getStatus = (error: unknown): number | undefined =>
  error instanceof EmbeddingRequestError ? error.status : undefined;

/** Embeds texts one request at a time against an Ollama-compatible endpoint. */
export class EmbeddingGenerator implements EmbeddingModel {
  private readonly model: string;

  private readonly maxAttempts: number;

  private readonly endpoint: string;

  private readonly fetchImpl: typeof fetch;

  private readonly logger: Logger;

  private readonly sleep?: (ms: number) => Promise<void>;

  constructor({ baseUrl, model, maxAttempts, fetchImpl, logger, sleep }: EmbeddingGeneratorOptions) {
    this.model = model;
    this.maxAttempts = Math.max(1, maxAttempts ?? 3);
    this.endpoint = buildEndpoint(baseUrl);
    this.fetchImpl = fetchImpl ?? fetch;
    this.logger = logger ?? createLogger('embeddings');
    this.sleep = sleep;
  }

  private shouldRetry(error: unknown): boolean {
    const status = getStatus(error);

    return status === undefined || status < 400 || status >= 500 || status === 429;
  }

  private logRetry(error: unknown, attempt: number, delay: number): void {
    const status = getStatus(error);
    const prefix = status === undefined ? '' : `status ${status}, `;

    this.logger.warn(
      `Embedding request attempt ${attempt} failed (${prefix}${describeError(error)}). Retrying in ${delay}ms.`,
    );
  }

  private buildEmbeddingError(error: unknown): Error {
    const status = getStatus(error);
    const detail = describeError(error);
    const message = status === undefined
      ? `Embedding request failed: ${detail}`
      : `Embedding request failed (status ${status}): ${detail}`;

    return new Error(message, { cause: error });
  }

  private normalizeEmbeddingVector(values: unknown): number[] {
    if (!Array.isArray(values)) {
      throw new Error('Embedding response did not include an array of numbers.');
    }

    return values.map((value, index) => {
      const numeric = typeof value === 'number' ? value : Number(value);
      if (Number.isNaN(numeric)) {
        throw new Error(`Embedding value at index ${index} is not a valid number.`);
      }
      return numeric;
    });
  }

  private async requestEmbedding(text: string): Promise<number[]> {
    const response = await this.fetchImpl(this.endpoint, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
      },
      body: JSON.stringify({
        model: this.model,
        prompt: text,
      }),
    });

    if (!response.ok) {
      const detailText = await response.text();
      throw new EmbeddingRequestError(response.status, detailText || response.statusText);
    }

    let data: unknown;

    try {
      data = await response.json();
    } catch (error) {
      throw new Error(`Failed to parse embedding response JSON: ${describeError(error)}`);
    }

    const embedding = data && typeof data === 'object' && 'embedding' in data ? data.embedding : undefined;

    return this.normalizeEmbeddingVector(embedding);
  }

  async embed(texts: string[]): Promise<number[][]> {
    const embeddings: number[][] = [];

    for (const text of texts) {
      try {
        embeddings.push(
          await exponentialBackoff(() => this.requestEmbedding(text), {
            maxAttempts: this.maxAttempts,
            onRetry: (error, attempt, delay) => this.logRetry(error, attempt, delay),
            shouldRetry: (error) => this.shouldRetry(error),
            sleep: this.sleep,
          }),
        );
      } catch (error) {
        throw this.buildEmbeddingError(error);
      }
    }

    return embeddings;
  }
}
