import { createLogger, describeError, Logger } from '../util/logger';
import type { EmbeddingModel } from './embeddings';

export const MAX_SEMANTIC_SCORE = 5;

/** Cosine similarity in [-1, 1]; null for mismatched or zero-length vectors. */
export const cosineSimilarity = (a: readonly number[], b: readonly number[]): number | null => {
  if (a.length === 0 || a.length !== b.length) {
    return null;
  }

  let dot = 0;
  let normA = 0;
  let normB = 0;

  for (let index = 0; index < a.length; index += 1) {
    dot += a[index] * b[index];
    normA += a[index] * a[index];
    normB += b[index] * b[index];
  }

  if (normA === 0 || normB === 0) {
    return null;
  }

  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
};

/** Maps a cosine in [-1, 1] onto [0, 5]. */
export const rescaleCosine = (cosine: number): number =>
  Math.min(Math.max(((cosine + 1) / 2) * MAX_SEMANTIC_SCORE, 0), MAX_SEMANTIC_SCORE);

export class SemanticScorer {
  private readonly model: EmbeddingModel | null;

  private readonly logger: Logger;

  constructor(model: EmbeddingModel | null, logger: Logger = createLogger('semantic')) {
    this.model = model;
    this.logger = logger;
  }

  async similarity(answer: string, reference: string): Promise<number> {
    if (!this.model) {
      this.logger.error('CRITICAL: Semantic checker model is not available. Returning score of 0.');
      return 0;
    }

    let vectors: number[][];

    try {
      vectors = await this.model.embed([answer, reference]);
    } catch (error) {
      this.logger.error(`CRITICAL: Error during similarity calculation: ${describeError(error)}`);
      return 0;
    }

    const [answerVector, referenceVector] = vectors;
    const cosine = answerVector && referenceVector ? cosineSimilarity(answerVector, referenceVector) : null;

    if (cosine === null) {
      this.logger.warn('Embeddings were empty, mismatched or zero-length. Returning score of 0.');
      return 0;
    }

    return rescaleCosine(cosine);
  }
}
