// Property-based tests for semantic similarity scoring

import { describe, it, expect, vi } from 'vitest';
import * as fc from 'fast-check';

import type { EmbeddingModel } from './embeddings';
import { SemanticScorer } from './semantic';

function createSilentLogger() {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

describe('SemanticScorer properties', () => {
  it('is symmetric and stays within [0, 5]', async () => {
    const model: EmbeddingModel = {
      embed: async (texts) => texts.map((text) => [text.length + 1, (text.charCodeAt(0) || 0) % 7 - 3, 1]),
    };
    const scorer = new SemanticScorer(model, createSilentLogger());

    await fc.assert(
      fc.asyncProperty(fc.string(), fc.string(), async (a, b) => {
        const forward = await scorer.similarity(a, b);
        const backward = await scorer.similarity(b, a);

        expect(forward).toBe(backward);
        expect(forward).toBeGreaterThanOrEqual(0);
        expect(forward).toBeLessThanOrEqual(5);
      }),
    );
  });
});
