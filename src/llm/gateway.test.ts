import { describe, it, expect, vi } from 'vitest';

import { JsonlAuditLog } from '../util/audit';
import { NO_RETRY_POLICY } from '../util/retry';
import type { ModelClient } from './client';
import { ModelGateway, parseOverallScore, REFERENCE_ANSWER_PLACEHOLDER, RUBRIC_TEMPERATURE } from './gateway';

function createSilentLogger() {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

function createHarness(options: { retries?: boolean } = {}) {
  const generate = vi.fn<ModelClient['generate']>();
  const client: ModelClient = { model: 'test-model', generate };
  const logger = createSilentLogger();
  const audit = new JsonlAuditLog({ retain: 10, logger, now: () => new Date('2024-01-01T00:00:00.000Z') });
  const sleep = vi.fn(async (_ms: number) => undefined);
  const gateway = new ModelGateway({
    client,
    audit,
    logger,
    sleep,
    policy: options.retries === false ? NO_RETRY_POLICY : undefined,
  });

  return { generate, audit, sleep, logger, gateway };
}

describe('ModelGateway.generateQuestions', () => {
  it('returns the model text and audits the call', async () => {
    const { generate, audit, gateway } = createHarness();
    generate.mockResolvedValue('BEHAVIORAL QUESTIONS:\n1. Why us?');

    await expect(gateway.generateQuestions('prompt text')).resolves.toBe('BEHAVIORAL QUESTIONS:\n1. Why us?');
    expect(audit.entries()).toEqual([
      {
        timestamp: '2024-01-01T00:00:00.000Z',
        event: 'General Call',
        model: 'test-model',
        prompt: 'prompt text',
        response: 'BEHAVIORAL QUESTIONS:\n1. Why us?',
      },
    ]);
  });

  it('retries three times with 2s and 4s waits, then returns null', async () => {
    const { generate, audit, sleep, logger, gateway } = createHarness();
    generate.mockRejectedValue(new Error('503 upstream'));

    await expect(gateway.generateQuestions('prompt text')).resolves.toBeNull();
    expect(generate).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls).toEqual([[2000], [4000]]);
    expect(audit.entries()).toEqual([]);
    expect(logger.error).toHaveBeenCalledWith('Error calling the model for question generation: 503 upstream');
  });

  it('treats a blank response as a failure worth retrying', async () => {
    const { generate, sleep, gateway } = createHarness();
    generate.mockResolvedValueOnce('   ').mockResolvedValueOnce('1. Tell me about yourself.');

    await expect(gateway.generateQuestions('prompt text')).resolves.toBe('1. Tell me about yourself.');
    expect(generate).toHaveBeenCalledTimes(2);
    expect(sleep.mock.calls).toEqual([[2000]]);
  });

  it('truncates long prompts and responses in the audit trail', async () => {
    const { generate, audit, gateway } = createHarness();
    generate.mockResolvedValue('r'.repeat(501));

    await gateway.generateQuestions('p'.repeat(600));

    const [entry] = audit.entries();
    expect(entry.prompt).toBe(`${'p'.repeat(500)}...`);
    expect(entry.response).toHaveLength(503);
  });
});

describe('ModelGateway.generateReferenceAnswer', () => {
  it('fills the question and resume context into the prompt', async () => {
    const { generate, gateway } = createHarness();
    generate.mockResolvedValue('An ideal answer.');

    await expect(gateway.generateReferenceAnswer('What is a JOIN?', 'SQL analyst')).resolves.toEqual({
      text: 'An ideal answer.',
      status: 'generated',
    });

    const [prompt, options] = generate.mock.calls[0];
    expect(prompt).toContain('QUESTION: "What is a JOIN?"');
    expect(prompt).toContain('SQL analyst');
    expect(options).toBeUndefined();
  });

  it('returns the placeholder marked as failed when every attempt fails', async () => {
    const { generate, gateway } = createHarness({ retries: false });
    generate.mockRejectedValue(new Error('timeout'));

    await expect(gateway.generateReferenceAnswer('What is a JOIN?', '')).resolves.toEqual({
      text: REFERENCE_ANSWER_PLACEHOLDER,
      status: 'failed',
    });
  });
});

describe('ModelGateway.evaluateWithRubric', () => {
  it('parses the overall score at low temperature and audits it', async () => {
    const { generate, audit, gateway } = createHarness();
    generate.mockResolvedValue('Strengths: clear.\nOverall Score: 4.5/5');

    const result = await gateway.evaluateWithRubric('Q', 'A', 'context');

    expect(result).toEqual({ feedback: 'Strengths: clear.\nOverall Score: 4.5/5', score: 4.5, status: 'scored' });
    expect(generate.mock.calls[0][1]).toEqual({ temperature: RUBRIC_TEMPERATURE });
    expect(audit.entries()[0]).toMatchObject({ event: 'Evaluation Call', temperature: 0.2, parsedScore: 4.5 });
  });

  it('keeps the feedback and scores 0 when no overall score is present', async () => {
    const { generate, logger, gateway } = createHarness();
    generate.mockResolvedValue('Good structure, weak depth.');

    await expect(gateway.evaluateWithRubric('Q', 'A', 'context')).resolves.toEqual({
      feedback: 'Good structure, weak depth.',
      score: 0,
      status: 'unparsable',
    });
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  it('reports the error as feedback when the model keeps failing', async () => {
    const { generate, audit, gateway } = createHarness({ retries: false });
    generate.mockRejectedValue(new Error('rate limited'));

    await expect(gateway.evaluateWithRubric('Q', 'A', 'context')).resolves.toEqual({
      feedback: 'Evaluation error: rate limited',
      score: 0,
      status: 'failed',
    });
    expect(audit.entries()).toEqual([]);
  });
});

describe('parseOverallScore', () => {
  it('reads the score case-insensitively with loose spacing', () => {
    expect(parseOverallScore('overall score: 3 / 5')).toBe(3);
    expect(parseOverallScore('Overall Score: 3.75/5')).toBe(3.75);
  });

  it('clamps scores above the scale', () => {
    expect(parseOverallScore('Overall Score: 7/5')).toBe(5);
  });

  it('returns null for a missing or non-numeric score', () => {
    expect(parseOverallScore('Score: 4/5')).toBeNull();
    expect(parseOverallScore('Overall Score: ./5')).toBeNull();
  });
});
