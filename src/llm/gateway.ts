import type { ReferenceAnswer, RubricEvaluation } from '../types';
import type { AuditLog } from '../util/audit';
import { createLogger, describeError, Logger } from '../util/logger';
import { DEFAULT_RETRY_POLICY, exponentialBackoff, RetryPolicy } from '../util/retry';
import type { GenerateOptions, ModelClient } from './client';
import { fillTemplate, REFERENCE_ANSWER_PROMPT, RUBRIC_EVALUATION_PROMPT } from './prompts';

export const RUBRIC_TEMPERATURE = 0.2;
export const REFERENCE_ANSWER_PLACEHOLDER = 'Could not generate a reference answer.';

const OVERALL_SCORE_PATTERN = /Overall Score:\s*([0-9.]+)\s*\/\s*5/i;

/** Reads "Overall Score: X/5"; null when the token is missing or not a number. */
export const parseOverallScore = (feedback: string): number | null => {
  const match = OVERALL_SCORE_PATTERN.exec(feedback);

  if (!match) {
    return null;
  }

  const score = Number.parseFloat(match[1]);

  if (!Number.isFinite(score)) {
    return null;
  }

  return Math.min(Math.max(score, 0), 5);
};

type ModelGatewayOptions = {
  client: ModelClient;
  audit: AuditLog;
  policy?: RetryPolicy;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
};

/**
 * The three call shapes against the generative model. Each retries under the
 * injected policy, then degrades instead of throwing.
 */
export class ModelGateway {
  private readonly client: ModelClient;

  private readonly audit: AuditLog;

  private readonly policy: RetryPolicy;

  private readonly logger: Logger;

  private readonly sleep?: (ms: number) => Promise<void>;

  constructor({ client, audit, policy, logger, sleep }: ModelGatewayOptions) {
    this.client = client;
    this.audit = audit;
    this.policy = policy ?? DEFAULT_RETRY_POLICY;
    this.logger = logger ?? createLogger('gateway');
    this.sleep = sleep;
  }

  private async complete(callName: string, prompt: string, options?: GenerateOptions): Promise<string> {
    return exponentialBackoff(
      async (attempt) => {
        if (attempt > 1) {
          this.logger.warn(`Retrying ${callName} (attempt ${attempt} of ${this.policy.maxAttempts}).`);
        }

        const text = await this.client.generate(prompt, options);

        if (!text.trim()) {
          throw new Error('LLM response did not contain any content.');
        }

        return text;
      },
      {
        ...this.policy,
        sleep: this.sleep,
        onRetry: (error, attempt, delay) =>
          this.logger.warn(`${callName} attempt ${attempt} failed (${describeError(error)}). Waiting ${delay}ms.`),
      },
    );
  }

  async generateQuestions(prompt: string): Promise<string | null> {
    try {
      const text = await this.complete('question generation', prompt);

      this.audit.record({
        event: 'General Call',
        model: this.client.model,
        prompt,
        response: text,
      });

      return text;
    } catch (error) {
      this.logger.error(`Error calling the model for question generation: ${describeError(error)}`);
      return null;
    }
  }

  async generateReferenceAnswer(question: string, resumeContext: string): Promise<ReferenceAnswer> {
    const prompt = fillTemplate(REFERENCE_ANSWER_PROMPT, {
      question,
      resume_context: resumeContext,
    });

    try {
      const text = await this.complete('reference answer', prompt);

      this.audit.record({
        event: 'Reference Answer Call',
        model: this.client.model,
        prompt,
        response: text,
      });

      return { text, status: 'generated' };
    } catch (error) {
      this.logger.error(`Error generating reference answer: ${describeError(error)}`);
      return { text: REFERENCE_ANSWER_PLACEHOLDER, status: 'failed' };
    }
  }

  async evaluateWithRubric(question: string, answer: string, resumeContext: string): Promise<RubricEvaluation> {
    const prompt = fillTemplate(RUBRIC_EVALUATION_PROMPT, {
      question,
      user_answer: answer,
      resume_context: resumeContext,
    });

    let feedback: string;

    try {
      feedback = await this.complete('rubric evaluation', prompt, { temperature: RUBRIC_TEMPERATURE });
    } catch (error) {
      const message = describeError(error);
      this.logger.error(`Error in rubric evaluation: ${message}`);
      return { feedback: `Evaluation error: ${message}`, score: 0, status: 'failed' };
    }

    const parsed = parseOverallScore(feedback);

    if (parsed === null) {
      this.logger.warn('Could not parse Overall Score from LLM feedback. Rubric score defaults to 0.');
    }

    const score = parsed ?? 0;

    this.audit.record({
      event: 'Evaluation Call',
      model: this.client.model,
      temperature: RUBRIC_TEMPERATURE,
      prompt,
      response: feedback,
      parsedScore: score,
    });

    return {
      feedback,
      score,
      status: parsed === null ? 'unparsable' : 'scored',
    };
  }
}
