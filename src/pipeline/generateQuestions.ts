import { composeQuestionPrompt } from '../llm/composer';
import type { ModelGateway } from '../llm/gateway';
import { skillsOf, type EntityExtractor } from '../nlp/extractor';
import type { QuestionRetriever } from '../rag/retriever';
import type { InterviewSession } from '../store/sessions';
import type { PipelineEvent, QuestionGenerationResult, RetrievalResult } from '../types';
import { createLogger, describeError, Logger } from '../util/logger';
import type { DocumentTextReader } from './parsePdf';

export type QuestionPipelineDeps = {
  readDocument: DocumentTextReader;
  extractor: EntityExtractor;
  retriever: QuestionRetriever;
  gateway: Pick<ModelGateway, 'generateQuestions'>;
  logger?: Logger;
};

export type QuestionRequest = {
  targetRole?: string;
  category: string;
  /** Path of an uploaded resume, when one was supplied. */
  documentPath?: string;
};

type QuestionEvent = PipelineEvent<QuestionGenerationResult>;

export const MISSING_INPUT_MESSAGE = 'Please upload a resume or enter a target role.';
export const GENERATION_FAILED_MESSAGE = 'Failed to generate questions. Please check the API key and logs.';

/**
 * Question generation as a stream of progress events ending in exactly one
 * `result` or `error`. The session's questions are cleared up front and set
 * only on success.
 */
export async function* generateQuestions(
  deps: QuestionPipelineDeps,
  session: InterviewSession,
  request: QuestionRequest,
): AsyncGenerator<QuestionEvent> {
  const logger = deps.logger ?? createLogger('generate-questions');
  const targetRole = request.targetRole?.trim() ?? '';

  if (!request.documentPath && !targetRole) {
    yield { type: 'error', message: MISSING_INPUT_MESSAGE };
    return;
  }

  session.beginGeneration();

  if (!request.documentPath) {
    yield { type: 'status', message: 'Generating general questions for the role...' };

    const composed = composeQuestionPrompt({ targetRole, category: request.category });
    const questions = await deps.gateway.generateQuestions(composed.prompt);

    if (!questions) {
      yield { type: 'error', message: GENERATION_FAILED_MESSAGE };
      return;
    }

    session.setGeneratedQuestions(questions);
    yield { type: 'status', message: 'General questions generated!' };
    yield {
      type: 'result',
      result: { questions, variant: composed.variant, reason: composed.reason },
    };
    return;
  }

  try {
    yield { type: 'status', message: '1/4: Reading resume...' };
    const rawText = await deps.readDocument(request.documentPath);

    if (!rawText) {
      yield { type: 'error', message: 'Failed to read the uploaded document.' };
      return;
    }

    yield { type: 'status', message: '2/4: Analyzing resume skills...' };
    const profile = deps.extractor.extract(rawText, request.category);
    const skills = skillsOf(profile);

    yield { type: 'status', message: '3/4: Retrieving questions from bank...' };
    let retrieval: RetrievalResult | undefined;

    if (skills.size) {
      retrieval = deps.retriever.retrieve(skills);
    }

    const composed = composeQuestionPrompt({
      targetRole,
      category: request.category,
      profile,
      retrieval,
    });

    if (composed.warning) {
      yield { type: 'warning', message: composed.warning };
    }

    yield { type: 'status', message: '4/4: Personalizing questions with AI...' };
    const questions = await deps.gateway.generateQuestions(composed.prompt);

    if (!questions) {
      yield { type: 'error', message: GENERATION_FAILED_MESSAGE };
      return;
    }

    session.setGeneratedQuestions(questions);
    yield { type: 'status', message: 'Questions generated successfully!' };
    yield {
      type: 'result',
      result: {
        questions,
        variant: composed.variant,
        reason: composed.reason,
        profile,
      },
    };
  } catch (error) {
    logger.error(`Error in question generation pipeline: ${describeError(error)}`);
    yield { type: 'error', message: `An unexpected error occurred: ${describeError(error)}` };
  }
}
