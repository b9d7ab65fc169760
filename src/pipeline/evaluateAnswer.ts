import type { ModelGateway } from '../llm/gateway';
import { redact } from '../nlp/redact';
import type { SemanticScorer } from '../rag/semantic';
import type { InterviewSession } from '../store/sessions';
import type { AnswerEvaluationResult, EvaluationRecord, PipelineEvent } from '../types';
import { createLogger, describeError, Logger } from '../util/logger';
import { fuse } from './fusion';
import type { DocumentTextReader } from './parsePdf';

export type EvaluationPipelineDeps = {
  readDocument: DocumentTextReader;
  gateway: Pick<ModelGateway, 'generateReferenceAnswer' | 'evaluateWithRubric'>;
  scorer: Pick<SemanticScorer, 'similarity'>;
  logger?: Logger;
};

export type EvaluationRequest = {
  question?: string;
  answer?: string;
  documentPath?: string;
};

type EvaluationEvent = PipelineEvent<AnswerEvaluationResult>;

export const MISSING_EVALUATION_INPUT_MESSAGE =
  'Please provide the question, your answer, and upload your resume for evaluation.';
export const UNPARSABLE_RUBRIC_WARNING = 'The rubric response had no "Overall Score: X/5" line; the rubric score defaults to 0.';
export const FAILED_RUBRIC_WARNING = 'The rubric evaluation failed after retries; the rubric score defaults to 0.';
export const FAILED_REFERENCE_WARNING =
  'The reference answer could not be generated; the semantic similarity score defaults to 0.';

export const renderEvaluationReport = (record: EvaluationRecord): string => `## Hybrid Evaluation Report
- **Final Weighted Score:** \`${record.finalScore.toFixed(2)} / 5.0\`
- **AI Rubric Score:** \`${record.rubricScore.toFixed(2)} / 5.0\`
- **Semantic Similarity Score:** \`${record.semanticScore.toFixed(2)} / 5.0\` (how closely your answer matches an ideal one)
---
### AI Coach's Detailed Feedback:
${record.feedback}`;

export async function* evaluateAnswer(
  deps: EvaluationPipelineDeps,
  session: InterviewSession,
  request: EvaluationRequest,
): AsyncGenerator<EvaluationEvent> {
  const logger = deps.logger ?? createLogger('evaluate-answer');
  const question = request.question?.trim() ?? '';
  const answer = request.answer?.trim() ?? '';

  if (!question || !answer || !request.documentPath) {
    yield { type: 'error', message: MISSING_EVALUATION_INPUT_MESSAGE };
    return;
  }

  try {
    const resumeText = await deps.readDocument(request.documentPath);

    if (!resumeText) {
      yield { type: 'error', message: 'Failed to read resume for context.' };
      return;
    }

    const resumeContext = redact(resumeText);

    yield { type: 'status', message: '1/2: Generating reference answer and rubric evaluation...' };
    const [referenceAnswer, rubric] = await Promise.all([
      deps.gateway.generateReferenceAnswer(question, resumeContext),
      deps.gateway.evaluateWithRubric(question, answer, resumeContext),
    ]);

    if (rubric.status === 'unparsable') {
      yield { type: 'warning', message: UNPARSABLE_RUBRIC_WARNING };
    } else if (rubric.status === 'failed') {
      yield { type: 'warning', message: FAILED_RUBRIC_WARNING };
    }

    let semanticScore = 0;

    if (referenceAnswer.status === 'failed') {
      yield { type: 'warning', message: FAILED_REFERENCE_WARNING };
    } else {
      yield { type: 'status', message: '2/2: Calculating semantic similarity...' };
      semanticScore = await deps.scorer.similarity(answer, referenceAnswer.text);
    }

    const record = session.recordEvaluation({
      question,
      answer,
      feedback: rubric.feedback,
      rubricScore: rubric.score,
      rubricStatus: rubric.status,
      semanticScore,
      finalScore: fuse(rubric.score, semanticScore),
    });

    yield { type: 'status', message: 'Evaluation complete!' };
    yield {
      type: 'result',
      result: {
        record,
        referenceAnswer: referenceAnswer.text,
        report: renderEvaluationReport(record),
      },
    };
  } catch (error) {
    logger.error(`Error during evaluation pipeline: ${describeError(error)}`);
    yield { type: 'error', message: `An evaluation error occurred: ${describeError(error)}` };
  }
}
