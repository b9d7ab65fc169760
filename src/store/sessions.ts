import { v4 as uuidv4 } from 'uuid';

import type { EvaluationRecord, ReportSummary } from '../types';

export type EvaluationInput = Omit<EvaluationRecord, 'id' | 'createdAt'>;

export const NEXT_PLAN =
  'Review core concepts related to the improvement areas. Practice mock interviews focusing on concise, impactful answers.';

const STRENGTHS_PREFIX = 'Demonstrated strong STAR method usage in questions about: ';
const IMPROVEMENTS_PREFIX = 'Could improve technical depth in answers to questions about: ';

/**
 * State for one user's interview preparation: the latest generated
 * questions and an append-only evaluation history.
 */
export class InterviewSession {
  readonly id: string;

  readonly createdAt: string;

  private questions = '';

  private readonly history: EvaluationRecord[] = [];

  constructor(id: string = uuidv4(), now: Date = new Date()) {
    this.id = id;
    this.createdAt = now.toISOString();
  }

  get generatedQuestions(): string {
    return this.questions;
  }

  get evaluationHistory(): readonly EvaluationRecord[] {
    return this.history;
  }

  /** Clears the questions left by the previous generation request. */
  beginGeneration(): void {
    this.questions = '';
  }

  setGeneratedQuestions(questions: string): void {
    this.questions = questions;
  }

  recordEvaluation(input: EvaluationInput, now: Date = new Date()): EvaluationRecord {
    const record: EvaluationRecord = Object.freeze({
      ...input,
      id: uuidv4(),
      createdAt: now.toISOString(),
    });

    this.history.push(record);

    return record;
  }

  summarize(): ReportSummary | null {
    if (!this.history.length) {
      return null;
    }

    const strengthQuestions: string[] = [];
    const improvementQuestions: string[] = [];

    for (const record of this.history) {
      const feedback = record.feedback.toLowerCase();

      if (feedback.includes('strength')) {
        strengthQuestions.push(record.question);
      }

      if (feedback.includes('improve')) {
        improvementQuestions.push(record.question);
      }
    }

    const latest = this.history[this.history.length - 1];
    const total = this.history.reduce((sum, record) => sum + record.finalScore, 0);

    return {
      qaPairs: [...this.history],
      strengthQuestions,
      improvementQuestions,
      strengths: STRENGTHS_PREFIX + strengthQuestions.join(', '),
      areasForImprovement: IMPROVEMENTS_PREFIX + improvementQuestions.join(', '),
      nextPlan: NEXT_PLAN,
      finalScore: latest.finalScore,
      rubricScore: latest.rubricScore,
      semanticScore: latest.semanticScore,
      averageScore: Math.round((total / this.history.length) * 100) / 100,
    };
  }
}

export class SessionStore {
  private readonly sessionsById = new Map<string, InterviewSession>();

  create(): InterviewSession {
    const session = new InterviewSession();
    this.sessionsById.set(session.id, session);
    return session;
  }

  get(id: string): InterviewSession | undefined {
    return this.sessionsById.get(id);
  }

  get size(): number {
    return this.sessionsById.size;
  }
}
