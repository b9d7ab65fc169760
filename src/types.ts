export type QuestionType = 'Technical' | 'Behavioral';

export interface QuestionRecord {
  readonly question: string;
  readonly skill: string;
  readonly type: QuestionType;
}

export interface QuestionHit extends QuestionRecord {
  /** Position of the record in the loaded bank. */
  readonly index: number;
}

export interface RetrievalResult {
  technical: QuestionHit[];
  behavioral: QuestionHit[];
}

export type SkillSet = ReadonlySet<string>;

export type EntityLabel = 'SKILLS' | 'ORG' | 'LOCATIONS' | 'DATE';

export type ExtractedProfile = Partial<Record<EntityLabel, string[]>> & {
  NOTE?: string;
  degraded?: boolean;
};

export type RubricStatus = 'scored' | 'unparsable' | 'failed';

export interface RubricEvaluation {
  feedback: string;
  score: number; // 0..5
  status: RubricStatus;
}

export interface ReferenceAnswer {
  text: string;
  status: 'generated' | 'failed';
}

export interface EvaluationRecord {
  readonly id: string;
  readonly question: string;
  readonly answer: string;
  readonly feedback: string;
  readonly rubricScore: number; // 0..5
  readonly rubricStatus: RubricStatus;
  readonly semanticScore: number; // 0..5
  readonly finalScore: number; // 0..5
  readonly createdAt: string;
}

export interface ReportSummary {
  qaPairs: EvaluationRecord[];
  strengthQuestions: string[];
  improvementQuestions: string[];
  strengths: string;
  areasForImprovement: string;
  nextPlan: string;
  finalScore: number;
  rubricScore: number;
  semanticScore: number;
  averageScore: number;
}

export type PromptReason = 'no-document' | 'no-skills' | 'no-bank-matches' | 'bank-matches';

export interface ComposedPrompt {
  variant: 'role-only' | 'rewrap';
  reason: PromptReason;
  prompt: string;
  warning?: string;
}

export type PipelineEvent<T> =
  | { type: 'status'; message: string }
  | { type: 'warning'; message: string }
  | { type: 'error'; message: string }
  | { type: 'result'; result: T };

export interface QuestionGenerationResult {
  questions: string;
  variant: ComposedPrompt['variant'];
  reason: PromptReason;
  profile?: ExtractedProfile;
}

export interface AnswerEvaluationResult {
  record: EvaluationRecord;
  referenceAnswer: string;
  report: string;
}
