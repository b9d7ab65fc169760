import type { QuestionHit, QuestionRecord, RetrievalResult } from '../types';
import { createLogger, Logger } from '../util/logger';
import { loadQuestionBank } from './questionBank';

type RetrieverOptions = {
  random?: () => number;
  logger?: Logger;
};

const normalizeCount = (count: number): number =>
  Number.isFinite(count) ? Math.max(0, Math.floor(count)) : 0;

/** Uniform sample without replacement (partial Fisher-Yates). */
export const sampleWithoutReplacement = <T>(items: readonly T[], count: number, random: () => number = Math.random): T[] => {
  const pool = [...items];
  const size = Math.min(pool.length, normalizeCount(count));

  for (let index = 0; index < size; index += 1) {
    const pick = Math.min(pool.length - 1, index + Math.floor(random() * (pool.length - index)));
    [pool[index], pool[pick]] = [pool[pick], pool[index]];
  }

  return pool.slice(0, size);
};

export const emptyRetrieval = (): RetrievalResult => ({ technical: [], behavioral: [] });

export const flattenRetrieval = (result: RetrievalResult): QuestionHit[] => [
  ...result.technical,
  ...result.behavioral,
];

export class QuestionRetriever {
  private readonly bank: readonly QuestionRecord[];

  private readonly random: () => number;

  private readonly logger: Logger;

  constructor(bank: readonly QuestionRecord[], { random, logger }: RetrieverOptions = {}) {
    this.bank = bank;
    this.random = random ?? Math.random;
    this.logger = logger ?? createLogger('retriever');
  }

  static fromFile(filePath: string, options: RetrieverOptions = {}): QuestionRetriever {
    return new QuestionRetriever(loadQuestionBank(filePath, options.logger), options);
  }

  get size(): number {
    return this.bank.length;
  }

  retrieve(skills: Iterable<string>, numTechnical = 3, numBehavioral = 3): RetrievalResult {
    if (!this.bank.length) {
      this.logger.warn('Attempted to retrieve questions, but the question bank is empty.');
      return emptyRetrieval();
    }

    const resumeSkills = new Set<string>();

    for (const skill of skills) {
      if (typeof skill === 'string' && skill.trim()) {
        resumeSkills.add(skill.trim().toLowerCase());
      }
    }

    if (!resumeSkills.size) {
      this.logger.warn('No skills provided for question retrieval.');
      return emptyRetrieval();
    }

    const relevant = this.bank
      .map<QuestionHit>((record, index) => ({ ...record, index }))
      .filter((hit) => resumeSkills.has(hit.skill.trim().toLowerCase()));

    const technical = relevant.filter((hit) => hit.type === 'Technical');
    const behavioral = relevant.filter((hit) => hit.type === 'Behavioral');

    this.logger.info(
      `Found ${technical.length} technical and ${behavioral.length} behavioral questions matching skills: ${[...resumeSkills].join(', ')}`,
    );

    if (!technical.length) {
      this.logger.warn('No technical questions found for the given skills.');
    }

    if (!behavioral.length) {
      this.logger.warn('No behavioral questions found for the given skills.');
    }

    return {
      technical: sampleWithoutReplacement(technical, numTechnical, this.random),
      behavioral: sampleWithoutReplacement(behavioral, numBehavioral, this.random),
    };
  }
}
