import fs from 'node:fs';
import { z } from 'zod';

import type { QuestionRecord } from '../types';
import { createLogger, describeError, Logger } from '../util/logger';

const questionRecordSchema = z.object({
  question: z.string().trim().min(1),
  skill: z.string().trim().min(1),
  type: z.enum(['Technical', 'Behavioral']),
});

/**
 * Validates raw bank entries. Anything that is not a list yields an empty
 * bank; malformed entries are skipped individually.
 */
export const parseQuestionBank = (raw: unknown, logger: Logger = createLogger('question-bank')): QuestionRecord[] => {
  if (!Array.isArray(raw)) {
    logger.error(`Question bank did not parse as a list. Got type: ${raw === null ? 'null' : typeof raw}`);
    return [];
  }

  const records: QuestionRecord[] = [];

  raw.forEach((entry, position) => {
    const parsed = questionRecordSchema.safeParse(entry);

    if (!parsed.success) {
      logger.warn(`Skipping malformed question bank entry at position ${position}.`);
      return;
    }

    records.push(Object.freeze({ ...parsed.data }));
  });

  return records;
};

export const loadQuestionBank = (filePath: string, logger: Logger = createLogger('question-bank')): QuestionRecord[] => {
  logger.info(`Attempting to load question bank from: ${filePath}`);

  let raw: string;

  try {
    raw = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    logger.error(`Question bank file not readable at ${filePath}: ${describeError(error)}`);
    return [];
  }

  let parsed: unknown;

  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    logger.error(`Error parsing question bank JSON: ${describeError(error)}`);
    return [];
  }

  const records = parseQuestionBank(parsed, logger);

  if (records.length) {
    logger.info(`Successfully loaded ${records.length} questions from the bank.`);
  }

  return records;
};
