import nlp from 'compromise';
import { z } from 'zod';

import { createLogger, describeError, Logger } from '../util/logger';

export type EntityKind = 'SKILL' | 'ORG' | 'PLACE' | 'DATE';

export interface RecognizedEntity {
  text: string;
  label: EntityKind;
  start: number;
  end: number;
}

export interface EntityRecognizer {
  readonly name: string;
  recognize(text: string): RecognizedEntity[];
}

const OFFSET_JSON = { text: true, offset: true };

const termSchema = z.array(
  z.object({
    text: z.string(),
    offset: z
      .object({
        start: z.number(),
        length: z.number(),
      })
      .optional(),
  }),
);

const EDGE_PUNCTUATION = /^[^\p{L}\p{N}]+|[^\p{L}\p{N}]+$/gu;

/** Strips punctuation and brackets the tagger keeps around a match; empty when nothing is left. */
export const cleanSurface = (raw: string): string => raw.replace(EDGE_PUNCTUATION, '');

/**
 * Turns tagger output into spans over `text`. Surfaces are cleaned first and
 * located again in the source, so `start`/`end` always bound `text` exactly.
 */
export const locateMatches = (text: string, label: EntityKind, raw: unknown): RecognizedEntity[] => {
  const parsed = termSchema.safeParse(raw);

  if (!parsed.success) {
    return [];
  }

  let searchFrom = 0;

  return parsed.data.flatMap<RecognizedEntity>((match) => {
    const surface = cleanSurface(match.text);

    if (!surface) {
      return [];
    }

    const hint = Math.max(searchFrom, match.offset?.start ?? 0);
    let start = text.indexOf(surface, hint);

    if (start < 0) {
      start = text.indexOf(surface, searchFrom);
    }

    if (start < 0) {
      return [];
    }

    const end = start + surface.length;
    searchFrom = end;

    return [{ text: surface, label, start, end }];
  });
};

/** Base recognizer over compromise's organization, place and date taggers. */
export class CompromiseRecognizer implements EntityRecognizer {
  readonly name = 'compromise';

  recognize(text: string): RecognizedEntity[] {
    if (!text.trim()) {
      return [];
    }

    const doc = nlp(text);

    return [
      ...locateMatches(text, 'ORG', doc.organizations().json(OFFSET_JSON)),
      ...locateMatches(text, 'PLACE', doc.places().json(OFFSET_JSON)),
      ...locateMatches(text, 'DATE', doc.match('#Date+').json(OFFSET_JSON)),
    ];
  }
}

/**
 * Creates the base recognizer once at startup. Returns null when the NLP
 * library cannot process text, which switches extraction to its degraded profile.
 */
export const loadRecognizer = (logger: Logger = createLogger('recognizer')): EntityRecognizer | null => {
  try {
    const recognizer = new CompromiseRecognizer();
    recognizer.recognize('Warm-up sentence written in London in May 2020.');
    logger.info(`Entity recognizer '${recognizer.name}' loaded successfully.`);
    return recognizer;
  } catch (error) {
    logger.warn(`Entity recognizer unavailable; resume parsing will be limited. ${describeError(error)}`);
    return null;
  }
};
