import fs from 'node:fs';
import { z } from 'zod';

import { createLogger, describeError, Logger } from '../util/logger';

export const FALLBACK_CATEGORIES: readonly string[] = [
  'Data Science',
  'Backend Development',
  'Frontend Development',
  'Cloud & DevOps',
];

const taxonomySchema = z.record(z.string(), z.array(z.string()));

export type SkillTaxonomy = {
  /** Selectable job categories, in source order. */
  categories(): string[];
  /** Skill surface forms for a category; empty when the category or source is unknown. */
  skillsFor(category: string): string[];
  readonly available: boolean;
};

const buildTaxonomy = (entries: Record<string, string[]> | null): SkillTaxonomy => ({
  available: entries !== null,
  categories: () => (entries ? Object.keys(entries) : [...FALLBACK_CATEGORIES]),
  skillsFor: (category: string) => {
    if (!entries || !Object.prototype.hasOwnProperty.call(entries, category)) {
      return [];
    }

    return entries[category]
      .map((skill) => skill.trim())
      .filter(Boolean);
  },
});

export const createTaxonomy = (entries: Record<string, string[]>): SkillTaxonomy => buildTaxonomy(entries);

export const EMPTY_TAXONOMY: SkillTaxonomy = buildTaxonomy(null);

export const loadTaxonomy = (filePath: string, logger: Logger = createLogger('taxonomy')): SkillTaxonomy => {
  let raw: string;

  try {
    raw = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    logger.error(`Skill taxonomy file not readable at ${filePath}: ${describeError(error)}`);
    return EMPTY_TAXONOMY;
  }

  let parsed: unknown;

  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    logger.error(`Error decoding JSON from skill taxonomy file at ${filePath}: ${describeError(error)}`);
    return EMPTY_TAXONOMY;
  }

  const validation = taxonomySchema.safeParse(parsed);

  if (!validation.success) {
    logger.error(`Skill taxonomy at ${filePath} is not a mapping of category to skill list.`);
    return EMPTY_TAXONOMY;
  }

  const taxonomy = createTaxonomy(validation.data);
  logger.info(`Loaded ${taxonomy.categories().length} job categories from ${filePath}.`);

  return taxonomy;
};
