import type { EntityLabel, ExtractedProfile, SkillSet } from '../types';
import { createLogger, Logger } from '../util/logger';
import type { EntityKind, EntityRecognizer, RecognizedEntity } from './recognizer';
import { redact } from './redact';
import type { SkillTaxonomy } from './taxonomy';

const LABELS: Record<EntityKind, EntityLabel> = {
  SKILL: 'SKILLS',
  ORG: 'ORG',
  PLACE: 'LOCATIONS',
  DATE: 'DATE',
};

export const DEGRADED_PROFILE: Readonly<ExtractedProfile> = Object.freeze({
  SKILLS: ['NLP model not available'],
  ORG: ['Enable the entity recognizer for full analysis'],
  LOCATIONS: ['Entity recognizer failed to load'],
  NOTE: 'Entity recognizer not available. Resume parsing is limited until it loads.',
  degraded: true,
});

type ExtractorDeps = {
  recognizer: EntityRecognizer | null;
  taxonomy: SkillTaxonomy;
  logger?: Logger;
};

type SkillRule = {
  surface: string;
  pattern: RegExp;
};

const escapeRegExp = (value: string): string => value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

/**
 * Case-insensitive whole-word rules. Longer phrases come first so
 * "machine learning" claims its span before "learning" can.
 */
export const buildSkillRules = (skills: string[]): SkillRule[] =>
  Array.from(new Set(skills.map((skill) => skill.trim()).filter(Boolean)))
    .sort((a, b) => b.length - a.length)
    .map((surface) => ({
      surface,
      pattern: new RegExp(`(?<![A-Za-z0-9])${escapeRegExp(surface)}(?![A-Za-z0-9])`, 'gi'),
    }));

const overlaps = (a: { start: number; end: number }, b: { start: number; end: number }): boolean =>
  a.start < b.end && b.start < a.end;

/** Spans carry the vocabulary spelling, so case variants collapse into one skill. */
export const matchSkillRules = (text: string, rules: SkillRule[]): RecognizedEntity[] => {
  const claimed: RecognizedEntity[] = [];

  for (const rule of rules) {
    for (const match of text.matchAll(rule.pattern)) {
      const start = match.index ?? 0;
      const span: RecognizedEntity = {
        text: rule.surface,
        label: 'SKILL',
        start,
        end: start + match[0].length,
      };

      if (!claimed.some((existing) => overlaps(existing, span))) {
        claimed.push(span);
      }
    }
  }

  return claimed;
};

export const toSkillSet = (values: Iterable<unknown>): SkillSet => {
  const skills = new Set<string>();

  for (const value of values) {
    if (typeof value === 'string' && value.trim()) {
      skills.add(value.trim().toLowerCase());
    }
  }

  return skills;
};

/** Skills usable for retrieval. A degraded profile contributes none. */
export const skillsOf = (profile: ExtractedProfile): SkillSet =>
  profile.degraded ? new Set<string>() : toSkillSet(profile.SKILLS ?? []);

export class EntityExtractor {
  private readonly recognizer: EntityRecognizer | null;

  private readonly taxonomy: SkillTaxonomy;

  private readonly logger: Logger;

  constructor({ recognizer, taxonomy, logger }: ExtractorDeps) {
    this.recognizer = recognizer;
    this.taxonomy = taxonomy;
    this.logger = logger ?? createLogger('extractor');
  }

  get available(): boolean {
    return this.recognizer !== null;
  }

  /**
   * Redacts PII, then tags skills from the category vocabulary alongside the
   * base recognizer's entities. Skill rules are built per call and never
   * attached to the shared recognizer, so calls may overlap.
   */
  extract(text: string, category: string): ExtractedProfile {
    if (!this.recognizer) {
      this.logger.warn('Entity recognizer is not available. Returning basic resume analysis.');
      return { ...DEGRADED_PROFILE };
    }

    const cleanText = redact(text);
    const vocabulary = this.taxonomy.skillsFor(category);

    if (!vocabulary.length) {
      this.logger.warn(`No skill vocabulary for category "${category}". Extracting base entities only.`);
    }

    const skillSpans = matchSkillRules(cleanText, buildSkillRules(vocabulary));
    const baseEntities = this.recognizer
      .recognize(cleanText)
      .filter((entity) => !skillSpans.some((span) => overlaps(span, entity)));

    const grouped = new Map<EntityLabel, Set<string>>();

    for (const entity of [...skillSpans, ...baseEntities]) {
      const label = LABELS[entity.label];
      const value = entity.text.trim();

      if (!value) {
        continue;
      }

      const bucket = grouped.get(label) ?? new Set<string>();
      bucket.add(value);
      grouped.set(label, bucket);
    }

    const profile: ExtractedProfile = {};

    for (const [label, values] of grouped) {
      profile[label] = Array.from(values).sort();
    }

    return profile;
  }
}
