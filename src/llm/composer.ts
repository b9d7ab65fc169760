import { skillsOf } from '../nlp/extractor';
import { flattenRetrieval } from '../rag/retriever';
import type { ComposedPrompt, ExtractedProfile, QuestionHit, RetrievalResult } from '../types';
import { fillTemplate, REWRAP_PROMPT, ROLE_ONLY_PROMPT } from './prompts';

export const NO_SKILLS_WARNING = 'No specific skills found. Falling back to general role-based questions.';
export const NO_BANK_MATCHES_WARNING = 'No questions found in bank for your specific skills. Falling back to general questions.';

export type ComposeInput = {
  targetRole: string;
  /** Stands in for a blank role on the role-only path. */
  category?: string;
  /** Present only when a document was supplied. */
  profile?: ExtractedProfile;
  retrieval?: RetrievalResult;
};

const resolveRole = ({ targetRole, category }: ComposeInput): string =>
  targetRole.trim() || category?.trim() || 'the target role';

export const buildRoleOnlyPrompt = (targetRole: string): string =>
  fillTemplate(ROLE_ONLY_PROMPT, { target_role: targetRole });

export const formatRetrievedQuestions = (hits: QuestionHit[]): string =>
  hits.map((hit, position) => `${position + 1}. [${hit.type} | ${hit.skill}] ${hit.question}`).join('\n');

export const buildRewrapPrompt = (profile: ExtractedProfile, hits: QuestionHit[]): string =>
  fillTemplate(REWRAP_PROMPT, {
    resume_context: JSON.stringify(profile, null, 2),
    retrieved_questions: formatRetrievedQuestions(hits),
  });

/**
 * Picks exactly one prompt variant. Any missing signal along the chain
 * (document, skills, bank matches) lands on the role-only prompt.
 */
export const composeQuestionPrompt = (input: ComposeInput): ComposedPrompt => {
  const { profile, retrieval } = input;

  if (!profile) {
    return {
      variant: 'role-only',
      reason: 'no-document',
      prompt: buildRoleOnlyPrompt(resolveRole(input)),
    };
  }

  if (!skillsOf(profile).size) {
    return {
      variant: 'role-only',
      reason: 'no-skills',
      prompt: buildRoleOnlyPrompt(resolveRole(input)),
      warning: NO_SKILLS_WARNING,
    };
  }

  const hits = retrieval ? flattenRetrieval(retrieval) : [];

  if (!hits.length) {
    return {
      variant: 'role-only',
      reason: 'no-bank-matches',
      prompt: buildRoleOnlyPrompt(resolveRole(input)),
      warning: NO_BANK_MATCHES_WARNING,
    };
  }

  return {
    variant: 'rewrap',
    reason: 'bank-matches',
    prompt: buildRewrapPrompt(profile, hits),
  };
};
