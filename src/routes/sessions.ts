import { Router, type NextFunction, type Request, type Response } from 'express';
import { z } from 'zod';

import type { SkillTaxonomy } from '../nlp/taxonomy';
import { evaluateAnswer, type EvaluationPipelineDeps } from '../pipeline/evaluateAnswer';
import { generateQuestions, type QuestionPipelineDeps } from '../pipeline/generateQuestions';
import type { DocumentStore } from '../store/documents';
import type { InterviewSession, SessionStore } from '../store/sessions';
import { streamEvents, toValidationIssues } from './stream';

type SessionsRouterDeps = {
  sessions: SessionStore;
  documents: DocumentStore;
  taxonomy: SkillTaxonomy;
  questionPipeline: QuestionPipelineDeps;
  evaluationPipeline: EvaluationPipelineDeps;
};

const questionsSchema = z.object({
  target_role: z.string().optional(),
  job_category: z.string().trim().min(1).optional(),
  document_id: z.string().trim().min(1).optional(),
});

const evaluationSchema = z.object({
  question: z.string().trim().min(1, 'question is required'),
  answer: z.string().trim().min(1, 'answer is required'),
  document_id: z.string().trim().min(1, 'document_id is required'),
});

export const NO_QUESTIONS_TEXT = 'No questions generated yet.';

export const createSessionsRouter = (deps: SessionsRouterDeps): Router => {
  const router = Router();

  const findSession = (req: Request, res: Response): InterviewSession | undefined => {
    const session = deps.sessions.get(req.params.id);

    if (!session) {
      res.status(404).json({ error: 'Session not found' });
    }

    return session;
  };

  const resolveDocumentPath = (documentId: string | undefined, res: Response): string | null | undefined => {
    if (!documentId) {
      return undefined;
    }

    const documentPath = deps.documents.getPathById(documentId);

    if (!documentPath) {
      res.status(404).json({ error: 'Document not found' });
      return null;
    }

    return documentPath;
  };

  router.post('/', (_req, res) => {
    const session = deps.sessions.create();
    res.status(201).json({ id: session.id });
  });

  router.post('/:id/questions', (req: Request, res: Response, next: NextFunction) => {
    const session = findSession(req, res);

    if (!session) {
      return;
    }

    const validation = questionsSchema.safeParse(req.body ?? {});

    if (!validation.success) {
      res.status(400).json({ errors: toValidationIssues(validation.error.issues) });
      return;
    }

    const { target_role: targetRole, job_category: jobCategory, document_id: documentId } = validation.data;
    const documentPath = resolveDocumentPath(documentId, res);

    if (documentPath === null) {
      return;
    }

    const category = jobCategory ?? deps.taxonomy.categories()[0] ?? '';

    streamEvents(res, generateQuestions(deps.questionPipeline, session, { targetRole, category, documentPath }))
      .catch(next);
  });

  router.get('/:id/questions', (req: Request, res: Response) => {
    const session = findSession(req, res);

    if (!session) {
      return;
    }

    res.setHeader('Content-Disposition', `attachment; filename="interview-questions-${session.id}.txt"`);
    res.type('text/plain').send(session.generatedQuestions || NO_QUESTIONS_TEXT);
  });

  router.post('/:id/evaluations', (req: Request, res: Response, next: NextFunction) => {
    const session = findSession(req, res);

    if (!session) {
      return;
    }

    const validation = evaluationSchema.safeParse(req.body ?? {});

    if (!validation.success) {
      res.status(400).json({ errors: toValidationIssues(validation.error.issues) });
      return;
    }

    const { question, answer, document_id: documentId } = validation.data;
    const documentPath = resolveDocumentPath(documentId, res);

    if (!documentPath) {
      return;
    }

    streamEvents(res, evaluateAnswer(deps.evaluationPipeline, session, { question, answer, documentPath }))
      .catch(next);
  });

  router.get('/:id/report', (req: Request, res: Response) => {
    const session = findSession(req, res);

    if (!session) {
      return;
    }

    const summary = session.summarize();

    if (!summary) {
      res.status(404).json({ error: 'No evaluations to report. Evaluate at least one answer first.' });
      return;
    }

    res.json(summary);
  });

  return router;
};
