import express, { type Express, type NextFunction, type Request, type Response } from 'express';

import type { SkillTaxonomy } from './nlp/taxonomy';
import type { EvaluationPipelineDeps } from './pipeline/evaluateAnswer';
import type { QuestionPipelineDeps } from './pipeline/generateQuestions';
import { createCategoriesRouter } from './routes/categories';
import { createSessionsRouter } from './routes/sessions';
import { createUploadRouter } from './routes/upload';
import type { DocumentStore } from './store/documents';
import type { SessionStore } from './store/sessions';
import { createLogger, describeError, Logger } from './util/logger';

export type AppDeps = {
  sessions: SessionStore;
  documents: DocumentStore;
  taxonomy: SkillTaxonomy;
  questionPipeline: QuestionPipelineDeps;
  evaluationPipeline: EvaluationPipelineDeps;
  uploadDir: string;
  logger?: Logger;
};

export const createApp = (deps: AppDeps): Express => {
  const logger = deps.logger ?? createLogger('http');
  const app = express();

  app.use(express.json({ limit: '1mb' }));
  app.use(express.urlencoded({ extended: true }));

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok' });
  });

  app.use('/categories', createCategoriesRouter(deps.taxonomy));
  app.use('/upload', createUploadRouter({ documents: deps.documents, uploadDir: deps.uploadDir }));
  app.use('/sessions', createSessionsRouter(deps));

  app.use((error: unknown, _req: Request, res: Response, next: NextFunction) => {
    logger.error(`Unhandled request error: ${describeError(error)}`);

    if (res.headersSent) {
      next(error);
      return;
    }

    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
};
