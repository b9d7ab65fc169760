import dotenv from 'dotenv';

import { createApp } from './app';
import { ConfigError, loadConfig, type AppConfig } from './config';
import { OpenAiModelClient } from './llm/client';
import { ModelGateway } from './llm/gateway';
import { EntityExtractor } from './nlp/extractor';
import { loadRecognizer } from './nlp/recognizer';
import { loadTaxonomy } from './nlp/taxonomy';
import { createPdfTextReader } from './pipeline/parsePdf';
import { EmbeddingGenerator } from './rag/embeddings';
import { QuestionRetriever } from './rag/retriever';
import { SemanticScorer } from './rag/semantic';
import { DocumentStore } from './store/documents';
import { SessionStore } from './store/sessions';
import { JsonlAuditLog } from './util/audit';
import { createLogger, describeError } from './util/logger';

dotenv.config();

const logger = createLogger('server');

const readConfig = (): AppConfig => {
  try {
    return loadConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.error(`FATAL: ${error.message}`);
      process.exit(1);
    }
    throw error;
  }
};

const config = readConfig();

const taxonomy = loadTaxonomy(config.skillTaxonomyPath);
const readDocument = createPdfTextReader();
const gateway = new ModelGateway({
  client: new OpenAiModelClient(config.llm),
  audit: new JsonlAuditLog({ filePath: config.auditLogPath }),
});

const buildScorer = (): SemanticScorer => {
  try {
    return new SemanticScorer(new EmbeddingGenerator(config.embeddings));
  } catch (error) {
    logger.error(`Failed to configure the embedding model: ${describeError(error)}`);
    return new SemanticScorer(null);
  }
};

const app = createApp({
  sessions: new SessionStore(),
  documents: new DocumentStore(),
  taxonomy,
  uploadDir: config.uploadDir,
  questionPipeline: {
    readDocument,
    extractor: new EntityExtractor({ recognizer: loadRecognizer(), taxonomy }),
    retriever: QuestionRetriever.fromFile(config.questionBankPath),
    gateway,
  },
  evaluationPipeline: {
    readDocument,
    gateway,
    scorer: buildScorer(),
  },
});

app.listen(config.port, () => {
  logger.info(`Server listening on port ${config.port}`);
});

export default app;
