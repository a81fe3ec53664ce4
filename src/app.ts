import express from 'express';
import cors from 'cors';
import morgan from 'morgan';
import rateLimit from 'express-rate-limit';
import { AppConfig } from './config';
import { createSessionsRouter } from './routes/sessions';
import { createWebhookRouter } from './routes/webhook';
import { AdvisorService } from './services/advisorService';
import { ApprovalEngine, engineSettings } from './services/approvalEngine';
import { PlacesClient } from './services/googlePlaces';
import { IngestionCoordinator } from './services/ingestionCoordinator';
import { IngestionQueue } from './services/ingestionQueue';
import { LLMIntentClassifier } from './services/intentClassifier';
import { LLMService, TextGenerator } from './services/llmService';
import { Messenger, createMessenger } from './services/messaging';
import { LLMRevisionPipeline } from './services/revisionService';
import { PlacesReviewSource, ReviewPipeline, ReviewSource } from './services/reviewPipeline';
import { InMemorySessionStore, SessionStore } from './services/sessionStore';

export interface Services {
  store: SessionStore;
  messenger: Messenger;
  queue: IngestionQueue;
  engine: ApprovalEngine;
}

export interface ServiceOverrides {
  store?: SessionStore;
  messenger?: Messenger;
  llm?: TextGenerator;
  source?: ReviewSource;
}

export const buildServices = (config: AppConfig, overrides: ServiceOverrides = {}): Services => {
  const store = overrides.store ?? new InMemorySessionStore();
  const messenger = overrides.messenger ?? createMessenger(config);
  const llm = overrides.llm ?? new LLMService(config.llm);
  const source = overrides.source ?? new PlacesReviewSource(new PlacesClient(config.placesApiKey));
  const queue = new IngestionQueue(store, config.workflow.ingestionConcurrency);

  const engine = new ApprovalEngine({
    store,
    messenger,
    queue,
    classifier: new LLMIntentClassifier(llm),
    revision: new LLMRevisionPipeline(llm, config.workflow.revisionTimeoutMs),
    coordinator: new IngestionCoordinator(store, { ratingThreshold: config.workflow.ratingThreshold }),
    pipeline: new ReviewPipeline(source, llm),
    advisor: new AdvisorService(store, llm),
    settings: engineSettings(config),
  });

  return { store, messenger, queue, engine };
};

export const createApp = (config: AppConfig, services: Services) => {
  const app = express();

  app.use(rateLimit({ windowMs: config.rateLimit.windowMs, max: config.rateLimit.max }));
  app.use(cors());
  app.use(express.json({ limit: '2mb' }));
  app.use(express.urlencoded({ extended: false }));
  app.use(morgan('dev'));

  app.get('/health', (_req, res) => res.json({ status: 'healthy' }));

  app.use('/webhook', createWebhookRouter(services.engine));
  app.use('/api', createSessionsRouter(services.engine));

  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  return app;
};
