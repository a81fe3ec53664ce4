import type { Router } from 'express';
import { ApprovalEngine, EngineSettings } from '../src/services/approvalEngine';
import { AdvisorService } from '../src/services/advisorService';
import { IngestionCoordinator } from '../src/services/ingestionCoordinator';
import { IngestionQueue } from '../src/services/ingestionQueue';
import { IntentClassifier } from '../src/services/intentClassifier';
import { LLMOptions, LLMResponse, TextGenerator } from '../src/services/llmService';
import { Messenger } from '../src/services/messaging';
import { RevisionPipeline } from '../src/services/revisionService';
import { InMemorySessionStore } from '../src/services/sessionStore';
import { AnalysisBatch, AnalyzedReviewRecord, Intent, ReviewItem, RevisionRequest, Session } from '../src/types';

export const MANAGER = 'whatsapp:+15550000001';
export const OTHER_MANAGER = 'whatsapp:+15550000002';

export type SentMessage =
  | { to: string; kind: 'text'; body: string }
  | { to: string; kind: 'template'; templateId: string; variables: Record<string, string> };

export class RecordingMessenger implements Messenger {
  readonly channel = 'test';
  sent: SentMessage[] = [];

  async sendText(to: string, body: string): Promise<void> {
    this.sent.push({ to, kind: 'text', body });
  }

  async sendTemplate(to: string, templateId: string, variables: Record<string, string>): Promise<void> {
    this.sent.push({ to, kind: 'template', templateId, variables });
  }

  texts(): string[] {
    return this.sent.flatMap((m) => (m.kind === 'text' ? [m.body] : []));
  }
}

export class StubLLM implements TextGenerator {
  calls: LLMOptions[] = [];

  constructor(private readonly reply: (options: LLMOptions) => string | Promise<string>) {}

  async generate(options: LLMOptions): Promise<LLMResponse> {
    this.calls.push(options);
    return { content: await this.reply(options), provider: 'stub' };
  }
}

export const makeItem = (overrides: Partial<ReviewItem> = {}): ReviewItem => ({
  rating: 2,
  text: 'The soup was cold.',
  author: 'Sam',
  time: 'March-2024',
  sentiment: 'negative',
  response: 'Dear Sam, we are sorry about the soup.',
  approvalStatus: 'pending',
  ...overrides,
});

export const makeSession = (items: ReviewItem[], overrides: Partial<Session> = {}): Session => ({
  episodeId: 'episode-1',
  restaurantName: 'Test Bistro',
  items,
  cursor: 0,
  lifecycle: items.length === 0 ? 'completed' : 'initialized',
  awaitingFeedback: false,
  totalAnalyzed: items.length,
  excludedCount: 0,
  createdAt: new Date('2024-03-01T00:00:00Z'),
  ...overrides,
});

export const makeRecord = (overrides: Partial<AnalyzedReviewRecord> = {}): AnalyzedReviewRecord => ({
  rating: 2,
  text: 'Waited forever for a table.',
  author: 'Alex',
  time: 'March-2024',
  sentiment: 'negative',
  response: 'Dear Alex, thank you for your patience.',
  approval_status: 'approved',
  ...overrides,
});

export const makeBatch = (records: AnalyzedReviewRecord[], overrides: Partial<AnalysisBatch> = {}): AnalysisBatch => ({
  status: 'success',
  restaurant_name: 'Test Bistro',
  total_analyzed_reviews: records.length,
  analyzed_reviews: records,
  ...overrides,
});

export const testSettings = (overrides: Partial<EngineSettings> = {}): EngineSettings => ({
  templates: { reviewStart: '', reviewActions: '', completion: '', welcome: '' },
  restaurantName: 'Test Bistro',
  numReviews: 5,
  managerName: 'Jordan',
  presentDelayMs: 0,
  maxMessageLength: 1500,
  ...overrides,
});

export interface Harness {
  engine: ApprovalEngine;
  store: InMemorySessionStore;
  messenger: RecordingMessenger;
  queue: IngestionQueue;
  coordinator: IngestionCoordinator;
  classifyCalls: string[];
  revisionCalls: RevisionRequest[];
  runCalls: string[];
}

export interface HarnessOptions {
  classify?: (message: string) => Intent | Promise<Intent>;
  revise?: (request: RevisionRequest) => string | Promise<string>;
  run?: () => AnalysisBatch | Promise<AnalysisBatch>;
  advisorLLM?: TextGenerator;
  settings?: Partial<EngineSettings>;
  episodeIds?: string[];
}

export const makeHarness = (options: HarnessOptions = {}): Harness => {
  const store = new InMemorySessionStore();
  const messenger = new RecordingMessenger();
  const queue = new IngestionQueue(store, 1);
  const episodeIds = [...(options.episodeIds ?? ['episode-a', 'episode-b', 'episode-c'])];
  const coordinator = new IngestionCoordinator(store, {
    ratingThreshold: 3,
    now: () => new Date('2024-06-15T12:00:00Z'),
    newEpisodeId: () => episodeIds.shift() ?? 'episode-x',
  });
  const classifyCalls: string[] = [];
  const revisionCalls: RevisionRequest[] = [];
  const runCalls: string[] = [];

  const classifier: IntentClassifier = {
    classify: async (message) => {
      classifyCalls.push(message);
      return options.classify ? options.classify(message) : { type: 'UNCLEAR' };
    },
  };
  const revision: RevisionPipeline = {
    revise: async (request) => {
      revisionCalls.push(request);
      return options.revise ? options.revise(request) : 'Revised reply.';
    },
  };

  const engine = new ApprovalEngine({
    store,
    messenger,
    queue,
    coordinator,
    classifier,
    revision,
    pipeline: {
      run: async (restaurantName) => {
        runCalls.push(restaurantName);
        return options.run ? options.run() : makeBatch([makeRecord()]);
      },
    },
    advisor: new AdvisorService(store, options.advisorLLM ?? new StubLLM(() => 'Try a weekday special.')),
    settings: testSettings(options.settings),
    now: () => new Date('2024-06-15T12:00:00Z'),
  });

  return { engine, store, messenger, queue, coordinator, classifyCalls, revisionCalls, runCalls };
};

export interface MockRes {
  statusCode: number;
  body: unknown;
  status: (code: number) => MockRes;
  json: (obj: unknown) => MockRes;
}

export const makeRes = (): MockRes => {
  const res: MockRes = {
    statusCode: 200,
    body: undefined,
    status: (code: number) => {
      res.statusCode = code;
      return res;
    },
    json: (obj: unknown) => {
      res.body = obj;
      return res;
    },
  };
  return res;
};

type Handler = (req: unknown, res: unknown, next: (err?: unknown) => void) => unknown;

interface RouteLayer {
  route: { path: string; methods: Record<string, boolean>; stack: Array<{ handle: Handler }> };
}

const isRouteLayer = (value: unknown): value is RouteLayer =>
  typeof value === 'object' && value !== null && 'route' in value && typeof value.route === 'object' && !!value.route;

/** Invokes a route's handlers directly, without an HTTP server. */
export const runRoute = async (
  router: Router,
  method: 'get' | 'post',
  path: string,
  req: { params?: Record<string, string>; body?: unknown }
): Promise<MockRes> => {
  const layers: unknown[] = router.stack;
  const layer = layers.filter(isRouteLayer).find((l) => l.route.path === path && l.route.methods[method]);
  if (!layer) throw new Error(`Route not found: ${method.toUpperCase()} ${path}`);

  const res = makeRes();
  const request = { params: {}, ...req };
  for (const { handle } of layer.route.stack) {
    let calledNext = false;
    await handle(request, res, (err?: unknown) => {
      if (err) throw err;
      calledNext = true;
    });
    if (!calledNext) break;
  }
  return res;
};
