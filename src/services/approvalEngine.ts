import { AppConfig, TemplateIds } from '../config';
import { IngestionFailure, errorMessage } from '../errors';
import {
  AnalysisBatch,
  Intent,
  OutboundAction,
  RevisionRequest,
  Session,
  SessionContext,
  SessionState,
  SummaryCounts,
} from '../types';
import { AdvisorService } from './advisorService';
import { commandToIntent, parseCommand } from './commandParser';
import { IngestionCoordinator, IngestionResult } from './ingestionCoordinator';
import { IntentClassifier } from './intentClassifier';
import { IngestionQueue } from './ingestionQueue';
import { Messenger, dispatchActions } from './messaging';
import {
  NOTICES,
  formatCompletion,
  formatIngestionFailure,
  formatIngestionStart,
  formatReviewItem,
  formatRevisedResponse,
  formatSummary,
  formatWelcome,
  summarizeSession,
} from './presentation';
import { RevisionPipeline } from './revisionService';
import { SessionChange, Transition, deriveState, transition } from './sessionMachine';
import { SessionStore } from './sessionStore';

export interface EngineSettings {
  templates: TemplateIds;
  restaurantName: string;
  numReviews: number;
  managerName: string;
  presentDelayMs: number;
  maxMessageLength: number;
}

export const engineSettings = (config: AppConfig): EngineSettings => ({
  templates: config.templates,
  restaurantName: config.workflow.restaurantName,
  numReviews: config.workflow.numReviews,
  managerName: config.workflow.managerName,
  presentDelayMs: config.workflow.presentDelayMs,
  maxMessageLength: config.workflow.maxMessageLength,
});

export interface AnalysisRunner {
  run(restaurantName: string, limit: number): Promise<AnalysisBatch>;
}

export interface ApprovalEngineDeps {
  store: SessionStore;
  classifier: IntentClassifier;
  revision: RevisionPipeline;
  coordinator: IngestionCoordinator;
  pipeline: AnalysisRunner;
  queue: IngestionQueue;
  messenger: Messenger;
  advisor: AdvisorService;
  settings: EngineSettings;
  now?: () => Date;
}

export interface InboundResult {
  state: SessionState;
  actions: OutboundAction[];
}

export interface SessionOverview {
  managerId: string;
  state: SessionState;
  restaurantName?: string;
  episodeId?: string;
  summary: SummaryCounts;
  mode: string;
  ingestionInFlight: boolean;
}

interface PendingRevision {
  episodeId: string;
  index: number;
  feedback: string;
  request: RevisionRequest;
}

interface Plan {
  state: SessionState;
  actions: OutboundAction[];
  fetch: boolean;
  revision?: PendingRevision;
}

interface Snapshot {
  episodeId: string;
  cursor: number;
  awaitingFeedback: boolean;
  context: SessionContext;
}

type FirstPass =
  | { kind: 'planned'; plan: Plan }
  | { kind: 'advice' }
  | { kind: 'classify'; snapshot: Snapshot };

const sessionAfter = (before: Session | undefined, change: SessionChange): Session | undefined => {
  switch (change.kind) {
    case 'unchanged':
      return before;
    case 'update':
      return change.session;
    case 'clear':
      return undefined;
  }
};

const contextOf = (session: Session | undefined): SessionContext => {
  const state = deriveState(session);
  if (!session || state === 'NO_SESSION') return { state };
  return {
    state,
    restaurantName: session.restaurantName,
    currentItem: session.items[session.cursor],
    position: Math.min(session.cursor + 1, session.items.length),
    total: session.items.length,
  };
};

/** The item a revision was requested for is still the one awaiting a decision. */
const isRevisionCurrent = (session: Session, pending: PendingRevision): boolean => {
  const item = session.items[pending.index];
  return (
    !!item &&
    session.episodeId === pending.episodeId &&
    session.cursor === pending.index &&
    !session.awaitingFeedback &&
    item.approvalStatus === 'needs_revision' &&
    item.managerFeedback === pending.feedback
  );
};

/**
 * Orchestrates one manager message: parse or classify, run the state
 * machine under the manager's lock, then send the resulting messages
 * after the lock is released.
 */
export class ApprovalEngine {
  private readonly now: () => Date;

  constructor(private readonly deps: ApprovalEngineDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  async handleInbound(managerId: string, body: string): Promise<InboundResult> {
    const { store } = this.deps;
    const text = body.trim();

    const first = await store.withLock(managerId, () => this.firstPass(managerId, text));

    if (first.kind === 'advice') {
      const reply = await this.deps.advisor.reply(managerId, text);
      const actions: OutboundAction[] = [{ kind: 'text', recipientId: managerId, text: reply }];
      await this.dispatch(actions);
      return { state: deriveState(await store.get(managerId)), actions };
    }

    let plan: Plan;
    if (first.kind === 'classify') {
      const { snapshot } = first;
      const intent = await this.deps.classifier.classify(text, snapshot.context);
      console.log(`[engine] ${managerId}: classified as ${intent.type}`);
      plan = await store.withLock(managerId, () => this.secondPass(managerId, snapshot, intent));
    } else {
      plan = first.plan;
    }

    const actions = [...plan.actions];
    await this.dispatch(plan.actions);

    if (plan.fetch) {
      actions.push(...(await this.requestFetch(managerId)));
    }
    if (plan.revision) {
      actions.push(...(await this.runRevision(managerId, plan.revision)));
    }

    return { state: plan.state, actions };
  }

  /** Queues a fetch/analyze run for the manager and returns the notice sent. */
  async requestFetch(managerId: string): Promise<OutboundAction[]> {
    const { settings, queue } = this.deps;
    let notice: string;

    if (!settings.restaurantName) {
      notice = NOTICES.noRestaurant;
    } else {
      const result = await queue.enqueue(managerId, () => this.fetchAndIngest(managerId));
      notice = result === 'queued' ? NOTICES.fetching : NOTICES.stillFetching;
    }

    const actions: OutboundAction[] = [{ kind: 'text', recipientId: managerId, text: notice }];
    await this.dispatch(actions);
    return actions;
  }

  /**
   * Installs a pre-analyzed batch as the manager's new session and
   * announces it. Throws IngestionFailure after notifying the manager.
   */
  async ingestBatch(managerId: string, batch: unknown): Promise<IngestionResult> {
    let result: IngestionResult;
    try {
      result = await this.deps.coordinator.ingest(managerId, batch);
    } catch (error: unknown) {
      const message = errorMessage(error);
      console.error(`[ingestion] ❌ ${managerId}: ${message}`);
      await this.dispatch([{ kind: 'text', recipientId: managerId, text: formatIngestionFailure(message) }]);
      throw error instanceof IngestionFailure ? error : new IngestionFailure(message);
    }

    await this.dispatch(this.announce(managerId, result));
    return result;
  }

  async describe(managerId: string): Promise<SessionOverview> {
    const record = await this.deps.store.getRecord(managerId);
    return {
      managerId,
      state: deriveState(record.session),
      restaurantName: record.session?.restaurantName,
      episodeId: record.session?.episodeId,
      summary: summarizeSession(record.session),
      mode: record.mode,
      ingestionInFlight: record.ingestionInFlight,
    };
  }

  private async fetchAndIngest(managerId: string): Promise<void> {
    const { settings, pipeline } = this.deps;
    const batch = await pipeline.run(settings.restaurantName, settings.numReviews);
    try {
      await this.ingestBatch(managerId, batch);
    } catch (error: unknown) {
      // already reported to the manager
      if (!(error instanceof IngestionFailure)) throw error;
    }
  }

  private async firstPass(managerId: string, text: string): Promise<FirstPass> {
    const { store } = this.deps;
    const record = await store.updateRecord(managerId, {
      lastActivity: this.now(),
      remindersSent: 0,
      lastReminderAt: undefined,
    });
    const session = record.session;
    const state = deriveState(session);
    const command = parseCommand(text, state);

    if (record.mode === 'advice') {
      if (command.type !== 'EXIT') return { kind: 'advice' };
      await store.updateRecord(managerId, { mode: 'review', memory: [] });
      console.log(`[engine] ${managerId}: left advice mode`);
      return {
        kind: 'planned',
        plan: {
          state,
          fetch: false,
          actions: [{ kind: 'text', recipientId: managerId, text: NOTICES.adviceExit }, this.welcomeAction(managerId)],
        },
      };
    }

    if (command.type === 'ADVICE') {
      await store.updateRecord(managerId, { mode: 'advice' });
      console.log(`[engine] ${managerId}: entered advice mode`);
      return {
        kind: 'planned',
        plan: { state, fetch: false, actions: [{ kind: 'text', recipientId: managerId, text: NOTICES.adviceWelcome }] },
      };
    }

    if (command.type === 'EXIT') {
      return { kind: 'planned', plan: { state, fetch: false, actions: [this.welcomeAction(managerId)] } };
    }

    const intent = commandToIntent(command);
    if (intent) return { kind: 'planned', plan: await this.apply(managerId, session, intent) };

    // Only a pending decision needs the model; every other state ignores free text.
    if (session && state === 'AWAITING_DECISION') {
      return {
        kind: 'classify',
        snapshot: {
          episodeId: session.episodeId,
          cursor: session.cursor,
          awaitingFeedback: session.awaitingFeedback,
          context: contextOf(session),
        },
      };
    }
    return { kind: 'planned', plan: await this.apply(managerId, session, { type: 'UNCLEAR' }) };
  }

  private async secondPass(managerId: string, snapshot: Snapshot, intent: Intent): Promise<Plan> {
    const session = await this.deps.store.get(managerId);
    const stale =
      !session ||
      session.episodeId !== snapshot.episodeId ||
      session.cursor !== snapshot.cursor ||
      session.awaitingFeedback !== snapshot.awaitingFeedback;

    if (stale) {
      console.log(`[engine] ${managerId}: session moved while classifying; message not applied`);
      const state = deriveState(session);
      const actions: OutboundAction[] = [{ kind: 'text', recipientId: managerId, text: NOTICES.staleMessage }];
      if (session && state !== 'NO_SESSION' && state !== 'ALL_COMPLETED') {
        actions.push(...this.presentItem(managerId, session, session.cursor));
      } else {
        actions.push({ kind: 'text', recipientId: managerId, text: formatSummary(summarizeSession(session)) });
      }
      return { state, fetch: false, actions };
    }

    return this.apply(managerId, session, intent);
  }

  /** Runs the transition and persists it. Caller holds the lock. */
  private async apply(managerId: string, session: Session | undefined, intent: Intent): Promise<Plan> {
    const t = transition(session, intent);
    const after = sessionAfter(session, t.change);

    if (t.change.kind === 'update') {
      await this.deps.store.put(managerId, t.change.session);
    } else if (t.change.kind === 'clear') {
      await this.deps.store.clear(managerId);
    }

    if (t.from !== t.to) console.log(`[engine] ${managerId}: ${t.from} -> ${t.to} (${intent.type})`);
    return this.plan(managerId, t, after);
  }

  private plan(managerId: string, t: Transition, after: Session | undefined): Plan {
    const plan: Plan = { state: t.to, actions: [], fetch: false };
    const say = (text: string) => plan.actions.push({ kind: 'text', recipientId: managerId, text });

    for (const effect of t.effects) {
      switch (effect.type) {
        case 'PRESENT_ITEM':
          plan.actions.push(...this.presentItem(managerId, after, effect.index));
          break;
        case 'REQUEST_REVISION': {
          const item = after?.items[effect.index];
          if (!after || !item) break;
          plan.revision = {
            episodeId: after.episodeId,
            index: effect.index,
            feedback: effect.feedback,
            request: { originalText: item.text, currentResponse: item.response, feedback: effect.feedback },
          };
          say(NOTICES.revising);
          break;
        }
        case 'PROMPT_FEEDBACK':
          say(NOTICES.feedbackPrompt);
          break;
        case 'CLARIFY':
          say(NOTICES.clarify);
          break;
        case 'SEND_SUMMARY':
          say(formatSummary(summarizeSession(after)));
          break;
        case 'SEND_COMPLETION':
          plan.actions.push(...this.completionActions(managerId, after));
          break;
        case 'TRIGGER_INGESTION':
          plan.fetch = true;
          break;
        case 'SESSION_CLEARED':
          say(NOTICES.sessionCleared);
          break;
      }
    }
    return plan;
  }

  private async runRevision(managerId: string, pending: PendingRevision): Promise<OutboundAction[]> {
    const { store, revision } = this.deps;
    let revised: string | undefined;
    try {
      revised = await revision.revise(pending.request);
    } catch (error: unknown) {
      console.error(`[revision] ❌ ${managerId}: ${errorMessage(error)}`);
    }

    const applied = await store.withLock(managerId, async () => {
      const current = await store.get(managerId);
      if (!current || !isRevisionCurrent(current, pending)) return false;
      if (revised === undefined) return true;
      const text = revised;
      const items = current.items.map((it, i) => (i === pending.index ? { ...it, response: text } : it));
      await store.put(managerId, { ...current, items });
      return true;
    });

    if (!applied) {
      console.log(`[revision] ${managerId}: discarding revision for item ${pending.index + 1}; session moved on`);
      return [];
    }

    const actions: OutboundAction[] = [
      {
        kind: 'text',
        recipientId: managerId,
        text: revised === undefined ? NOTICES.revisionFailed : formatRevisedResponse(revised),
      },
      this.actionsTemplate(managerId),
    ];
    await this.dispatch(actions);
    return actions;
  }

  private announce(managerId: string, result: IngestionResult): OutboundAction[] {
    const { templates } = this.deps.settings;
    const start: OutboundAction = {
      kind: 'template',
      recipientId: managerId,
      templateId: templates.reviewStart,
      variables: {
        '1': String(result.totalReviews),
        '2': String(result.excludedCount),
        '3': String(result.pendingCount),
      },
      fallbackText: formatIngestionStart({
        restaurantName: result.session.restaurantName,
        totalReviews: result.totalReviews,
        excludedCount: result.excludedCount,
        pendingCount: result.pendingCount,
      }),
    };

    if (result.pendingCount === 0) {
      return [start, ...this.completionActions(managerId, result.session)];
    }
    return [start, ...this.presentItem(managerId, result.session, 0)];
  }

  private presentItem(managerId: string, session: Session | undefined, index: number): OutboundAction[] {
    const item = session?.items[index];
    if (!session || !item) return [];
    return [
      {
        kind: 'text',
        recipientId: managerId,
        text: formatReviewItem(item, index, session.items.length, this.deps.settings.maxMessageLength),
      },
      this.actionsTemplate(managerId),
    ];
  }

  private actionsTemplate(managerId: string): OutboundAction {
    return {
      kind: 'template',
      recipientId: managerId,
      templateId: this.deps.settings.templates.reviewActions,
      variables: {},
      fallbackText: NOTICES.actionsPrompt,
      delayMs: this.deps.settings.presentDelayMs,
    };
  }

  private completionActions(managerId: string, session: Session | undefined): OutboundAction[] {
    const counts = summarizeSession(session);
    return [
      { kind: 'text', recipientId: managerId, text: formatCompletion(counts) },
      {
        kind: 'template',
        recipientId: managerId,
        templateId: this.deps.settings.templates.completion,
        variables: { '1': String(counts.total), '2': String(counts.approved) },
        fallbackText: NOTICES.nextSteps,
      },
    ];
  }

  private welcomeAction(managerId: string): OutboundAction {
    const { managerName, templates } = this.deps.settings;
    return {
      kind: 'template',
      recipientId: managerId,
      templateId: templates.welcome,
      variables: { '1': managerName || 'there' },
      fallbackText: formatWelcome(managerName),
    };
  }

  private async dispatch(actions: OutboundAction[]): Promise<void> {
    if (actions.length === 0) return;
    await dispatchActions(this.deps.messenger, actions);
  }
}
