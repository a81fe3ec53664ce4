import { Intent, Session, SessionState } from '../types';

export type Effect =
  | { type: 'PRESENT_ITEM'; index: number }
  | { type: 'REQUEST_REVISION'; index: number; feedback: string }
  | { type: 'PROMPT_FEEDBACK' }
  | { type: 'CLARIFY' }
  | { type: 'SEND_SUMMARY' }
  | { type: 'SEND_COMPLETION' }
  | { type: 'TRIGGER_INGESTION' }
  | { type: 'SESSION_CLEARED' };

export type SessionChange =
  | { kind: 'unchanged' }
  | { kind: 'update'; session: Session }
  | { kind: 'clear' };

export interface Transition {
  from: SessionState;
  to: SessionState;
  change: SessionChange;
  effects: Effect[];
}

export const deriveState = (session: Session | undefined): SessionState => {
  if (!session) return 'NO_SESSION';
  if (session.lifecycle === 'completed' || session.cursor >= session.items.length) return 'ALL_COMPLETED';
  if (session.awaitingFeedback) return 'AWAITING_FEEDBACK';
  return 'AWAITING_DECISION';
};

const copySession = (session: Session): Session => ({
  ...session,
  items: session.items.map((item) => ({ ...item })),
});

const unchanged = (state: SessionState, effects: Effect[]): Transition => ({
  from: state,
  to: state,
  change: { kind: 'unchanged' },
  effects,
});

const approveCurrent = (from: SessionState, session: Session): Transition => {
  const next = copySession(session);
  next.items[next.cursor] = { ...next.items[next.cursor], approvalStatus: 'approved' };
  next.cursor += 1;
  next.awaitingFeedback = false;

  if (next.cursor >= next.items.length) {
    next.lifecycle = 'completed';
    return { from, to: 'ALL_COMPLETED', change: { kind: 'update', session: next }, effects: [{ type: 'SEND_COMPLETION' }] };
  }
  return {
    from,
    to: 'AWAITING_DECISION',
    change: { kind: 'update', session: next },
    effects: [{ type: 'PRESENT_ITEM', index: next.cursor }],
  };
};

const requestRevision = (from: SessionState, session: Session, feedback: string): Transition => {
  const next = copySession(session);
  const current = next.items[next.cursor];
  const trimmed = feedback.trim();

  if (!trimmed) {
    next.items[next.cursor] = { ...current, approvalStatus: 'needs_revision' };
    next.awaitingFeedback = true;
    return {
      from,
      to: 'AWAITING_FEEDBACK',
      change: { kind: 'update', session: next },
      effects: [{ type: 'PROMPT_FEEDBACK' }],
    };
  }

  next.items[next.cursor] = { ...current, approvalStatus: 'needs_revision', managerFeedback: trimmed };
  next.awaitingFeedback = false;
  return {
    from,
    to: 'AWAITING_DECISION',
    change: { kind: 'update', session: next },
    effects: [{ type: 'REQUEST_REVISION', index: next.cursor, feedback: trimmed }],
  };
};

const completedTransition = (session: Session, intent: Intent): Transition => {
  switch (intent.type) {
    case 'RESET':
      return { from: 'ALL_COMPLETED', to: 'NO_SESSION', change: { kind: 'clear' }, effects: [{ type: 'SESSION_CLEARED' }] };
    case 'FETCH':
      return {
        from: 'ALL_COMPLETED',
        to: 'NO_SESSION',
        change: { kind: 'clear' },
        effects: [{ type: 'TRIGGER_INGESTION' }],
      };
    case 'SUMMARY':
      return unchanged('ALL_COMPLETED', [{ type: 'SEND_SUMMARY' }]);
    default: {
      // cursor may have run past the end without the flag being set
      if (session.lifecycle !== 'completed') {
        return {
          from: 'ALL_COMPLETED',
          to: 'ALL_COMPLETED',
          change: { kind: 'update', session: { ...copySession(session), lifecycle: 'completed', awaitingFeedback: false } },
          effects: [{ type: 'SEND_COMPLETION' }],
        };
      }
      return unchanged('ALL_COMPLETED', [{ type: 'SEND_COMPLETION' }]);
    }
  }
};

/**
 * Computes the next state for one classified message. Pure: the input
 * session is never mutated, and every state/intent pair has an outcome.
 */
export const transition = (session: Session | undefined, intent: Intent): Transition => {
  const state = deriveState(session);

  if (!session || state === 'NO_SESSION') {
    return unchanged('NO_SESSION', [{ type: 'TRIGGER_INGESTION' }]);
  }

  if (state === 'ALL_COMPLETED') {
    return completedTransition(session, intent);
  }

  switch (intent.type) {
    case 'APPROVED':
      return approveCurrent(state, session);
    case 'REVISION':
      return requestRevision(state, session, intent.feedback);
    case 'UNCLEAR':
      return unchanged(state, [{ type: state === 'AWAITING_FEEDBACK' ? 'PROMPT_FEEDBACK' : 'CLARIFY' }]);
    case 'SUMMARY':
      return unchanged(state, [{ type: 'SEND_SUMMARY' }]);
    case 'CONTINUE':
      return unchanged(state, [{ type: 'PRESENT_ITEM', index: session.cursor }]);
    case 'FETCH':
      return unchanged(state, [{ type: 'TRIGGER_INGESTION' }]);
    case 'RESET':
      return { from: state, to: 'NO_SESSION', change: { kind: 'clear' }, effects: [{ type: 'SESSION_CLEARED' }] };
  }
};
