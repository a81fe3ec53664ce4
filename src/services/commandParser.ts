/**
 * Deterministic command parsing for manager messages.
 * Button payloads and short commands resolve here before any model call.
 */

import { Intent, SessionState } from '../types';

export type CommandType =
  | 'APPROVE'
  | 'REVISE'
  | 'SUMMARY'
  | 'CONTINUE'
  | 'FETCH'
  | 'RESET'
  | 'ADVICE'
  | 'EXIT'
  | 'FEEDBACK' // free text while waiting for revision feedback
  | 'UNKNOWN';

export interface ParsedCommand {
  type: CommandType;
  raw: string;
  body?: string;
}

const EXACT_COMMANDS: Record<string, CommandType> = {
  approve: 'APPROVE',
  revise: 'REVISE',
  edit: 'REVISE',
  summary: 'SUMMARY',
  status: 'SUMMARY',
  continue: 'CONTINUE',
  next: 'CONTINUE',
  resume: 'CONTINUE',
  'get reviews': 'FETCH',
  'fetch reviews': 'FETCH',
  fetch: 'FETCH',
  reset: 'RESET',
  'start over': 'RESET',
  advice: 'ADVICE',
  'agent advice': 'ADVICE',
  exit: 'EXIT',
};

// Typos and casual approvals. Not honoured while waiting for feedback.
const FUZZY_MAP: Record<string, CommandType> = {
  aprove: 'APPROVE',
  approv: 'APPROVE',
  aprrove: 'APPROVE',
  approved: 'APPROVE',
  yes: 'APPROVE',
  ok: 'APPROVE',
  okay: 'APPROVE',
  'looks good': 'APPROVE',
  'send it': 'APPROVE',
  '👍': 'APPROVE',
  revice: 'REVISE',
  edti: 'REVISE',
  summery: 'SUMMARY',
  sumary: 'SUMMARY',
  contine: 'CONTINUE',
  continu: 'CONTINUE',
  'get review': 'FETCH',
  'new reviews': 'FETCH',
  rest: 'RESET',
  advise: 'ADVICE',
  quit: 'EXIT',
};

// "revise: make it shorter", "edit - mention the patio"
const REVISE_PREFIX = /^(revise|edit|change)\s*[:\-–]\s*(.+)$/is;

export const normalizeCommand = (body: string): string =>
  body
    .trim()
    .toLowerCase()
    .replace(/\s+/g, ' ')
    .replace(/[.!?]+$/, '')
    .trim();

/**
 * Parse an inbound message body.
 * While the session waits for revision feedback, anything that is not an
 * exact command is taken as the feedback text.
 */
export function parseCommand(body: string, state?: SessionState): ParsedCommand {
  const raw = body.trim();
  const normalized = normalizeCommand(raw);

  const prefixed = REVISE_PREFIX.exec(raw);
  if (prefixed) {
    return { type: 'REVISE', raw, body: prefixed[2].trim() };
  }

  const exact = EXACT_COMMANDS[normalized];

  if (state === 'AWAITING_FEEDBACK') {
    if (exact) return { type: exact, raw };
    return { type: 'FEEDBACK', raw, body: raw };
  }

  if (exact) return { type: exact, raw };

  const fuzzy = FUZZY_MAP[normalized];
  if (fuzzy) return { type: fuzzy, raw };

  return { type: 'UNKNOWN', raw };
}

/** Review-workflow intent for a parsed command; null for mode switches and unknown text. */
export const commandToIntent = (command: ParsedCommand): Intent | null => {
  switch (command.type) {
    case 'APPROVE':
      return { type: 'APPROVED' };
    case 'REVISE':
      return { type: 'REVISION', feedback: command.body ?? '' };
    case 'FEEDBACK':
      return { type: 'REVISION', feedback: command.body ?? command.raw };
    case 'SUMMARY':
      return { type: 'SUMMARY' };
    case 'CONTINUE':
      return { type: 'CONTINUE' };
    case 'FETCH':
      return { type: 'FETCH' };
    case 'RESET':
      return { type: 'RESET' };
    case 'ADVICE':
    case 'EXIT':
    case 'UNKNOWN':
      return null;
  }
};
