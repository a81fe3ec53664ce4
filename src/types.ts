export type Sentiment = 'positive' | 'neutral' | 'negative';
export type ApprovalStatus = 'pending' | 'approved' | 'needs_revision';
export type Lifecycle = 'initialized' | 'completed';

export interface ReviewItem {
  rating: number;
  text: string;
  author: string;
  time: string; // Month-YYYY
  sentiment: Sentiment;
  summarizedText?: string;
  response: string;
  approvalStatus: ApprovalStatus;
  managerFeedback?: string;
}

export interface Session {
  episodeId: string;
  restaurantName: string;
  items: ReviewItem[];
  cursor: number;
  lifecycle: Lifecycle;
  awaitingFeedback: boolean;
  totalAnalyzed: number;
  excludedCount: number;
  createdAt: Date;
}

export type ConversationMode = 'review' | 'advice';

export interface ConversationTurn {
  input: string;
  output: string;
  at: Date;
}

/**
 * Everything kept for one manager identity. Clearing the review session
 * leaves lastActivity, mode and memory in place.
 */
export interface ManagerRecord {
  managerId: string;
  session?: Session;
  lastActivity?: Date;
  lastReminderAt?: Date;
  remindersSent: number;
  mode: ConversationMode;
  memory: ConversationTurn[];
  ingestionInFlight: boolean;
}

export type SessionState = 'NO_SESSION' | 'AWAITING_DECISION' | 'AWAITING_FEEDBACK' | 'ALL_COMPLETED';

export type Intent =
  | { type: 'APPROVED' }
  | { type: 'REVISION'; feedback: string }
  | { type: 'UNCLEAR' }
  | { type: 'FETCH' }
  | { type: 'SUMMARY' }
  | { type: 'CONTINUE' }
  | { type: 'RESET' };

export type IntentType = Intent['type'];

export interface SummaryCounts {
  total: number;
  approved: number;
  pending: number;
  needsRevision: number;
  currentIndex: number;
  completed: boolean;
}

export type OutboundAction =
  | { kind: 'text'; recipientId: string; text: string; delayMs?: number }
  | {
      kind: 'template';
      recipientId: string;
      templateId: string;
      variables: Record<string, string>;
      fallbackText: string;
      delayMs?: number;
    };

export interface InboundMessage {
  senderId: string;
  body: string;
}

/** Record shape produced by the fetch/analyze pipeline (wire format). */
export interface AnalyzedReviewRecord {
  rating: number | null;
  text: string;
  author: string;
  time: string;
  sentiment?: string;
  summarized_text?: string;
  response?: string;
  approval_status?: string;
  manager_feedback?: string;
}

export interface AnalysisBatch {
  status: 'success' | 'error';
  restaurant_name: string;
  total_analyzed_reviews: number;
  analyzed_reviews: AnalyzedReviewRecord[];
  message?: string;
}

export interface RevisionRequest {
  originalText: string;
  currentResponse: string;
  feedback: string;
}

export interface SessionContext {
  state: SessionState;
  restaurantName?: string;
  currentItem?: ReviewItem;
  position?: number;
  total?: number;
}
