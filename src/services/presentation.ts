/**
 * Manager-facing message text. Pure functions only: nothing here sends.
 * WhatsApp renders *text* as bold.
 */

import { ReviewItem, Session, SummaryCounts } from '../types';

export const NOTICES = {
  fetching: `I'm fetching the latest reviews for your restaurant. This may take a minute or two...`,
  stillFetching: `I'm still fetching your reviews. I'll message you as soon as they're ready.`,
  clarify: `Sorry, I couldn't tell whether you approve this response. Reply "approve" to accept it, or tell me what to change.`,
  feedbackPrompt: `What would you like changed in this response? Send your feedback and I'll revise it.`,
  revising: `Got it. I'm revising the response based on your feedback...`,
  actionsPrompt: `Reply "approve" to accept this response, "revise" to request changes, or "summary" to see your progress.`,
  nextSteps: `What would you like to do next? Reply "get reviews" for a fresh batch, "summary" for your progress, or "advice" to talk to our restaurant expert.`,
  adviceWelcome: `👋 Welcome to Agent Advice! I'm your restaurant industry expert. Ask me anything about operations, customer service, marketing or staff. Type "exit" anytime to return to the main menu.`,
  adviceExit: `You're being returned to the main menu. You can always come back for more advice by typing "advice".`,
  adviceError: `I apologize, but I ran into a problem answering that. Please try again or type "exit" to return to the main menu.`,
  revisionFailed: `I couldn't revise the response right now. The previous draft is unchanged; try again or reply "approve" to keep it.`,
  sessionCleared: `Your review session has been cleared. Say "get reviews" whenever you want a fresh batch.`,
  staleMessage: `Your review list changed while I was reading your message. Here's where we are now:`,
  noRestaurant: `No restaurant is configured for review fetching yet. Please contact support.`,
  welcome: `I'm here to help with your review management. You can say "get reviews" to fetch new reviews, "continue" to review responses, "summary" to see your progress, or "advice" to talk to our restaurant expert.`,
} as const;

export const stars = (rating: number): string => '⭐'.repeat(Math.max(0, Math.min(5, Math.round(rating))));

const truncate = (text: string, max: number): string => {
  if (text.length <= max) return text;
  if (max <= 1) return '…';
  return `${text.slice(0, max - 1).trimEnd()}…`;
};

export const formatReviewItem = (item: ReviewItem, index: number, total: number, maxLength = 1500): string => {
  const render = (text: string, response: string) =>
    [
      `*Review ${index + 1} of ${total}*`,
      '',
      `*From:* ${item.author || 'Customer'}`,
      `*Rating:* ${stars(item.rating)}`,
      '',
      '*Original Review:*',
      `"${text}"`,
      '',
      '*Suggested Response:*',
      response,
    ].join('\n');

  const full = render(item.text, item.response);
  if (full.length <= maxLength) return full;

  // Shorten the quoted review first; the proposed response is what gets approved.
  const reviewRoom = maxLength - render('', item.response).length;
  if (reviewRoom >= 1) return render(truncate(item.text, reviewRoom), item.response);

  const responseRoom = maxLength - render('…', '').length;
  if (responseRoom >= 1) return render('…', truncate(item.response, responseRoom));
  return truncate(render('…', ''), maxLength);
};

export const formatRevisedResponse = (response: string): string =>
  [`I've revised the response based on your feedback:`, '', '*Revised Response:*', response].join('\n');

export const summarizeSession = (session: Session | undefined): SummaryCounts => {
  const items = session?.items ?? [];
  const count = (status: ReviewItem['approvalStatus']) => items.filter((i) => i.approvalStatus === status).length;
  const cursor = session?.cursor ?? 0;
  return {
    total: items.length,
    approved: count('approved'),
    pending: count('pending'),
    needsRevision: count('needs_revision'),
    currentIndex: cursor,
    completed: !!session && (session.lifecycle === 'completed' || cursor >= items.length),
  };
};

/** 1-based position, clamped to the queue length. */
export const currentPosition = (counts: SummaryCounts): number =>
  counts.total === 0 ? 0 : Math.min(counts.currentIndex + 1, counts.total);

export const formatSummary = (counts: SummaryCounts): string =>
  [
    '*Review Progress Summary*',
    '',
    `Total Reviews: ${counts.total}`,
    `Approved: ${counts.approved}`,
    `Pending: ${counts.pending}`,
    `Needs Revision: ${counts.needsRevision}`,
    `Current Review: ${currentPosition(counts)} of ${counts.total}`,
    '',
    counts.completed
      ? 'All reviews are done. Type "reset" to start over.'
      : 'Type "continue" to resume reviewing',
  ].join('\n');

export const formatCompletion = (counts: SummaryCounts): string =>
  [
    '*All reviews have been processed!*',
    '',
    '*Summary:*',
    `Total Reviews: ${counts.total}`,
    `Approved: ${counts.approved}`,
    '',
    'Thank you for reviewing these responses. The approved responses will be sent to customers.',
    'Type "get reviews" for a fresh batch or "reset" to clear this session.',
  ].join('\n');

export const formatIngestionStart = (params: {
  restaurantName: string;
  totalReviews: number;
  excludedCount: number;
  pendingCount: number;
}): string =>
  [
    `*Reviews ready for ${params.restaurantName || 'your restaurant'}*`,
    '',
    `Total reviews analyzed: ${params.totalReviews}`,
    `Already good (no action needed): ${params.excludedCount}`,
    `Waiting for your approval: ${params.pendingCount}`,
  ].join('\n');

export const formatWelcome = (managerName: string): string =>
  managerName ? `Hi ${managerName}! ${NOTICES.welcome}` : NOTICES.welcome;

export const formatIngestionFailure = (message: string): string =>
  `I encountered an error while fetching reviews: ${message}`;

export const formatReminder = (counts: SummaryCounts): string =>
  `Reminder: you still have ${counts.pending + counts.needsRevision} review response(s) waiting. ` +
  `You're on review ${currentPosition(counts)} of ${counts.total}. Type "continue" to pick up where you left off.`;
