import { randomUUID } from 'crypto';
import { z } from 'zod';
import { IngestionFailure } from '../errors';
import { ReviewItem, Session } from '../types';
import { deriveSentiment, looksRelative, normalizeReviewTime } from './reviewAnalysis';
import { SessionStore } from './sessionStore';

const RecordSchema = z
  .object({
    rating: z.unknown(),
    text: z.string().nullish(),
    author: z.string().nullish(),
    time: z.string().nullish(),
    sentiment: z.string().nullish(),
    summarized_text: z.string().nullish(),
    response: z.string().nullish(),
    approval_status: z.string().nullish(),
    manager_feedback: z.string().nullish(),
    revision_feedback: z.string().nullish(),
  })
  .passthrough();

export const AnalysisBatchSchema = z.object({
  status: z.enum(['success', 'error']),
  restaurant_name: z.string().nullish(),
  total_analyzed_reviews: z.number().int().nonnegative().nullish(),
  analyzed_reviews: z.array(RecordSchema).nullish(),
  message: z.string().nullish(),
});

type BatchRecord = z.infer<typeof RecordSchema>;

export interface IngestionOptions {
  ratingThreshold: number;
  now?: () => Date;
  newEpisodeId?: () => string;
}

export interface IngestionResult {
  session: Session;
  totalReviews: number;
  excludedCount: number;
  pendingCount: number;
  invalidCount: number;
}

const validRating = (rating: unknown): rating is number =>
  typeof rating === 'number' && Number.isInteger(rating) && rating >= 1 && rating <= 5;

const toItem = (record: BatchRecord, rating: number, now: Date): ReviewItem => {
  const time = record.time ?? '';
  const feedback = record.manager_feedback ?? record.revision_feedback ?? undefined;
  return {
    rating,
    text: record.text ?? '',
    author: record.author ?? '',
    time: looksRelative(time) ? normalizeReviewTime(time, now) : time,
    // upstream sentiment is ignored
    sentiment: deriveSentiment(rating),
    summarizedText: record.summarized_text ?? undefined,
    response: record.response ?? '',
    // stale statuses from earlier runs never carry over
    approvalStatus: 'pending',
    ...(feedback ? { managerFeedback: feedback } : {}),
  };
};

/**
 * Turns an analysis batch into a fresh Session.
 * Ratings at or below the threshold are queued for approval; the rest are
 * counted as already good. Throws IngestionFailure without touching state.
 */
export class IngestionCoordinator {
  constructor(
    private readonly store: SessionStore,
    private readonly options: IngestionOptions
  ) {}

  prepare(input: unknown): IngestionResult {
    const parsed = AnalysisBatchSchema.safeParse(input);
    if (!parsed.success) {
      throw new IngestionFailure(
        'Malformed analysis batch',
        parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
      );
    }
    const batch = parsed.data;
    if (batch.status === 'error') {
      throw new IngestionFailure(batch.message || 'Review analysis failed');
    }

    const now = this.options.now?.() ?? new Date();
    const records = batch.analyzed_reviews ?? [];
    const queued: ReviewItem[] = [];
    let excludedCount = 0;
    let invalidCount = 0;

    for (const record of records) {
      if (!validRating(record.rating)) {
        invalidCount += 1;
        continue;
      }
      if (record.rating <= this.options.ratingThreshold) {
        queued.push(toItem(record, record.rating, now));
      } else {
        excludedCount += 1;
      }
    }

    const totalReviews = records.length;
    const session: Session = {
      episodeId: this.options.newEpisodeId?.() ?? randomUUID(),
      restaurantName: batch.restaurant_name ?? '',
      items: queued,
      cursor: 0,
      lifecycle: queued.length === 0 ? 'completed' : 'initialized',
      awaitingFeedback: false,
      totalAnalyzed: totalReviews,
      excludedCount,
      createdAt: now,
    };

    return { session, totalReviews, excludedCount, pendingCount: queued.length, invalidCount };
  }

  /** Validates, then replaces the manager's session under their lock. */
  async ingest(managerId: string, input: unknown): Promise<IngestionResult> {
    const result = this.prepare(input);
    await this.store.withLock(managerId, async () => {
      await this.store.put(managerId, result.session);
      await this.store.updateRecord(managerId, { remindersSent: 0, lastReminderAt: undefined });
    });
    console.log(
      `[ingestion] ✓ ${managerId}: episode ${result.session.episodeId} with ${result.pendingCount} pending, ` +
        `${result.excludedCount} excluded, ${result.invalidCount} invalid`
    );
    return result;
  }
}
