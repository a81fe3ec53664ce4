import { z } from 'zod';
import { errorMessage } from '../errors';
import { RESPONSE_SYSTEM, responsePrompt } from '../prompts/responsePrompt';
import { AnalysisBatch, AnalyzedReviewRecord, Sentiment } from '../types';
import { PlacesClient } from './googlePlaces';
import { TextGenerator } from './llmService';
import { deriveSentiment, normalizeReviewTime } from './reviewAnalysis';

export interface RawReview {
  rating: number | null;
  text: string;
  author: string;
  time: string;
}

export interface FetchedReviews {
  restaurantName: string;
  reviews: RawReview[];
}

export interface ReviewSource {
  fetchReviews(restaurantName: string, limit: number): Promise<FetchedReviews>;
}

export class PlacesReviewSource implements ReviewSource {
  constructor(private readonly places: PlacesClient) {}

  async fetchReviews(restaurantName: string, limit: number): Promise<FetchedReviews> {
    const [place] = await this.places.searchText(restaurantName, 1);
    if (!place?.id) throw new Error(`No place found for "${restaurantName}"`);

    const details = await this.places.getPlaceDetails(place.id);
    const reviews = (details.reviews || []).slice(0, limit).map((r) => ({
      rating: typeof r.rating === 'number' ? r.rating : null,
      text: r.text?.text || r.originalText?.text || '',
      author: r.authorAttribution?.displayName || '',
      time: r.relativePublishTimeDescription || '',
    }));

    return { restaurantName: details.displayName?.text || place.displayName?.text || restaurantName, reviews };
  }
}

const DraftsSchema = z.object({
  reviews: z.array(
    z.object({
      index: z.number().int(),
      summary: z.string().optional(),
      response: z.string().optional(),
    })
  ),
});

export const defaultResponse = (author: string, sentiment: Sentiment, restaurantName: string): string => {
  const greeting = `Dear ${author || 'Valued Guest'},`;
  const body =
    sentiment === 'negative'
      ? `Thank you for sharing your experience at ${restaurantName}. We're sorry we fell short this time, and we'd like to make it right. Please reach out to us directly so we can follow up, and we hope to welcome you back soon.`
      : sentiment === 'neutral'
        ? `Thank you for visiting ${restaurantName} and for your honest feedback. We're always working to improve, and we hope your next visit is even better.`
        : `Thank you so much for your kind words about ${restaurantName}! We're delighted you enjoyed your visit and look forward to seeing you again.`;
  return `${greeting}\n\n${body}\n\nWarm regards,\nRestaurant Manager`;
};

/**
 * Fetch -> analyze -> draft. Never throws: failures come back as a batch
 * with status "error" so the coordinator can report them.
 */
export class ReviewPipeline {
  constructor(
    private readonly source: ReviewSource,
    private readonly llm: TextGenerator,
    private readonly now: () => Date = () => new Date()
  ) {}

  async run(restaurantName: string, limit: number): Promise<AnalysisBatch> {
    let fetched: FetchedReviews;
    try {
      fetched = await this.source.fetchReviews(restaurantName, limit);
    } catch (error: unknown) {
      console.error('[pipeline] ❌ Review fetch failed:', errorMessage(error));
      return {
        status: 'error',
        restaurant_name: restaurantName,
        total_analyzed_reviews: 0,
        analyzed_reviews: [],
        message: `Failed to fetch reviews: ${errorMessage(error)}`,
      };
    }

    const now = this.now();
    const analyzed: AnalyzedReviewRecord[] = fetched.reviews.map((r) => {
      const sentiment = r.rating === null ? undefined : deriveSentiment(r.rating);
      return {
        rating: r.rating,
        text: r.text,
        author: r.author,
        time: normalizeReviewTime(r.time, now),
        sentiment,
        response: defaultResponse(r.author, sentiment ?? 'neutral', fetched.restaurantName),
        approval_status: 'pending',
      };
    });

    await this.draft(fetched.restaurantName, analyzed);
    console.log(`[pipeline] ✓ Analyzed ${analyzed.length} reviews for ${fetched.restaurantName}`);

    return {
      status: 'success',
      restaurant_name: fetched.restaurantName,
      total_analyzed_reviews: analyzed.length,
      analyzed_reviews: analyzed,
    };
  }

  /** Fills summaries and responses in place; keeps the defaults when the model fails. */
  private async draft(restaurantName: string, records: AnalyzedReviewRecord[]): Promise<void> {
    if (records.length === 0) return;
    const prompt = responsePrompt(
      restaurantName,
      records.map((r, index) => ({
        index,
        author: r.author,
        rating: r.rating ?? 0,
        sentiment: r.sentiment ?? 'neutral',
        text: r.text,
      }))
    );

    try {
      const res = await this.llm.generate({ system: RESPONSE_SYSTEM, prompt, responseFormat: 'json' });
      const drafts = DraftsSchema.parse(JSON.parse(res.content));
      for (const d of drafts.reviews) {
        const record = records[d.index];
        if (!record) continue;
        if (d.summary?.trim()) record.summarized_text = d.summary.trim();
        if (d.response?.trim()) record.response = d.response.trim();
      }
    } catch (error: unknown) {
      console.warn('[pipeline] Drafting failed, using default responses:', errorMessage(error));
    }
  }
}
