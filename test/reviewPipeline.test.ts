import { describe, expect, it } from 'vitest';
import { PlacesClient, PlacesPlaceDetails } from '../src/services/googlePlaces';
import {
  FetchedReviews,
  PlacesReviewSource,
  ReviewPipeline,
  ReviewSource,
  defaultResponse,
} from '../src/services/reviewPipeline';
import { StubLLM } from './helpers';

const now = () => new Date('2024-06-15T12:00:00Z');

const sourceOf = (fetched: FetchedReviews): ReviewSource => ({ fetchReviews: async () => fetched });

const fetched: FetchedReviews = {
  restaurantName: 'Test Bistro',
  reviews: [
    { rating: 2, text: 'Cold soup.', author: 'Sam', time: '3 weeks ago' },
    { rating: 5, text: 'Lovely evening.', author: '', time: 'a month ago' },
  ],
};

class FakePlaces extends PlacesClient {
  searches: string[] = [];

  constructor(
    private readonly place: PlacesPlaceDetails | undefined,
    private readonly details: PlacesPlaceDetails
  ) {
    super('test-key');
  }

  async searchText(textQuery: string): Promise<PlacesPlaceDetails[]> {
    this.searches.push(textQuery);
    return this.place ? [this.place] : [];
  }

  async getPlaceDetails(): Promise<PlacesPlaceDetails> {
    return this.details;
  }
}

describe('ReviewPipeline', () => {
  it('analyzes fetched reviews and takes drafts from the model', async () => {
    const llm = new StubLLM(() =>
      JSON.stringify({ reviews: [{ index: 0, summary: 'Soup arrived cold', response: 'Dear Sam, sorry!' }] })
    );
    const batch = await new ReviewPipeline(sourceOf(fetched), llm, now).run('Test Bistro', 10);

    expect(llm.calls[0].responseFormat).toBe('json');
    expect(batch).toEqual({
      status: 'success',
      restaurant_name: 'Test Bistro',
      total_analyzed_reviews: 2,
      analyzed_reviews: [
        {
          rating: 2,
          text: 'Cold soup.',
          author: 'Sam',
          time: 'May-2024',
          sentiment: 'negative',
          summarized_text: 'Soup arrived cold',
          response: 'Dear Sam, sorry!',
          approval_status: 'pending',
        },
        {
          rating: 5,
          text: 'Lovely evening.',
          author: '',
          time: 'May-2024',
          sentiment: 'positive',
          response: defaultResponse('', 'positive', 'Test Bistro'),
          approval_status: 'pending',
        },
      ],
    });
  });

  it('keeps default responses when the model reply is not usable', async () => {
    const batch = await new ReviewPipeline(sourceOf(fetched), new StubLLM(() => 'not json'), now).run('Test Bistro', 10);

    expect(batch.analyzed_reviews.map((r) => r.response)).toEqual([
      defaultResponse('Sam', 'negative', 'Test Bistro'),
      defaultResponse('', 'positive', 'Test Bistro'),
    ]);
  });

  it('reports a failed fetch as an error batch', async () => {
    const failing: ReviewSource = {
      fetchReviews: async () => {
        throw new Error('GOOGLE_PLACES_API_KEY is not configured');
      },
    };
    const llm = new StubLLM(() => '{}');

    const batch = await new ReviewPipeline(failing, llm, now).run('Test Bistro', 10);

    expect(batch).toEqual({
      status: 'error',
      restaurant_name: 'Test Bistro',
      total_analyzed_reviews: 0,
      analyzed_reviews: [],
      message: 'Failed to fetch reviews: GOOGLE_PLACES_API_KEY is not configured',
    });
    expect(llm.calls).toEqual([]);
  });

  it('does not call the model for an empty fetch', async () => {
    const llm = new StubLLM(() => '{}');
    const batch = await new ReviewPipeline(sourceOf({ restaurantName: 'Test Bistro', reviews: [] }), llm, now).run(
      'Test Bistro',
      10
    );
    expect(batch.status).toBe('success');
    expect(llm.calls).toEqual([]);
  });
});

describe('defaultResponse', () => {
  it('greets the author and signs off', () => {
    const text = defaultResponse('', 'negative', 'Test Bistro');
    expect(text.startsWith('Dear Valued Guest,\n\n')).toBe(true);
    expect(text.endsWith('\n\nWarm regards,\nRestaurant Manager')).toBe(true);
  });
});

describe('PlacesReviewSource', () => {
  it('maps place reviews and honours the limit', async () => {
    const places = new FakePlaces(
      { id: 'place-1', displayName: { text: 'Bistro (search)' } },
      {
        id: 'place-1',
        displayName: { text: 'Test Bistro' },
        reviews: [
          {
            rating: 4,
            text: { text: 'Nice.' },
            authorAttribution: { displayName: 'Kim' },
            relativePublishTimeDescription: '2 weeks ago',
          },
          { originalText: { text: 'Merci.' }, relativePublishTimeDescription: 'a year ago' },
          { rating: 1, text: { text: 'Nope.' } },
        ],
      }
    );

    const result = await new PlacesReviewSource(places).fetchReviews('Test Bistro', 2);

    expect(places.searches).toEqual(['Test Bistro']);
    expect(result).toEqual({
      restaurantName: 'Test Bistro',
      reviews: [
        { rating: 4, text: 'Nice.', author: 'Kim', time: '2 weeks ago' },
        { rating: null, text: 'Merci.', author: '', time: 'a year ago' },
      ],
    });
  });

  it('fails when no place matches', async () => {
    const places = new FakePlaces(undefined, {});
    await expect(new PlacesReviewSource(places).fetchReviews('Nowhere', 5)).rejects.toThrow(
      'No place found for "Nowhere"'
    );
  });
});
