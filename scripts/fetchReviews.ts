import dotenv from 'dotenv';
import { loadConfig } from '../src/config';
import { errorMessage } from '../src/errors';
import { PlacesClient } from '../src/services/googlePlaces';
import { LLMService } from '../src/services/llmService';
import { PlacesReviewSource, ReviewPipeline } from '../src/services/reviewPipeline';

dotenv.config();

// Usage: npm run fetch-reviews -- "Restaurant Name" [count]
const main = async () => {
  const config = loadConfig();
  const restaurantName = process.argv[2] || config.workflow.restaurantName;
  const limit = Number(process.argv[3] || config.workflow.numReviews);

  if (!restaurantName) {
    console.error('❌ Pass a restaurant name or set RESTAURANT_NAME');
    process.exit(1);
  }

  const places = new PlacesClient(config.placesApiKey);
  if (!places.isConfigured()) {
    console.error('❌ GOOGLE_PLACES_API_KEY is not configured');
    process.exit(1);
  }

  console.log(`Fetching up to ${limit} reviews for ${restaurantName}...`);
  const pipeline = new ReviewPipeline(new PlacesReviewSource(places), new LLMService(config.llm));
  const batch = await pipeline.run(restaurantName, limit);

  if (batch.status === 'error') {
    console.error(`❌ ${batch.message}`);
    process.exit(1);
  }

  const threshold = config.workflow.ratingThreshold;
  const needsApproval = batch.analyzed_reviews.filter((r) => r.rating !== null && r.rating <= threshold).length;
  console.log(`✓ ${batch.total_analyzed_reviews} reviews analyzed, ${needsApproval} at or below ${threshold}★`);
  console.log(JSON.stringify(batch, null, 2));
};

main().catch((e: unknown) => {
  console.error('❌ Fetch failed:', errorMessage(e));
  process.exit(1);
});
