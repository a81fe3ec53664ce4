export interface ResponsePromptReview {
  index: number;
  author: string;
  rating: number;
  sentiment: string;
  text: string;
}

export const RESPONSE_SYSTEM =
  'You are an experienced restaurant manager who writes personal, empathetic replies to customer reviews.';

/**
 * One call for the whole batch. The model answers with
 * {"reviews":[{"index":0,"summary":"...","response":"..."}]}.
 */
export const responsePrompt = (restaurantName: string, reviews: ResponsePromptReview[]) => {
  const rules = `
Restaurant: ${restaurantName}

For EACH review below:
1. Write "summary": a concise two-line summary capturing the key points and sentiment.
2. Write "response": a reply from the restaurant that
   - addresses the customer by name
   - references their specific feedback (dishes, service, staff), never generic
   - for negative experiences shows sincere concern, offers a concrete step and invites them back
   - for positive experiences thanks them for the specific compliments
   - has a greeting, 1-3 short paragraphs, and a sign-off from the Restaurant Manager
   - varies in wording across reviews
`;

  const block = reviews
    .map(
      (r) => `
Review ${r.index}:
- Author: ${r.author || 'Customer'}
- Rating: ${r.rating}
- Sentiment: ${r.sentiment}
- Text: ${r.text || '(no comment)'}`
    )
    .join('\n');

  return `
${rules}
${block}

Return JSON only, shaped as {"reviews":[{"index":<number>,"summary":"...","response":"..."}]}.
`.trim();
};
