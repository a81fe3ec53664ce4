import { SessionContext } from '../types';

export const INTENT_LABELS = ['APPROVED', 'REVISION', 'UNCLEAR'] as const;

export const intentPrompt = (message: string, context: SessionContext) => {
  const current = context.currentItem
    ? `
The manager is looking at review ${context.position ?? '?'} of ${context.total ?? '?'}${
        context.restaurantName ? ` for ${context.restaurantName}` : ''
      }.
- Customer review: "${context.currentItem.text}"
- Proposed response: "${context.currentItem.response}"
`
    : '';

  return `
You classify WhatsApp replies from a restaurant manager who is approving AI-drafted responses to customer reviews.
${current}
Manager message: "${message}"

Classify the message into EXACTLY ONE of these categories:
1. APPROVED - the manager accepts the response (examples: "looks good", "approve", "yes", "good", "👍", "this is good", "perfect", "send it")
2. REVISION - the manager wants the response changed (examples: "make it shorter", "offer a discount", "mention the new menu", "too formal")
3. UNCLEAR - the message is ambiguous or unrelated (examples: "hmm", "maybe", "i don't know", "what do you think?")

Return ONLY the intent identifier (${INTENT_LABELS.join(', ')}) without any explanation or additional text.
`.trim();
};
