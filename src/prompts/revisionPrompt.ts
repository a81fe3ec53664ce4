import { RevisionRequest } from '../types';

export const REVISION_SYSTEM =
  'You are an experienced restaurant manager with excellent communication skills who writes replies to customer reviews.';

export const revisionPrompt = (input: RevisionRequest) =>
  `
Revise this response to a customer review based on the manager's feedback.

ORIGINAL CUSTOMER REVIEW:
${input.originalText || '(no review text)'}

CURRENT RESPONSE:
${input.currentResponse}

MANAGER FEEDBACK:
${input.feedback}

Write a revised response that:
- Addresses every point raised in the manager's feedback
- Keeps a professional, warm and personal tone
- Sounds natural and human-written
- Stays specific to the original review's content
- Avoids overusing phrases like "I understand" or "I apologize"
- Is concise

Return only the revised response, with no explanation or additional text.
`.trim();
