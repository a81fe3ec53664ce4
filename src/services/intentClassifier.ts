import { ClassificationFailure, errorMessage } from '../errors';
import { intentPrompt } from '../prompts/intentPrompt';
import { Intent, SessionContext } from '../types';
import { TextGenerator } from './llmService';

/**
 * Maps a free-text manager message to APPROVED / REVISION / UNCLEAR.
 * Implementations never throw; a failed classification is UNCLEAR.
 */
export interface IntentClassifier {
  classify(message: string, context: SessionContext): Promise<Intent>;
}

const APPROVE_WORDS = ['approve', 'good', 'yes', 'ok', 'okay', 'send', 'perfect'];
const REVISE_WORDS = ['revise', 'change', 'edit', 'discount', 'offer', 'fix'];

const tokens = (text: string) => new Set(text.toLowerCase().split(/[^a-z0-9']+/).filter(Boolean));

/**
 * Keyword matching used when the model is unavailable.
 * Change requests win over approval words ("ok but change the ending").
 */
export const keywordFallback = (message: string): Intent => {
  const words = tokens(message);
  if (REVISE_WORDS.some((w) => words.has(w))) return { type: 'REVISION', feedback: message.trim() };
  if (APPROVE_WORDS.some((w) => words.has(w)) || message.includes('👍')) return { type: 'APPROVED' };
  return { type: 'UNCLEAR' };
};

/** Reads a model reply. The model is asked for one label but may pad it. */
export const parseIntentLabel = (reply: string, message: string): Intent => {
  const upper = reply.toUpperCase();
  if (upper.includes('APPROVED')) return { type: 'APPROVED' };
  if (upper.includes('REVISION')) return { type: 'REVISION', feedback: message.trim() };
  return { type: 'UNCLEAR' };
};

export class LLMIntentClassifier implements IntentClassifier {
  constructor(private readonly llm: TextGenerator) {}

  async classify(message: string, context: SessionContext): Promise<Intent> {
    try {
      const label = await this.requestLabel(message, context);
      return parseIntentLabel(label, message);
    } catch (error: unknown) {
      const fallback = keywordFallback(message);
      console.warn(`[classifier] ${errorMessage(error)}; keyword fallback -> ${fallback.type}`);
      return fallback;
    }
  }

  private async requestLabel(message: string, context: SessionContext): Promise<string> {
    try {
      const res = await this.llm.generate({ prompt: intentPrompt(message, context), temperature: 0 });
      if (!res.content.trim()) throw new Error('empty classifier reply');
      return res.content;
    } catch (error: unknown) {
      throw new ClassificationFailure('Intent classification failed', error);
    }
  }
}
