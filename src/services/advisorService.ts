import { errorMessage } from '../errors';
import { ADVISOR_SYSTEM, advicePrompt } from '../prompts/advicePrompt';
import { ConversationTurn } from '../types';
import { TextGenerator } from './llmService';
import { NOTICES } from './presentation';
import { SessionStore } from './sessionStore';

export const DEFAULT_MEMORY_TURNS = 10;

/**
 * Restaurant-expert chat. Memory lives on the manager record, so it
 * survives review-session resets and is dropped only on "exit".
 */
export class AdvisorService {
  constructor(
    private readonly store: SessionStore,
    private readonly llm: TextGenerator,
    private readonly maxTurns: number = DEFAULT_MEMORY_TURNS,
    private readonly now: () => Date = () => new Date()
  ) {}

  async reply(managerId: string, message: string): Promise<string> {
    const { memory } = await this.store.withLock(managerId, () => this.store.getRecord(managerId));

    let output: string;
    try {
      const res = await this.llm.generate({ system: ADVISOR_SYSTEM, prompt: advicePrompt(message, memory) });
      output = res.content.trim();
      if (!output) throw new Error('empty advisor reply');
    } catch (error: unknown) {
      console.error(`[advisor] ❌ ${managerId}:`, errorMessage(error));
      return NOTICES.adviceError;
    }

    const turn: ConversationTurn = { input: message, output, at: this.now() };
    await this.store.withLock(managerId, async () => {
      const record = await this.store.getRecord(managerId);
      // the manager may have left advice mode while the model was answering
      if (record.mode !== 'advice') return;
      await this.store.updateRecord(managerId, { memory: [...record.memory, turn].slice(-this.maxTurns) });
    });
    return output;
  }
}
