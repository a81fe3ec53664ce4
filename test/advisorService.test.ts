import { describe, expect, it } from 'vitest';
import { ADVISOR_SYSTEM } from '../src/prompts/advicePrompt';
import { AdvisorService } from '../src/services/advisorService';
import { NOTICES } from '../src/services/presentation';
import { InMemorySessionStore } from '../src/services/sessionStore';
import { MANAGER, StubLLM } from './helpers';

const now = new Date('2024-06-15T12:00:00Z');

const inAdviceMode = async () => {
  const store = new InMemorySessionStore();
  await store.updateRecord(MANAGER, { mode: 'advice' });
  return store;
};

describe('AdvisorService', () => {
  it('answers and remembers the exchange', async () => {
    const store = await inAdviceMode();
    const llm = new StubLLM(() => '  Run a lunch special.  ');
    const advisor = new AdvisorService(store, llm, 10, () => now);

    expect(await advisor.reply(MANAGER, 'How do I fill weekday lunches?')).toBe('Run a lunch special.');
    expect(llm.calls[0].system).toBe(ADVISOR_SYSTEM);
    expect((await store.getRecord(MANAGER)).memory).toEqual([
      { input: 'How do I fill weekday lunches?', output: 'Run a lunch special.', at: now },
    ]);
  });

  it('includes earlier turns in the prompt', async () => {
    const store = await inAdviceMode();
    const llm = new StubLLM(() => 'Sure.');
    const advisor = new AdvisorService(store, llm, 10, () => now);

    await advisor.reply(MANAGER, 'First question');
    await advisor.reply(MANAGER, 'Second question');

    expect(llm.calls[0].prompt).toContain('Previous conversation:\n(none)');
    expect(llm.calls[1].prompt).toContain('Manager: First question\nYou: Sure.');
  });

  it('keeps only the most recent turns', async () => {
    const store = await inAdviceMode();
    const advisor = new AdvisorService(store, new StubLLM(() => 'ok'), 2, () => now);

    for (const q of ['one', 'two', 'three']) await advisor.reply(MANAGER, q);

    expect((await store.getRecord(MANAGER)).memory.map((t) => t.input)).toEqual(['two', 'three']);
  });

  it('does not remember anything once the manager has left advice mode', async () => {
    const store = new InMemorySessionStore();
    const advisor = new AdvisorService(store, new StubLLM(() => 'ok'), 10, () => now);

    await advisor.reply(MANAGER, 'hello?');

    expect((await store.getRecord(MANAGER)).memory).toEqual([]);
  });

  it('apologizes when the model fails', async () => {
    const store = await inAdviceMode();
    const advisor = new AdvisorService(
      store,
      new StubLLM(() => {
        throw new Error('No LLM provider available');
      })
    );

    expect(await advisor.reply(MANAGER, 'Any tips?')).toBe(NOTICES.adviceError);
    expect((await store.getRecord(MANAGER)).memory).toEqual([]);
  });
});
