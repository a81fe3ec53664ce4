import { describe, expect, it } from 'vitest';
import { RevisionFailure } from '../src/errors';
import { REVISION_SYSTEM } from '../src/prompts/revisionPrompt';
import { LLMRevisionPipeline, cleanRevision } from '../src/services/revisionService';
import { StubLLM } from './helpers';

const request = {
  originalText: 'The soup was cold.',
  currentResponse: 'Dear Sam, we are sorry about the soup.',
  feedback: 'offer a free dessert next time',
};

describe('cleanRevision', () => {
  it('strips labels and wrapping quotes', () => {
    expect(cleanRevision('Revised response: "Dear Sam, dessert is on us."')).toBe('Dear Sam, dessert is on us.');
    expect(cleanRevision('  Dear Sam, thanks.  ')).toBe('Dear Sam, thanks.');
  });
});

describe('LLMRevisionPipeline', () => {
  it('sends the review, draft and feedback to the model', async () => {
    const llm = new StubLLM(() => 'Dear Sam, your next dessert is on us.');
    const revised = await new LLMRevisionPipeline(llm, 1000).revise(request);

    expect(revised).toBe('Dear Sam, your next dessert is on us.');
    expect(llm.calls).toHaveLength(1);
    expect(llm.calls[0].system).toBe(REVISION_SYSTEM);
    expect(llm.calls[0].prompt).toContain('MANAGER FEEDBACK:\noffer a free dessert next time');
    expect(llm.calls[0].prompt).toContain('CURRENT RESPONSE:\nDear Sam, we are sorry about the soup.');
  });

  it('fails on an empty revision', async () => {
    const pipeline = new LLMRevisionPipeline(new StubLLM(() => '  ""  '), 1000);
    await expect(pipeline.revise(request)).rejects.toThrow(
      new RevisionFailure('Revision returned an empty response')
    );
  });

  it('fails when the model errors', async () => {
    const pipeline = new LLMRevisionPipeline(
      new StubLLM(() => {
        throw new Error('No LLM provider available');
      }),
      1000
    );
    await expect(pipeline.revise(request)).rejects.toBeInstanceOf(RevisionFailure);
  });

  it('gives up after the timeout', async () => {
    const pipeline = new LLMRevisionPipeline(new StubLLM(() => new Promise<string>(() => undefined)), 20);
    await expect(pipeline.revise(request)).rejects.toThrow(new RevisionFailure('Revision request failed'));
  });
});
