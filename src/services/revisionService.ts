import { RevisionFailure } from '../errors';
import { REVISION_SYSTEM, revisionPrompt } from '../prompts/revisionPrompt';
import { RevisionRequest } from '../types';
import { TextGenerator } from './llmService';

export interface RevisionPipeline {
  /** Resolves to the revised response text; rejects with RevisionFailure. */
  revise(request: RevisionRequest): Promise<string>;
}

const withTimeout = <T>(work: Promise<T>, ms: number): Promise<T> =>
  new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => reject(new Error(`timed out after ${ms}ms`)), ms);
    work.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (error: unknown) => {
        clearTimeout(timer);
        reject(error);
      }
    );
  });

// Models sometimes wrap the reply in quotes or a "Revised response:" label.
export const cleanRevision = (content: string): string =>
  content
    .trim()
    .replace(/^(revised response|response)\s*:\s*/i, '')
    .replace(/^"([\s\S]*)"$/, '$1')
    .trim();

export class LLMRevisionPipeline implements RevisionPipeline {
  constructor(
    private readonly llm: TextGenerator,
    private readonly timeoutMs: number
  ) {}

  async revise(request: RevisionRequest): Promise<string> {
    let content: string;
    try {
      const res = await withTimeout(
        this.llm.generate({ system: REVISION_SYSTEM, prompt: revisionPrompt(request) }),
        this.timeoutMs
      );
      content = cleanRevision(res.content);
    } catch (error: unknown) {
      throw new RevisionFailure('Revision request failed', error);
    }
    if (!content) throw new RevisionFailure('Revision returned an empty response');
    return content;
  }
}
