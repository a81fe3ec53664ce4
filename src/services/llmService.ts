import OpenAI from 'openai';
import axios from 'axios';
import { AppConfig } from '../config';
import { errorMessage } from '../errors';

export interface LLMResponse {
  content: string;
  model?: string;
  provider: string;
}

export interface LLMOptions {
  prompt: string;
  system?: string;
  responseFormat?: 'json' | 'text';
  temperature?: number;
}

/** Anything that can turn a prompt into text. Tests pass a stub. */
export interface TextGenerator {
  generate(options: LLMOptions): Promise<LLMResponse>;
}

type LLMSettings = AppConfig['llm'];

interface OllamaGenerateResponse {
  response?: string;
}

const stripCodeFence = (content: string) =>
  content.replace(/^```json\s*/i, '').replace(/^```\s*/i, '').replace(/\s*```$/i, '').trim();

/**
 * LLM access with fallback.
 * OpenAI when a key is configured, then a local Ollama server.
 */
export class LLMService implements TextGenerator {
  private openai: OpenAI | null = null;

  constructor(private readonly settings: LLMSettings) {
    if (settings.openaiApiKey) {
      this.openai = new OpenAI({ apiKey: settings.openaiApiKey, timeout: settings.timeoutMs });
    }
  }

  async generate(options: LLMOptions): Promise<LLMResponse> {
    const errors: string[] = [];

    if (this.openai) {
      try {
        return await this.generateOpenAI(this.openai, options);
      } catch (error: unknown) {
        const msg = errorMessage(error);
        errors.push(`OpenAI: ${msg}`);

        const quota =
          (error instanceof OpenAI.APIError && (error.status === 429 || error.code === 'insufficient_quota')) ||
          msg.includes('quota');
        if (quota) {
          console.log('OpenAI quota exceeded, trying fallback...');
        } else {
          console.warn('OpenAI error:', msg);
        }
      }
    }

    try {
      return await this.generateOllama(options);
    } catch (error: unknown) {
      errors.push(`Ollama: ${errorMessage(error)}`);
    }

    throw new Error(
      `All LLM providers failed:\n${errors.join('\n')}\n\n` +
        `Make sure at least one provider is configured:\n` +
        `- OpenAI: Set OPENAI_API_KEY\n` +
        `- Ollama: Run 'ollama serve' and set OLLAMA_API_URL (default: http://localhost:11434)`
    );
  }

  private async generateOpenAI(client: OpenAI, options: LLMOptions): Promise<LLMResponse> {
    const model = this.settings.openaiModel;
    const messages: OpenAI.Chat.ChatCompletionMessageParam[] = [];
    if (options.system) messages.push({ role: 'system', content: options.system });
    messages.push({ role: 'user', content: options.prompt });

    const completion = await client.chat.completions.create({
      model,
      messages,
      temperature: options.temperature,
      response_format: options.responseFormat === 'json' ? { type: 'json_object' as const } : undefined,
    });

    return {
      content: completion.choices[0]?.message?.content || '',
      model,
      provider: 'openai',
    };
  }

  private async generateOllama(options: LLMOptions): Promise<LLMResponse> {
    let prompt = options.prompt;
    if (options.responseFormat === 'json') {
      prompt += '\n\nRespond with valid JSON only, no markdown, no code blocks.';
    }

    const response = await axios.post<OllamaGenerateResponse>(
      `${this.settings.ollamaUrl}/api/generate`,
      {
        model: this.settings.ollamaModel,
        prompt,
        system: options.system,
        stream: false,
        format: options.responseFormat === 'json' ? 'json' : undefined,
        options: options.temperature === undefined ? undefined : { temperature: options.temperature },
      },
      { timeout: this.settings.timeoutMs }
    );

    const content = (response.data.response || '').trim();
    return {
      content: options.responseFormat === 'json' ? stripCodeFence(content) : content,
      model: this.settings.ollamaModel,
      provider: 'ollama',
    };
  }
}
