import OpenAI from 'openai';
import type { TranslationProvider, TranslationSession } from './types.js';

export const DEFAULT_MODEL = 'gpt-4o-mini';

/**
 * System prompt for a target language label
 */
export function systemPrompt(languageLabel: string): string {
  return [
    `You translate English UI strings, used in developer tool pages, to ${languageLabel}.`,
    'Maintain placeholder variables like {0} and keep punctuation intact.',
    'Return only the translated text.'
  ].join('\n');
}

export interface CompletionRequest {
  model: string;
  system: string;
  user: string;
}

/**
 * Sends one chat completion and returns the reply text
 */
export type CompletionFn = (request: CompletionRequest, signal: AbortSignal) => Promise<string | null | undefined>;

export interface OpenAIPluginOptions {
  /** API key (default: OPENAI_API_KEY) */
  apiKey?: string;
  /** Model name (default: OPENAI_MODEL, then gpt-4o-mini) */
  model?: string;
  /** Replaces the OpenAI client, e.g. in tests */
  complete?: CompletionFn;
}

function clientCompletion(apiKey: string): CompletionFn {
  let client: OpenAI | null = null;

  return async (request, signal) => {
    client ??= new OpenAI({ apiKey });
    const response = await client.chat.completions.create(
      {
        model: request.model,
        messages: [
          { role: 'system', content: request.system },
          { role: 'user', content: request.user }
        ]
      },
      { signal }
    );
    return response.choices[0]?.message.content;
  };
}

class OpenAISession implements TranslationSession {
  private readonly controller = new AbortController();
  private closed = false;

  constructor(
    private readonly model: string,
    private readonly complete: CompletionFn
  ) {}

  async translate(languageLabel: string, text: string): Promise<string> {
    if (this.closed) {
      throw new Error('Translation session is closed');
    }
    const reply = await this.complete(
      { model: this.model, system: systemPrompt(languageLabel), user: text },
      this.controller.signal
    );
    const translated = reply?.trim();
    if (!translated) {
      throw new Error('Empty translation response');
    }
    return translated;
  }

  close(): void {
    this.closed = true;
    this.controller.abort();
  }
}

/**
 * Create the OpenAI translation plugin
 */
export function createOpenAIPlugin(options: OpenAIPluginOptions = {}): TranslationProvider {
  const apiKey = options.apiKey || process.env.OPENAI_API_KEY || '';
  const model = options.model || process.env.OPENAI_MODEL || DEFAULT_MODEL;

  return {
    name: 'openai',
    isAvailable: () => Boolean(options.complete) || apiKey !== '',
    openSession() {
      if (options.complete) {
        return new OpenAISession(model, options.complete);
      }
      if (!apiKey) {
        throw new Error('OpenAI API key is not configured. Set --openai-api-key or OPENAI_API_KEY.');
      }
      return new OpenAISession(model, clientCompletion(apiKey));
    }
  };
}
