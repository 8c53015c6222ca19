import OpenAI from 'openai';

import type { SpellCheckSettings } from './rule_set.js';

export type SpellCheckResult = { ok: true } | { ok: false; reason: string };

export interface SpellChecker {
  initialise(apiKey: string, settings: SpellCheckSettings): Promise<void>;
  check(text: string, expectedLanguage?: string): Promise<SpellCheckResult>;
}

export interface CompletionRequest {
  model: string;
  temperature: number;
  maxTokens: number;
  system: string;
  user: string;
}

/** The slice of a chat-completion API the spell checker needs. */
export interface CompletionClient {
  verifyModel(model: string): Promise<void>;
  complete(request: CompletionRequest): Promise<string>;
}

export function createOpenAiCompletionClient(apiKey: string): CompletionClient {
  const client = new OpenAI({ apiKey });

  return {
    async verifyModel(model: string): Promise<void> {
      await client.models.retrieve(model);
    },

    async complete(request: CompletionRequest): Promise<string> {
      const completion = await client.chat.completions.create({
        model: request.model,
        temperature: request.temperature,
        max_tokens: request.maxTokens,
        messages: [
          { role: 'system', content: request.system },
          { role: 'user', content: request.user }
        ]
      });

      return completion.choices[0]?.message.content ?? '';
    }
  };
}

export function buildSpellCheckPrompt(template: string, expectedLanguage?: string): string {
  const hint = expectedLanguage ? ` The text must be written in language '${expectedLanguage}'.` : '';
  if (template.includes('{language}')) {
    return template.replace('{language}', expectedLanguage ? ` (expected language: ${expectedLanguage})` : '');
  }
  return `${template}${hint}`;
}

/** An answer of `OK` (any case, optional trailing period) means no mistakes. */
export function interpretSpellCheckAnswer(answer: string): SpellCheckResult {
  const normalized = answer.trim();
  if (/^ok\.?$/i.test(normalized)) {
    return { ok: true };
  }
  return { ok: false, reason: normalized || 'Empty answer from the spell checker' };
}

export class ChatSpellChecker implements SpellChecker {
  private client: CompletionClient | null = null;
  private settings: SpellCheckSettings | null = null;

  constructor(
    private readonly createClient: (apiKey: string) => CompletionClient = createOpenAiCompletionClient
  ) {}

  async initialise(apiKey: string, settings: SpellCheckSettings): Promise<void> {
    const client = this.createClient(apiKey);
    await client.verifyModel(settings.model);
    this.client = client;
    this.settings = settings;
  }

  async check(text: string, expectedLanguage?: string): Promise<SpellCheckResult> {
    if (!this.client || !this.settings) {
      throw new Error('Spell checker is not initialised');
    }

    const answer = await this.client.complete({
      model: this.settings.model,
      temperature: this.settings.temperature,
      maxTokens: this.settings.maxTokens,
      system: buildSpellCheckPrompt(this.settings.prompt, expectedLanguage),
      user: text
    });

    return interpretSpellCheckAnswer(answer);
  }
}
