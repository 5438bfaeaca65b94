import type OpenAI from 'openai';
import { z } from 'zod';
import { buildChatMessages } from '../prompts.js';
import type { LLMProviderConfig, TranslationRequest } from '../types.js';
import { BackendError, DecodeError } from '../types.js';
import { cleanTranslationOutput } from '../utils/sanitize.js';
import { BaseTranslator } from './base.js';
import {
  assertLLMConfig,
  createOpenAIClient,
  toTranslationError,
  type OpenAICompatibleOptions,
} from './openai-compatible.js';

export const CHAT_MAX_TOKENS = 2048;
export const CHAT_TEMPERATURE = 0.3;

const ChatResponseSchema = z.object({
  choices: z.array(
    z.object({
      message: z.object({
        role: z.string().optional(),
        content: z.string(),
      }),
    })
  ),
});

/**
 * Chat-style LLM backend (e.g. a LiteLLM proxy's `/v1/chat/completions`).
 */
export class ChatTranslator extends BaseTranslator {
  readonly kind = 'chat-llm';
  readonly model: string;

  private readonly client: OpenAI;

  constructor(config: LLMProviderConfig, options: OpenAICompatibleOptions = {}) {
    super();
    assertLLMConfig(config, 'chat-llm');
    this.model = config.model;
    this.client = createOpenAIClient(config, options);
  }

  protected async executeTranslation(request: TranslationRequest): Promise<string> {
    let response: unknown;
    try {
      response = await this.client.chat.completions.create({
        model: this.model,
        messages: buildChatMessages(
          request.text,
          request.sourceLanguage,
          request.targetLanguage
        ),
        temperature: CHAT_TEMPERATURE,
        max_tokens: CHAT_MAX_TOKENS,
      });
    } catch (error) {
      throw toTranslationError(error, this.kind);
    }

    const parsed = ChatResponseSchema.safeParse(response);
    if (!parsed.success) {
      throw new DecodeError(
        `failed to decode response: ${parsed.error.issues[0]?.message ?? 'invalid shape'}`,
        this.kind
      );
    }

    const [choice] = parsed.data.choices;
    if (!choice) {
      throw new BackendError('no translation returned from chat-llm', this.kind);
    }

    return cleanTranslationOutput(choice.message.content);
  }
}
