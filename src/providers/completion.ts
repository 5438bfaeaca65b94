import type OpenAI from 'openai';
import { z } from 'zod';
import { buildCompletionPrompt } from '../prompts.js';
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

export const COMPLETION_MAX_TOKENS = 512;
export const COMPLETION_TEMPERATURE = 0.1;

/** Cut generation at the first sign the model is adding commentary. */
export const COMPLETION_STOP_SEQUENCES = [
  '\n\n',
  '\nNote:',
  '\nExplanation:',
  '\nTranslation:',
  '\n\nInput:',
  '[/INST]',
];

const CompletionResponseSchema = z.object({
  choices: z.array(z.object({ text: z.string() })),
});

/**
 * Completion-style LLM backend (e.g. vLLM's `/v1/completions`).
 */
export class CompletionTranslator extends BaseTranslator {
  readonly kind = 'completion-llm';
  readonly model: string;

  private readonly client: OpenAI;

  constructor(config: LLMProviderConfig, options: OpenAICompatibleOptions = {}) {
    super();
    assertLLMConfig(config, 'completion-llm');
    this.model = config.model;
    this.client = createOpenAIClient(config, options);
  }

  protected async executeTranslation(request: TranslationRequest): Promise<string> {
    const prompt = buildCompletionPrompt(
      request.text,
      request.sourceLanguage,
      request.targetLanguage
    );

    let response: unknown;
    try {
      response = await this.client.completions.create({
        model: this.model,
        prompt,
        max_tokens: COMPLETION_MAX_TOKENS,
        temperature: COMPLETION_TEMPERATURE,
        stop: COMPLETION_STOP_SEQUENCES,
      });
    } catch (error) {
      throw toTranslationError(error, this.kind);
    }

    const parsed = CompletionResponseSchema.safeParse(response);
    if (!parsed.success) {
      throw new DecodeError(
        `failed to decode response: ${parsed.error.issues[0]?.message ?? 'invalid shape'}`,
        this.kind
      );
    }

    const [choice] = parsed.data.choices;
    if (!choice) {
      throw new BackendError('no translation returned from completion-llm', this.kind);
    }

    return cleanTranslationOutput(choice.text);
  }
}
