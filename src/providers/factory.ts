import type { ProviderConfig, Translator } from '../types.js';
import { ChatTranslator } from './chat.js';
import { CompletionTranslator } from './completion.js';
import { ManagedApiTranslator, type ManagedApiOptions } from './managed-api.js';
import type { OpenAICompatibleOptions } from './openai-compatible.js';

export type TranslatorFactoryOptions = ManagedApiOptions & OpenAICompatibleOptions;

/**
 * Builds the one translator the process uses. Throws ConfigurationError
 * when the config cannot produce a working provider.
 */
export function createTranslator(
  config: ProviderConfig,
  options: TranslatorFactoryOptions = {}
): Translator {
  switch (config.kind) {
    case 'managed-api':
      return new ManagedApiTranslator(config, options);
    case 'completion-llm':
      return new CompletionTranslator(config, options);
    case 'chat-llm':
      return new ChatTranslator(config, options);
  }
}
