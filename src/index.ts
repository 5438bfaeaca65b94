export type {
  ProviderKind,
  TranslationRequest,
  TranslationResult,
  Translator,
  ProviderConfig,
  ManagedApiProviderConfig,
  LLMProviderConfig,
  UserPreference,
} from './types.js';

export {
  AUTO_DETECT,
  ConfigurationError,
  TranslationError,
  TransportError,
  BackendError,
  DecodeError,
  PreferenceValidationError,
} from './types.js';

export { loadConfig, DEFAULT_BOT_USERNAME, type AppConfig, type BotIdentity } from './config.js';
export { createLogger, type Logger, type LoggerOptions } from './logger.js';

export {
  getLanguageName,
  getLanguageClarification,
  isKnownLanguage,
  listLanguages,
  type Language,
} from './languages.js';
export {
  buildCompletionPrompt,
  buildChatMessages,
  buildChatUserPrompt,
  TRANSLATION_SYSTEM_PROMPT,
  type ChatMessage,
} from './prompts.js';
export { cleanTranslationOutput } from './utils/sanitize.js';

export { ManagedApiTranslator, type ManagedApiOptions } from './providers/managed-api.js';
export { CompletionTranslator } from './providers/completion.js';
export { ChatTranslator } from './providers/chat.js';
export { createTranslator, type TranslatorFactoryOptions } from './providers/factory.js';

export { Schema } from './db/schema.js';
export {
  PreferenceRepository,
  validatePreference,
  type PreferenceStore,
} from './db/preferences.js';

export {
  MessageHandler,
  formatTranslatedMessage,
  type MessageHandleResult,
  type MessageHandlerDeps,
} from './messages/handler.js';
export { ChatPlatformClient, type ChatPlatformConfig } from './platform/client.js';
export {
  TRANSLATION_MARKER_PROP,
  ChatPlatformError,
  type MessageEvent,
  type OutboundMessage,
  type ChatUser,
  type ChatPost,
  type UserDirectory,
  type PostSource,
  type MessagePoster,
} from './platform/types.js';

export { createServer, USER_ID_HEADER, type ServerDeps } from './web/server.js';
