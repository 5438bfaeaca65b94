export type ProviderKind = 'managed-api' | 'completion-llm' | 'chat-llm';

export const AUTO_DETECT = 'auto';

export interface TranslationRequest {
  readonly text: string;
  readonly sourceLanguage: string;
  readonly targetLanguage: string;
}

export interface TranslationResult {
  translatedText: string;
  provider: ProviderKind;
  model?: string;
}

export interface Translator {
  readonly kind: ProviderKind;

  translate(request: TranslationRequest): Promise<TranslationResult>;
}

export interface ManagedApiProviderConfig {
  kind: 'managed-api';
  accessKeyId: string;
  secretAccessKey: string;
  region: string;
}

export interface LLMProviderConfig {
  kind: 'completion-llm' | 'chat-llm';
  apiUrl: string;
  apiKey?: string;
  model: string;
  timeoutMs: number;
}

export type ProviderConfig = ManagedApiProviderConfig | LLMProviderConfig;

export interface UserPreference {
  userId: string;
  activated: boolean;
  sourceLanguage: string;
  targetLanguage: string;
}

export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly field?: string
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class TranslationError extends Error {
  constructor(
    message: string,
    public readonly provider: ProviderKind,
    public readonly statusCode?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'TranslationError';
  }
}

/** The backend could not be reached: connection refused, DNS, timeout. */
export class TransportError extends TranslationError {
  constructor(message: string, provider: ProviderKind, options?: { cause?: unknown }) {
    super(message, provider, undefined, options);
    this.name = 'TransportError';
  }
}

/** The backend answered, but with a failure status or an empty result set. */
export class BackendError extends TranslationError {
  constructor(
    message: string,
    provider: ProviderKind,
    statusCode?: number,
    options?: { cause?: unknown }
  ) {
    super(message, provider, statusCode, options);
    this.name = 'BackendError';
  }
}

export class DecodeError extends TranslationError {
  constructor(message: string, provider: ProviderKind, options?: { cause?: unknown }) {
    super(message, provider, undefined, options);
    this.name = 'DecodeError';
  }
}

export class PreferenceValidationError extends Error {
  constructor(
    message: string,
    public readonly field: string
  ) {
    super(message);
    this.name = 'PreferenceValidationError';
  }
}
