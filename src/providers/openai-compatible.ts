import OpenAI, { type ClientOptions } from 'openai';
import type { LLMProviderConfig, ProviderKind, TranslationError } from '../types.js';
import { BackendError, ConfigurationError, DecodeError, TransportError } from '../types.js';

export type FetchFunction = NonNullable<ClientOptions['fetch']>;

export interface OpenAICompatibleOptions {
  /** Replaces the global fetch; used to keep tests in process. */
  fetch?: FetchFunction;
}

export function assertLLMConfig(config: LLMProviderConfig, kind: LLMProviderConfig['kind']): void {
  if (config.kind !== kind) {
    throw new ConfigurationError(`expected a ${kind} config, got ${config.kind}`, 'kind');
  }
  if (!config.apiUrl) {
    throw new ConfigurationError(`${kind} API URL is required`, 'apiUrl');
  }
  if (!config.model) {
    throw new ConfigurationError(`${kind} model is required`, 'model');
  }
}

/**
 * Client for a self-hosted OpenAI-compatible server (vLLM, a LiteLLM proxy).
 * The completion variant sends six stop sequences, more than OpenAI's hosted
 * `/v1/completions` accepts, so it targets vLLM-style servers.
 *
 * Retries are disabled: a failed attempt drops the message. Without a key
 * the `Authorization` header is left off entirely.
 */
export function createOpenAIClient(
  config: LLMProviderConfig,
  options: OpenAICompatibleOptions = {}
): OpenAI {
  return new OpenAI({
    apiKey: config.apiKey ?? '',
    baseURL: config.apiUrl,
    timeout: config.timeoutMs,
    maxRetries: 0,
    ...(config.apiKey ? {} : { defaultHeaders: { Authorization: null } }),
    ...(options.fetch && { fetch: options.fetch }),
  });
}

export function toTranslationError(error: unknown, provider: ProviderKind): TranslationError {
  if (error instanceof OpenAI.APIConnectionError) {
    return new TransportError(`${provider} API request failed: ${error.message}`, provider, {
      cause: error,
    });
  }
  if (error instanceof OpenAI.APIError) {
    return new BackendError(
      `${provider} API error (status ${error.status ?? 'unknown'}): ${error.message}`,
      provider,
      error.status,
      { cause: error }
    );
  }
  if (error instanceof SyntaxError) {
    return new DecodeError(`failed to decode response: ${error.message}`, provider, {
      cause: error,
    });
  }
  const message = error instanceof Error ? error.message : String(error);
  return new TransportError(`${provider} API request failed: ${message}`, provider, {
    cause: error,
  });
}
