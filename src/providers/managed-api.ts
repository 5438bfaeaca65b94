import {
  TranslateClient,
  TranslateServiceException,
  TranslateTextCommand,
  type TranslateTextCommandInput,
  type TranslateTextCommandOutput,
} from '@aws-sdk/client-translate';
import type { ManagedApiProviderConfig, TranslationRequest } from '../types.js';
import { BackendError, ConfigurationError, DecodeError, TransportError } from '../types.js';
import { BaseTranslator } from './base.js';

export type TranslateTextFunction = (
  input: TranslateTextCommandInput
) => Promise<TranslateTextCommandOutput>;

export interface ManagedApiOptions {
  /** Replaces the AWS call; used to keep tests in process. */
  translateText?: TranslateTextFunction;
}

/**
 * A fresh client per call, so credentials stay scoped to the request and
 * nothing is shared between concurrent translations.
 */
function createTranslateText(config: ManagedApiProviderConfig): TranslateTextFunction {
  return async (input) => {
    const client = new TranslateClient({
      region: config.region,
      credentials: {
        accessKeyId: config.accessKeyId,
        secretAccessKey: config.secretAccessKey,
      },
      maxAttempts: 1,
    });
    try {
      return await client.send(new TranslateTextCommand(input));
    } finally {
      client.destroy();
    }
  };
}

/**
 * AWS Translate backend. Language codes are passed through untouched;
 * AWS understands `auto` as "detect the source language".
 */
export class ManagedApiTranslator extends BaseTranslator {
  readonly kind = 'managed-api';
  readonly model = undefined;

  private readonly translateText: TranslateTextFunction;

  constructor(config: ManagedApiProviderConfig, options: ManagedApiOptions = {}) {
    super();
    if (!config.accessKeyId || !config.secretAccessKey) {
      throw new ConfigurationError('invalid AWS credentials: access key id and secret are required', 'credentials');
    }
    if (!config.region) {
      throw new ConfigurationError('AWS region is required', 'region');
    }
    this.translateText = options.translateText ?? createTranslateText(config);
  }

  protected async executeTranslation(request: TranslationRequest): Promise<string> {
    let output: TranslateTextCommandOutput;
    try {
      output = await this.translateText({
        SourceLanguageCode: request.sourceLanguage,
        TargetLanguageCode: request.targetLanguage,
        Text: request.text,
      });
    } catch (error) {
      if (error instanceof TranslateServiceException) {
        throw new BackendError(
          `AWS translation failed: ${error.name}: ${error.message}`,
          this.kind,
          error.$metadata.httpStatusCode,
          { cause: error }
        );
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new TransportError(`AWS translation failed: ${message}`, this.kind, { cause: error });
    }

    if (typeof output.TranslatedText !== 'string') {
      throw new DecodeError('AWS response carried no translated text', this.kind);
    }
    return output.TranslatedText;
  }
}
