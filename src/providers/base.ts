import type {
  ProviderKind,
  TranslationRequest,
  TranslationResult,
  Translator,
} from '../types.js';
import { TranslationError, TransportError } from '../types.js';

export abstract class BaseTranslator implements Translator {
  abstract readonly kind: ProviderKind;
  abstract readonly model: string | undefined;

  protected abstract executeTranslation(request: TranslationRequest): Promise<string>;

  async translate(request: TranslationRequest): Promise<TranslationResult> {
    try {
      const translatedText = await this.executeTranslation(request);
      return {
        translatedText,
        provider: this.kind,
        ...(this.model !== undefined && { model: this.model }),
      };
    } catch (error) {
      if (error instanceof TranslationError) {
        throw error;
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new TransportError(`${this.kind} request failed: ${message}`, this.kind, {
        cause: error,
      });
    }
  }
}
