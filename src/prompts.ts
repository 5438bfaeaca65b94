import { getLanguageClarification, getLanguageName } from './languages.js';
import { AUTO_DETECT } from './types.js';

export type ChatMessage =
  | { role: 'system'; content: string }
  | { role: 'user'; content: string };

export const TRANSLATION_SYSTEM_PROMPT =
  'You are a translation system. Output ONLY the translated text without any explanations, notes, or additional commentary.';

function describeLanguage(code: string): string {
  return `${getLanguageName(code)}${getLanguageClarification(code)}`;
}

function directionClause(sourceLanguage: string, targetLanguage: string): string {
  if (sourceLanguage === AUTO_DETECT) {
    return `Translate to ${describeLanguage(targetLanguage)}`;
  }
  return `Translate from ${describeLanguage(sourceLanguage)} to ${describeLanguage(targetLanguage)}`;
}

/**
 * Single free-text prompt for completion-style models. Kept short so the
 * model has little room to continue with commentary.
 */
export function buildCompletionPrompt(
  text: string,
  sourceLanguage: string,
  targetLanguage: string
): string {
  return `${directionClause(sourceLanguage, targetLanguage)}. Reply with ONLY the translation.\n\n${text}`;
}

export function buildChatUserPrompt(
  text: string,
  sourceLanguage: string,
  targetLanguage: string
): string {
  return `${directionClause(sourceLanguage, targetLanguage)}:\n\n${text}`;
}

export function buildChatMessages(
  text: string,
  sourceLanguage: string,
  targetLanguage: string
): ChatMessage[] {
  return [
    { role: 'system', content: TRANSLATION_SYSTEM_PROMPT },
    { role: 'user', content: buildChatUserPrompt(text, sourceLanguage, targetLanguage) },
  ];
}
