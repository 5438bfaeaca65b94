const LEADING_LABELS = [
  'Translation: ',
  'Translated text: ',
  'Here is the translation: ',
  'The translation is: ',
  'Output: ',
  'Answer: ',
  'Result: ',
] as const;

const TRAILING_BLOCK_MARKERS = ['\n\nNote:', '\n\nExplanation:'] as const;

function cleanOnce(raw: string): string {
  let text = raw.trim();

  for (const label of LEADING_LABELS) {
    if (text.startsWith(label)) {
      text = text.slice(label.length).trim();
    }
  }

  if (text.length >= 2) {
    const first = text[0];
    const last = text[text.length - 1];
    if ((first === '"' || first === "'") && first === last) {
      text = text.slice(1, -1).trim();
    }
  }

  for (const marker of TRAILING_BLOCK_MARKERS) {
    const index = text.indexOf(marker);
    if (index !== -1) {
      text = text.slice(0, index);
    }
  }

  return text.trim();
}

/**
 * Strips the conversational wrapping LLMs put around a translation:
 * leading labels, one layer of surrounding quotes and trailing
 * "Note:"/"Explanation:" blocks.
 *
 * Applied until the text stops changing, so cleaning cleaned output is a
 * no-op.
 */
export function cleanTranslationOutput(raw: string): string {
  let current = cleanOnce(raw);
  for (;;) {
    const next = cleanOnce(current);
    if (next === current) {
      return current;
    }
    current = next;
  }
}
