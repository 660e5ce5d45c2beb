/** Russian for "explain this": the phrases that summon the bot without a command. */
export const DEFAULT_TRIGGER_PHRASES = [
  'можно пояснительную бригаду',
  'мпб',
  'пояснительную бригаду',
  'пояснительная бригада',
  'не понял',
] as const;

/**
 * Plain substring containment, case-insensitive. There is no word-boundary check, so a phrase
 * embedded in a longer word still matches.
 */
export function containsTriggerPhrase(text: string, phrases: readonly string[]): boolean {
  const lowered = text.toLowerCase();
  if (!lowered) return false;
  return phrases.some((phrase) => {
    const needle = phrase.toLowerCase();
    return needle.length > 0 && lowered.includes(needle);
  });
}

const escapeRegExp = (value: string) => value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

/** Removes every phrase occurrence, longest phrases first, and collapses the leftover whitespace. */
export function stripTriggerPhrases(text: string, phrases: readonly string[]): string {
  const ordered = phrases
    .map((phrase) => phrase.trim())
    .filter(Boolean)
    .sort((a, b) => b.length - a.length);

  let result = text;
  for (const phrase of ordered) {
    result = result.replace(new RegExp(escapeRegExp(phrase), 'giu'), ' ');
  }

  return result.replace(/\s+/g, ' ').trim();
}

/** True when the text carries something to explain, not just punctuation or emoji. */
export function hasMeaningfulText(text: string): boolean {
  return /[\p{L}\p{N}]/u.test(text);
}
