export type ChoiceValue = string | number | boolean;

export interface ChoiceOption {
  key: string;
  label: string;
  /** Whole-utterance synonyms, already normalized. */
  aliases: readonly string[];
  value: ChoiceValue;
}

export const SIMPLIFY_PHRASES = [
  "i don't understand",
  'i dont understand',
  'never mind',
  'whatever',
  'you decide',
  'you decide for me',
  "i don't care",
  "don't care",
] as const;

export function normalizeChoice(text: string): string {
  return text
    .trim()
    .toLowerCase()
    .replace(/[’‘]/g, "'")
    .replace(/[\s.!?,;:]+$/, '');
}

export function isSimplifyTrigger(text: string): boolean {
  const normalized = normalizeChoice(text);
  return SIMPLIFY_PHRASES.some((phrase) => phrase === normalized);
}

function letterOf(token: string): string {
  return token.replace(/^option\s+/, '').replace(/^\(?([a-z])[).]?$/, '$1');
}

export function matchChoice(text: string, options: readonly ChoiceOption[]): ChoiceOption | null {
  const normalized = normalizeChoice(text);
  if (!normalized) return null;
  const letter = letterOf(normalized);
  return options.find((o) => o.key.toLowerCase() === letter || o.aliases.includes(normalized)) ?? null;
}

/** "A, D" or "b and c": every token must be an option letter, otherwise no match. */
export function matchChoices(text: string, options: readonly ChoiceOption[]): ChoiceOption[] | null {
  const single = matchChoice(text, options);
  if (single) return [single];

  const tokens = normalizeChoice(text)
    .split(/\s*(?:,|\/|&|\band\b|\s)\s*/)
    .filter(Boolean);
  if (tokens.length < 2) return null;

  const picked: ChoiceOption[] = [];
  for (const token of tokens) {
    const option = options.find((o) => o.key.toLowerCase() === letterOf(token));
    if (!option) return null;
    if (!picked.includes(option)) picked.push(option);
  }
  return picked;
}

export function renderChoices(options: readonly ChoiceOption[]): string {
  return options.map((o) => `${o.key}) ${o.label}`).join('\n');
}
