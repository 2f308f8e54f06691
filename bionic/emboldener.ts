import { resolveOptions } from "./options";
import { ResolvedOptions, WordBoundaryPolicy, WordToken } from "./types";

const WORD_CHARS = "\\p{L}\\p{M}\\p{N}";
const APOSTROPHES = "'\u2019";
const HYPHENS = "\\-\u2010";

const HAS_DIGIT = /\p{N}/u;
const IS_MARK = /^\p{M}$/u;

// ceil() guard for fractions that are not exact in binary (0.3 * 10)
const EPSILON = 1e-9;

const DEFAULT_RESOLVED = resolveOptions();

const patternCache = new Map<string, { global: RegExp; leading: RegExp }>();

function wordPatterns(policy: WordBoundaryPolicy): { global: RegExp; leading: RegExp } {
  const key = `${policy.apostrophes}/${policy.hyphens}`;
  const cached = patternCache.get(key);
  if (cached) return cached;

  let joiners = "";
  if (policy.apostrophes === "join") joiners += APOSTROPHES;
  if (policy.hyphens === "join") joiners += HYPHENS;

  const source = joiners
    ? `[${WORD_CHARS}]+(?:[${joiners}][${WORD_CHARS}]+)*`
    : `[${WORD_CHARS}]+`;
  const patterns = {
    global: new RegExp(source, "gu"),
    leading: new RegExp(`^(?:${source})`, "u"),
  };
  patternCache.set(key, patterns);
  return patterns;
}

/**
 * Number of leading code points to embolden for a word of the given length.
 */
export function boldPrefixLength(length: number, minBoldFraction: number = 0.5): number {
  if (length <= 0) return 0;
  if (length <= 3) return 1;
  if (length <= 6) return 2;
  if (length <= 9) return 3;
  return Math.min(length, Math.max(1, Math.ceil(length * minBoldFraction - EPSILON)));
}

/**
 * Finds the words of a text run. Tokens containing digits ("2024", "mp3")
 * are not words and are left out.
 */
export function findWordTokens(
  text: string,
  policy: WordBoundaryPolicy = DEFAULT_RESOLVED.wordBoundaryPolicy,
): WordToken[] {
  const tokens: WordToken[] = [];
  for (const match of text.matchAll(wordPatterns(policy).global)) {
    const word = match[0];
    const start = match.index ?? 0;
    if (HAS_DIGIT.test(word)) continue;
    tokens.push({
      start,
      end: start + word.length,
      length: Array.from(word).length,
      text: word,
    });
  }
  return tokens;
}

/**
 * UTF-16 length of the word-character run at the very start of `text`, or 0.
 */
export function leadingWordLength(
  text: string,
  policy: WordBoundaryPolicy = DEFAULT_RESOLVED.wordBoundaryPolicy,
): number {
  const match = wordPatterns(policy).leading.exec(text);
  return match ? match[0].length : 0;
}

export function emboldenWord(word: string, options: ResolvedOptions = DEFAULT_RESOLVED): string {
  const chars = Array.from(word);
  let split = boldPrefixLength(chars.length, options.minBoldFraction);
  // Keep combining marks with their base letter
  while (split < chars.length && IS_MARK.test(chars[split] ?? "")) {
    split++;
  }
  const tag = options.emphasisTag;
  return `<${tag}>${chars.slice(0, split).join("")}</${tag}>${chars.slice(split).join("")}`;
}

/**
 * Wraps the leading characters of every word in `text` in the emphasis tag.
 * `text` is character data without markup; everything that is not a word
 * is copied through unchanged.
 */
export function emboldenRun(text: string, options: ResolvedOptions = DEFAULT_RESOLVED): string {
  if (!text || !text.trim()) return text;

  let output = "";
  let last = 0;
  for (const token of findWordTokens(text, options.wordBoundaryPolicy)) {
    output += text.slice(last, token.start) + emboldenWord(token.text, options);
    last = token.end;
  }
  return output + text.slice(last);
}
