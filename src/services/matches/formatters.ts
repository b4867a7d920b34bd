import type { Formatter } from './match.js';

export const SEPS = ' [](){}+*|=-_~#/\\.,;:';

/** Separators that split a title from an alternative title. */
export const TITLE_SEPS = '-+/\\|';

// Kept by cleanup: they carry meaning inside titles ("Mission: Impossible").
const EXCLUDED_CLEAN_CHARS = ',:;-/\\';
const CLEAN_CHARS = [...SEPS].filter((c) => !EXCLUDED_CLEAN_CHARS.includes(c)).join('');

const isSep = (c: string | undefined): boolean => c !== undefined && c !== '' && SEPS.includes(c);

/**
 * A separator at `i` sits between single characters: "S.H.I.E.L.D".
 */
function separatesSingleChars(i: number, input: string): boolean {
  if (i < 1) return false;
  const before = i - 2 < 0 || isSep(input[i - 2]);
  const after = i + 2 >= input.length || input[i + 2] === input[i];
  return before && after && !isSep(input[i - 1]) && !isSep(input[i + 1]);
}

function stripChars(value: string, chars: string): string {
  let start = 0;
  let end = value.length;
  while (start < end && chars.includes(value.charAt(start))) start++;
  while (end > start && chars.includes(value.charAt(end - 1))) end--;
  return value.slice(start, end);
}

/**
 * Replace separators by spaces, strip them at both ends and collapse runs of
 * spaces. Keeps `, : ; - / \` inside the value and keeps dots between single
 * characters so acronyms survive.
 */
export function cleanup(input: string): string {
  const chars = [...input].map((c) => (CLEAN_CHARS.includes(c) ? ' ' : c));

  const candidates: number[] = [];
  for (let i = 0; i < input.length; i++) {
    if (isSep(input[i]) && input[i] !== ' ' && separatesSingleChars(i, input)) candidates.push(i);
  }

  const keptSeps = new Set<string>();
  for (const i of candidates) {
    // A lone "a.b" is not an acronym; require a neighbour candidate.
    if (candidates.includes(i - 2) || candidates.includes(i + 2)) {
      const original = input.charAt(i);
      chars[i] = original;
      keptSeps.add(original);
    }
  }

  const stripSet = [...SEPS].filter((c) => !keptSeps.has(c)).join('');
  return stripChars(chars.join(''), stripSet).replace(/ +/g, ' ');
}

const TRAILING_ARTICLE = /^(.+?),\s*(the|la|les|le|los|el|lo|il|l')$/i;

/**
 * "Simpsons, The" → "The Simpsons".
 */
export function reorderTitle(input: string): string {
  const match = input.match(TRAILING_ARTICLE);
  if (!match) return input;
  const [, title, article] = match;
  if (title === undefined || article === undefined) return input;
  // l' glues to the following word
  return article.endsWith("'") ? `${article}${title}` : `${article} ${title}`;
}

/** Apply formatters left to right. */
export function formatters(...fns: Formatter[]): Formatter {
  return (raw) => fns.reduce((value, fn) => fn(value), raw);
}
