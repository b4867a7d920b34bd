import type { Match } from './match.js';

/**
 * Closed set of match filters understood by the query surface.
 * Rules describe what they look for as data; `test` is the only evaluator.
 */
export type MatchPredicate =
  | { kind: 'name'; name: string }
  | { kind: 'anyName'; names: readonly string[] }
  | { kind: 'tag'; tag: string }
  | { kind: 'hasValue' }
  | { kind: 'identity'; match: Match }
  | { kind: 'not'; predicate: MatchPredicate }
  | { kind: 'allOf'; predicates: readonly MatchPredicate[] };

export const byName = (name: string): MatchPredicate => ({ kind: 'name', name });

export const anyName = (names: readonly string[]): MatchPredicate => ({ kind: 'anyName', names });

export const hasTag = (tag: string): MatchPredicate => ({ kind: 'tag', tag });

export const hasValue = (): MatchPredicate => ({ kind: 'hasValue' });

export const isMatch = (match: Match): MatchPredicate => ({ kind: 'identity', match });

export const not = (predicate: MatchPredicate): MatchPredicate => ({ kind: 'not', predicate });

export const allOf = (...predicates: MatchPredicate[]): MatchPredicate => ({ kind: 'allOf', predicates });

export function test(predicate: MatchPredicate, match: Match): boolean {
  switch (predicate.kind) {
    case 'name':
      return match.name === predicate.name;
    case 'anyName':
      return predicate.names.includes(match.name);
    case 'tag':
      return match.hasTag(predicate.tag);
    case 'hasValue':
      return match.value.length > 0;
    case 'identity':
      return match === predicate.match;
    case 'not':
      return !test(predicate.predicate, match);
    case 'allOf':
      return predicate.predicates.every((p) => test(p, match));
  }
}
