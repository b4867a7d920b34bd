import type { Consequence, Match, Matches } from '../matches/index.js';
import type { RuleContext } from '../logger/correlation.js';

/**
 * One disambiguation step. `when` inspects the collection and returns the
 * changes it wants; an empty list means the rule does not apply.
 */
export abstract class Rule {
  abstract readonly id: string;
  /** Ids of rules that must run before this one. */
  readonly dependencies: readonly string[] = [];

  abstract when(matches: Matches, context: RuleContext): Consequence[];
}

export const append = (match: Match): Consequence => ({ kind: 'append', match });

export const remove = (match: Match): Consequence => ({ kind: 'remove', match });

export const relabel = (match: Match, name: string): Consequence => ({ kind: 'relabel', match, name });
