import { hasTag } from '../matches/index.js';
import type { Consequence, Matches } from '../matches/index.js';
import type { RuleContext } from '../logger/correlation.js';
import { PositionalTitleRule } from './positional-title-rule.js';

/**
 * Main title from the first usable hole; trailing parts after a title
 * separator become alternative titles.
 */
export class TitleFromPosition extends PositionalTitleRule {
  readonly id = 'TitleFromPosition';

  constructor(readonly dependencies: readonly string[] = []) {
    super('title', ['title'], 'alternativeTitle');
  }

  when(matches: Matches, context: RuleContext): Consequence[] {
    // Titles appended by the path rules carry no tag and do not count.
    if (matches.named('title', hasTag('title')).length > 0) return [];
    return super.when(matches, context);
  }
}
