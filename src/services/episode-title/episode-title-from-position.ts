import { byName } from '../matches/index.js';
import type { Consequence, Match, Matches } from '../matches/index.js';
import type { RuleContext } from '../logger/correlation.js';
import { PositionalTitleRule } from '../titles/index.js';
import type { KeepDecision } from '../titles/index.js';
import { hasEpisodeContext } from './anchors.js';

/**
 * Episode title from the unmatched text after an episode anchor, in the
 * segment where the main title was found.
 */
export class EpisodeTitleFromPosition extends PositionalTitleRule {
  readonly id = 'EpisodeTitleFromPosition';
  readonly dependencies = ['TitleToEpisodeTitle'];
  protected readonly ignoredNames = ['language', 'country', 'episodeDetails'];

  constructor() {
    super('episodeTitle', ['title']);
  }

  protected holeFilter(hole: Match, matches: Matches, filepart: Match): boolean {
    return hasEpisodeContext(hole, matches, filepart);
  }

  protected filepartFilter(filepart: Match, matches: Matches): boolean {
    return matches.range(filepart.start, filepart.end, byName('title'), 0) !== undefined;
  }

  protected shouldKeep(
    match: Match,
    toKeep: readonly Match[],
    matches: Matches,
    filepart: Match,
    hole: Match,
    starting: boolean,
  ): KeepDecision {
    // "Pilot.Special" keeps both; "S01.Special" lets the title take it.
    if (match.name === 'episodeDetails' && matches.previous(match, byName('season')).length === 0) {
      return { keep: true, crop: false };
    }
    return super.shouldKeep(match, toKeep, matches, filepart, hole, starting);
  }

  protected shouldRemove(
    match: Match,
    matches: Matches,
    filepart: Match,
    hole: Match,
    context: RuleContext,
  ): boolean {
    if (context.type === 'episode' && match.name === 'episodeDetails') {
      return match.start >= hole.start && match.end <= hole.end;
    }
    return super.shouldRemove(match, matches, filepart, hole, context);
  }

  when(matches: Matches, context: RuleContext): Consequence[] {
    if (matches.named('episodeTitle').length > 0) return [];
    return super.when(matches, context);
  }
}
