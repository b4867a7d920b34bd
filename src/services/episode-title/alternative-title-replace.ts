import { SEPS, byName, hasTag } from '../matches/index.js';
import type { Consequence, Matches } from '../matches/index.js';
import { Rule, relabel } from '../rules/index.js';
import { hasEpisodeContext } from './anchors.js';

/**
 * "S01E02 Show - Pilot": the alternative title glued to an anchored main
 * title is really the episode title.
 */
export class AlternativeTitleReplace extends Rule {
  readonly id = 'AlternativeTitleReplace';
  readonly dependencies = ['EpisodeTitleFromPosition'];

  when(matches: Matches): Consequence[] {
    if (matches.named('episodeTitle').length > 0) return [];

    const alternative = matches.range(0, undefined, byName('alternativeTitle'), 0);
    if (!alternative) return [];

    const mainTitle = matches.chainBefore(alternative.start, SEPS, hasTag('title'), 0);
    if (!mainTitle || !hasEpisodeContext(mainTitle, matches)) return [];

    return [relabel(alternative, 'episodeTitle')];
  }
}
