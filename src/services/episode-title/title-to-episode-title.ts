import { byName } from '../matches/index.js';
import type { Consequence, Matches } from '../matches/index.js';
import { Rule, relabel } from '../rules/index.js';

/**
 * With several titles, the ones right after an episode number are episode titles.
 */
export class TitleToEpisodeTitle extends Rule {
  readonly id = 'TitleToEpisodeTitle';
  readonly dependencies = ['TitleFromPosition'];

  when(matches: Matches): Consequence[] {
    const titles = matches.named('title');
    if (titles.length < 2) return [];

    return titles
      .filter((title) => matches.previous(title, byName('episodeNumber')).length > 0)
      .map((title) => relabel(title, 'episodeTitle'));
  }
}
