/**
 * Series title from an ancestor directory when the path is laid out as
 * series / season / episode.
 *
 *   Serie name/S01/E01-episodeTitle.mkv     → title from "Serie name"  (3 parts)
 *   Serie name S01/E01-episodeTitle.mkv     → title from "Serie name"  (2 parts)
 */
import { TITLE_SEPS, byName, cleanup, hasValue } from '../matches/index.js';
import type { Consequence, Matches } from '../matches/index.js';
import { Rule, append } from '../rules/index.js';

/**
 * Needs `depth` path segments, an episode number in the file name and a
 * season in its directory; the title is the first hole of the segment
 * `depth` levels from the end, unless that segment already holds a title.
 */
function titleFromAncestor(matches: Matches, depth: number): Consequence[] {
  const paths = matches.markers.named('path');
  if (paths.length < depth) return [];

  const filename = paths.at(-1);
  const directory = paths.at(-2);
  const source = paths.at(-depth);
  if (!filename || !directory || !source) return [];

  const episodeNumber = matches.range(filename.start, filename.end, byName('episodeNumber'), 0);
  if (!episodeNumber) return [];
  const season = matches.range(directory.start, directory.end, byName('season'), 0);
  if (!season) return [];

  // Already taken on an earlier pass.
  if (matches.range(source.start, source.end, byName('title'), 0)) return [];

  const hole = matches.holes(
    source.start,
    source.end,
    { formatter: cleanup, seps: TITLE_SEPS, predicate: hasValue() },
    0,
  );
  return hole ? [append(hole.rename('title'))] : [];
}

export class Filepart3EpisodeTitle extends Rule {
  readonly id = 'Filepart3EpisodeTitle';

  when(matches: Matches): Consequence[] {
    return titleFromAncestor(matches, 3);
  }
}

export class Filepart2EpisodeTitle extends Rule {
  readonly id = 'Filepart2EpisodeTitle';

  when(matches: Matches): Consequence[] {
    return titleFromAncestor(matches, 2);
  }
}
