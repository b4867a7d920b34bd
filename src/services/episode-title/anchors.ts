import { anyName } from '../matches/index.js';
import type { Matches, Span } from '../matches/index.js';

/** Tags that mark a file name as a single-episode release. */
export const EPISODE_ANCHORS = [
  'episodeNumber',
  'episodeDetails',
  'episodeCount',
  'season',
  'seasonCount',
  'date',
  'title',
] as const;

const EPISODE_ANCHOR = anyName(EPISODE_ANCHORS);

/**
 * True when the match right before `span` is an episode anchor, or when the
 * name carries a checksum anywhere. With `within`, an anchor outside that
 * segment does not count.
 */
export function hasEpisodeContext(span: Span, matches: Matches, within?: Span): boolean {
  const anchor = matches.previous(span, EPISODE_ANCHOR, 0);
  if (anchor && (!within || anchor.start >= within.start)) return true;
  return matches.named('crc32').length > 0;
}
