import { Match } from './match.js';
import { Matches } from './matches.js';

const PATH_SEPARATORS = '/\\';

/**
 * One `path` marker per non-empty segment of `input`, shallowest first.
 * "Show/Season 1/E01.mkv" → [0,4) [5,13) [14,21)
 */
export function pathMarkers(input: string): Match[] {
  const markers: Match[] = [];
  let segmentStart = 0;
  for (let i = 0; i <= input.length; i++) {
    if (i === input.length || PATH_SEPARATORS.includes(input.charAt(i))) {
      if (i > segmentStart) markers.push(new Match(segmentStart, i, input, { name: 'path' }));
      segmentStart = i + 1;
    }
  }
  return markers;
}

/**
 * One `group` marker per bracketed area, brackets included.
 */
export function groupMarkers(input: string): Match[] {
  const markers: Match[] = [];
  for (const found of input.matchAll(/\[[^\][]*\]/g)) {
    const start = found.index ?? 0;
    markers.push(new Match(start, start + found[0].length, input, { name: 'group' }));
  }
  return markers;
}

/**
 * Build a store for `input` with path and group markers attached.
 */
export function createMatches(input: string, matches: readonly Match[] = []): Matches {
  return new Matches(input, {
    matches,
    markers: [...pathMarkers(input), ...groupMarkers(input)],
  });
}
