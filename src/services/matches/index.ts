export { Match } from './match.js';
export type { Formatter, MatchInit, Span } from './match.js';
export { Matches, Markers } from './matches.js';
export type { Consequence, HolesOptions } from './matches.js';
export { pathMarkers, groupMarkers, createMatches } from './markers.js';
export { SEPS, TITLE_SEPS, cleanup, reorderTitle, formatters } from './formatters.js';
export { byName, anyName, hasTag, hasValue, isMatch, not, allOf, test } from './predicates.js';
export type { MatchPredicate } from './predicates.js';
