export { PositionalTitleRule, TITLE_FORMATTER, markerSorted, fileparts } from './positional-title-rule.js';
export type { KeepDecision } from './positional-title-rule.js';
export { TitleFromPosition } from './title-from-position.js';
