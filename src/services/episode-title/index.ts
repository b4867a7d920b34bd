import pino from 'pino';
import { config } from '../../config/index.js';
import { ConfigurationError } from '../../utils/errors.js';
import type { Matches } from '../matches/index.js';
import { createRuleContext } from '../logger/correlation.js';
import type { RuleContext } from '../logger/correlation.js';
import { executeRules, resolveRuleOrder } from '../rules/index.js';
import type { Rule, RuleTrace } from '../rules/index.js';
import { TitleFromPosition } from '../titles/index.js';
import { AlternativeTitleReplace } from './alternative-title-replace.js';
import { EpisodeTitleFromPosition } from './episode-title-from-position.js';
import { Filepart2EpisodeTitle, Filepart3EpisodeTitle } from './filepart-episode-title.js';
import { TitleToEpisodeTitle } from './title-to-episode-title.js';

const log = pino({ name: 'episode-title', level: config.LOG_LEVEL });

/**
 * The episode title rule set, as a dependency graph:
 *
 *   Filepart3EpisodeTitle ─┐
 *                          ├─► TitleFromPosition ─► TitleToEpisodeTitle
 *   Filepart2EpisodeTitle ─┘     ─► EpisodeTitleFromPosition ─► AlternativeTitleReplace
 *
 * The path rules run first: they only ever add `title` matches, which the
 * promotion chain then consumes.
 */
export function createEpisodeTitleRules(): Rule[] {
  return [
    new Filepart3EpisodeTitle(),
    new Filepart2EpisodeTitle(),
    new TitleFromPosition(['Filepart3EpisodeTitle', 'Filepart2EpisodeTitle']),
    new TitleToEpisodeTitle(),
    new EpisodeTitleFromPosition(),
    new AlternativeTitleReplace(),
  ];
}

export interface EpisodeTitleResolverOptions {
  /** Defaults to the full episode title rule set. */
  rules?: readonly Rule[];
  /** Rule ids to skip. Defaults to EPISODE_TITLE_DISABLED_RULES. */
  disabledRules?: readonly string[];
}

export class EpisodeTitleResolver {
  private readonly rules: Rule[];
  private readonly disabled: ReadonlySet<string>;

  constructor(options: EpisodeTitleResolverOptions = {}) {
    this.rules = resolveRuleOrder(options.rules ?? createEpisodeTitleRules());

    const disabled = options.disabledRules ?? config.EPISODE_TITLE_DISABLED_RULES;
    const known = new Set(this.rules.map((rule) => rule.id));
    const unknown = disabled.filter((id) => !known.has(id));
    if (unknown.length > 0) {
      throw new ConfigurationError(`Unknown rule ids in disabled rules: ${unknown.join(', ')}`, unknown);
    }
    this.disabled = new Set(disabled);

    log.debug({ order: this.order, disabled }, 'Episode title rules resolved');
  }

  /** Rule ids in execution order. */
  get order(): string[] {
    return this.rules.map((rule) => rule.id);
  }

  /** Run every rule once, mutating `matches` in place. */
  resolve(matches: Matches, context: RuleContext = createRuleContext(matches.input)): RuleTrace[] {
    return executeRules(this.rules, matches, context, { disabled: this.disabled });
  }
}

export { EPISODE_ANCHORS, hasEpisodeContext } from './anchors.js';
export { TitleToEpisodeTitle } from './title-to-episode-title.js';
export { EpisodeTitleFromPosition } from './episode-title-from-position.js';
export { AlternativeTitleReplace } from './alternative-title-replace.js';
export { Filepart3EpisodeTitle, Filepart2EpisodeTitle } from './filepart-episode-title.js';
