import pino from 'pino';
import { config } from '../../config/index.js';
import { RuleExecutionError, toErrorObject } from '../../utils/errors.js';
import type { Consequence, Match, Matches } from '../matches/index.js';
import type { RuleContext } from '../logger/correlation.js';
import type { Rule } from './rule.js';

const log = pino({ name: 'rule-executor', level: config.LOG_LEVEL });

export interface RuleTrace {
  rule: string;
  applied: boolean;
  skipped: boolean;
  /** Matches appended, removed or produced by a relabel. */
  affected: Match[];
}

function summarize(consequences: readonly Consequence[]): string[] {
  return consequences.map((c) => {
    const target = `${c.match.name}@${c.match.start}-${c.match.end}`;
    return c.kind === 'relabel' ? `relabel ${target} → ${c.name}` : `${c.kind} ${target}`;
  });
}

/**
 * Run already-ordered rules one at a time against `matches`.
 * Later rules see everything earlier rules changed.
 */
export function executeRules(
  rules: readonly Rule[],
  matches: Matches,
  context: RuleContext,
  options: { disabled?: ReadonlySet<string> } = {},
): RuleTrace[] {
  const traces: RuleTrace[] = [];
  const ctx = { correlationId: context.correlationId, input: context.input };

  for (const rule of rules) {
    if (options.disabled?.has(rule.id)) {
      traces.push({ rule: rule.id, applied: false, skipped: true, affected: [] });
      continue;
    }

    let affected: Match[];
    try {
      const consequences = rule.when(matches, context);
      if (consequences.length === 0) {
        traces.push({ rule: rule.id, applied: false, skipped: false, affected: [] });
        continue;
      }
      affected = matches.apply(consequences);
      log.debug(
        { ...ctx, rule: rule.id, consequences: summarize(consequences) },
        'Rule applied',
      );
    } catch (err) {
      const wrapped = new RuleExecutionError(rule.id, err);
      log.error({ ...ctx, err: toErrorObject(wrapped) }, 'Rule failed');
      throw wrapped;
    }

    traces.push({ rule: rule.id, applied: true, skipped: false, affected });
  }

  return traces;
}
