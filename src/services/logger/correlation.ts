import { randomUUID } from 'crypto';

/**
 * Generate a short correlation ID for tracing one file name through the rules.
 * Uses first 8 chars of a UUID for brevity in logs.
 */
export function generateCorrelationId(): string {
  return randomUUID().slice(0, 8);
}

/**
 * Context object passed through the rule pipeline.
 * Every rule receives this and the executor includes it in log calls.
 */
export interface RuleContext {
  correlationId: string;
  input: string;
  /** Media type hint from the host; `episode` narrows episodeDetails removal. */
  type?: 'episode' | 'movie';
}

/**
 * Create a new rule context for a file name entering the pipeline.
 */
export function createRuleContext(input: string, type?: RuleContext['type']): RuleContext {
  return {
    correlationId: generateCorrelationId(),
    input,
    type,
  };
}
