// src/utils/errors.ts
// ═══════════════════════════════════════════════════════════════════════════
// Error types for the rule engine. A rule that does not apply never throws;
// these cover broken rule graphs, bad configuration and store misuse.
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Base application error with structured data
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly isOperational: boolean;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    options: {
      code?: string;
      isOperational?: boolean;
      context?: Record<string, unknown>;
      cause?: Error;
    } = {}
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = options.code || 'INTERNAL_ERROR';
    this.isOperational = options.isOperational ?? true;
    this.context = options.context;

    if (options.cause) {
      this.cause = options.cause;
    }

    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Configuration error
 */
export class ConfigurationError extends AppError {
  constructor(message: string, invalidFields?: string[]) {
    super(message, {
      code: 'CONFIGURATION_ERROR',
      isOperational: false,
      context: { invalidFields },
    });
  }
}

/**
 * A consequence referenced a match the store does not hold
 */
export class MatchNotFoundError extends AppError {
  constructor(name: string, start: number, end: number) {
    super(`Match '${name}' [${start}, ${end}) is not in the collection`, {
      code: 'MATCH_NOT_FOUND',
      isOperational: false,
      context: { name, start, end },
    });
  }
}

export class DuplicateRuleError extends AppError {
  constructor(ruleId: string) {
    super(`Rule '${ruleId}' is registered more than once`, {
      code: 'DUPLICATE_RULE',
      isOperational: false,
      context: { ruleId },
    });
  }
}

export class UnknownRuleDependencyError extends AppError {
  constructor(ruleId: string, dependency: string) {
    super(`Rule '${ruleId}' depends on unregistered rule '${dependency}'`, {
      code: 'UNKNOWN_RULE_DEPENDENCY',
      isOperational: false,
      context: { ruleId, dependency },
    });
  }
}

export class RuleCycleError extends AppError {
  public readonly ruleIds: string[];

  constructor(ruleIds: string[]) {
    super(`Rule dependencies form a cycle between: ${ruleIds.join(', ')}`, {
      code: 'RULE_CYCLE',
      isOperational: false,
      context: { ruleIds },
    });
    this.ruleIds = ruleIds;
  }
}

/**
 * A rule threw while evaluating or applying its consequences
 */
export class RuleExecutionError extends AppError {
  public readonly ruleId: string;

  constructor(ruleId: string, originalError: unknown) {
    super(`Rule '${ruleId}' failed: ${getErrorMessage(originalError)}`, {
      code: 'RULE_EXECUTION_ERROR',
      isOperational: false,
      context: { ruleId },
      cause: originalError instanceof Error ? originalError : undefined,
    });
    this.ruleId = ruleId;
  }
}

/**
 * Safely extracts error message from unknown error type
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  if (typeof error === 'object' && error !== null && 'message' in error) {
    return String(error.message);
  }
  return 'Unknown error occurred';
}

/**
 * Creates a structured error object for logging
 */
export function toErrorObject(error: unknown): Record<string, unknown> {
  if (error instanceof AppError) {
    return {
      name: error.name,
      message: error.message,
      code: error.code,
      isOperational: error.isOperational,
      context: error.context,
      stack: error.stack,
    };
  }

  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }

  return {
    message: getErrorMessage(error),
    rawError: error,
  };
}
