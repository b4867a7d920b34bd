export * from './services/matches/index.js';
export * from './services/rules/index.js';
export * from './services/titles/index.js';
export * from './services/episode-title/index.js';
export { createRuleContext, generateCorrelationId } from './services/logger/correlation.js';
export type { RuleContext } from './services/logger/correlation.js';
export { loadConfig } from './config/index.js';
export type { AppConfig } from './config/index.js';
export {
  AppError,
  ConfigurationError,
  MatchNotFoundError,
  DuplicateRuleError,
  UnknownRuleDependencyError,
  RuleCycleError,
  RuleExecutionError,
  getErrorMessage,
  toErrorObject,
} from './utils/errors.js';
