export { Rule, append, remove, relabel } from './rule.js';
export { resolveRuleOrder } from './rule-graph.js';
export { executeRules } from './executor.js';
export type { RuleTrace } from './executor.js';
