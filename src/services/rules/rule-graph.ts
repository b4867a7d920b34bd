import { DuplicateRuleError, RuleCycleError, UnknownRuleDependencyError } from '../../utils/errors.js';
import type { Rule } from './rule.js';

/**
 * Order rules so every rule runs after its dependencies.
 * Pure function — resolved once, before any rule executes.
 *
 * Among rules whose dependencies are all satisfied, the one registered first
 * runs first, so registration order only breaks ties.
 */
export function resolveRuleOrder<T extends Rule>(rules: readonly T[]): T[] {
  const byId = new Map<string, T>();
  for (const rule of rules) {
    if (byId.has(rule.id)) throw new DuplicateRuleError(rule.id);
    byId.set(rule.id, rule);
  }

  const remaining = new Map<string, number>();
  const dependents = new Map<string, string[]>();
  for (const rule of rules) {
    for (const dependency of rule.dependencies) {
      if (!byId.has(dependency)) throw new UnknownRuleDependencyError(rule.id, dependency);
      dependents.set(dependency, [...(dependents.get(dependency) ?? []), rule.id]);
    }
    remaining.set(rule.id, new Set(rule.dependencies).size);
  }

  const ordered: T[] = [];
  const placed = new Set<string>();
  while (ordered.length < rules.length) {
    const ready = rules.find((rule) => !placed.has(rule.id) && remaining.get(rule.id) === 0);
    if (!ready) {
      throw new RuleCycleError(rules.filter((rule) => !placed.has(rule.id)).map((rule) => rule.id));
    }
    ordered.push(ready);
    placed.add(ready.id);
    for (const dependent of new Set(dependents.get(ready.id))) {
      remaining.set(dependent, (remaining.get(dependent) ?? 0) - 1);
    }
  }
  return ordered;
}
