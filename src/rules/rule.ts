import { Finding, RuleId, Severity } from '../types';
import { Resource } from '../resource';

/**
 * One fixed check. `evaluate` is pure: it reads the resource, never throws,
 * and returns an empty list when the rule does not apply.
 */
export interface RuleModule {
  readonly id: RuleId;
  readonly severity: Severity;
  readonly description: string;
  evaluate(resource: Resource): Finding[];
}

export interface FindingText {
  reason: string;
  impact: string;
  fix: string;
}

export function createFinding(rule: RuleModule, resource: Resource, text: FindingText): Finding {
  return {
    ruleId: rule.id,
    severity: rule.severity,
    kind: resource.kind,
    name: resource.metadata.name,
    namespace: resource.metadata.namespace,
    reason: text.reason,
    impact: text.impact,
    fix: text.fix,
  };
}
