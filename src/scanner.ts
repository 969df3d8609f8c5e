import { Finding, ScanOptions, ScanResult } from './types';
import { Resource, isSupportedKind } from './resource';
import { DEFAULT_RULES, RuleModule } from './rules';

/** Diff identity of a finding. Severity and texts are fixed per rule, so they stay out. */
export function findingKey(finding: Finding): string {
  return JSON.stringify([finding.ruleId, finding.kind, finding.name, finding.namespace]);
}

export function filterHighOnly(findings: Finding[]): Finding[] {
  return findings.filter(f => f.severity === 'HIGH');
}

export class ResourceScanner {
  private readonly rules: readonly RuleModule[] = DEFAULT_RULES;
  private readonly includeMedium: boolean;

  constructor(options: ScanOptions = {}) {
    this.includeMedium = options.includeMedium ?? false;
  }

  getRules(): readonly RuleModule[] {
    return this.rules;
  }

  /**
   * Run every rule over every supported resource.
   * Findings come out in resource order, then rule order.
   */
  scan(resources: readonly Resource[]): ScanResult {
    const findings: Finding[] = [];
    let resourcesScanned = 0;

    for (const resource of resources) {
      if (!isSupportedKind(resource.kind)) continue;
      resourcesScanned++;

      for (const rule of this.rules) {
        findings.push(...rule.evaluate(resource));
      }
    }

    return {
      findings: this.includeMedium ? findings : filterHighOnly(findings),
      resourcesScanned,
    };
  }

  /**
   * Findings present after the change but not before, matched by findingKey.
   * Both sides go through scan(), so the severity filter applies to each.
   */
  diff(oldResources: readonly Resource[], newResources: readonly Resource[]): ScanResult {
    const before = this.scan(oldResources);
    const after = this.scan(newResources);

    const known = new Set(before.findings.map(findingKey));

    return {
      findings: after.findings.filter(f => !known.has(findingKey(f))),
      resourcesScanned: before.resourcesScanned + after.resourcesScanned,
    };
  }
}
