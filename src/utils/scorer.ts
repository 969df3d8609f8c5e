import { ExitCode, Finding, ReportSummary } from '../types';

export function calculateSummary(findings: Finding[]): ReportSummary {
  let high = 0;
  let medium = 0;
  const resources = new Set<string>();
  const namespaces = new Set<string>();

  for (const finding of findings) {
    switch (finding.severity) {
      case 'HIGH': high++; break;
      case 'MEDIUM': medium++; break;
    }

    resources.add(JSON.stringify([finding.kind, finding.name]));

    // cluster-scoped findings carry no namespace
    if (finding.namespace !== '') {
      namespaces.add(finding.namespace);
    }
  }

  return {
    high,
    medium,
    resourcesAffected: resources.size,
    namespacesAffected: namespaces.size,
  };
}

/** HIGH beats MEDIUM beats clean. Errors never reach here; the CLI maps them to ExitCode.ERROR. */
export function getExitCode(findings: Finding[]): ExitCode {
  if (findings.some(f => f.severity === 'HIGH')) return ExitCode.HIGH;
  if (findings.some(f => f.severity === 'MEDIUM')) return ExitCode.MEDIUM;
  return ExitCode.OK;
}
