export type Severity = 'HIGH' | 'MEDIUM';

export type RuleId =
  | 'privileged-container'
  | 'hostpath-volume'
  | 'docker-socket-mount'
  | 'runs-as-root'
  | 'privilege-escalation-allowed'
  | 'wildcard-rbac'
  | 'clusterrolebinding-default-sa'
  | 'public-loadbalancer'
  | 'nodeport-service'
  | 'latest-image-tag'
  | 'host-network'
  | 'host-pid-ipc';

export interface Finding {
  ruleId: RuleId;
  severity: Severity;
  kind: string;
  name: string;
  namespace: string; // empty for cluster-scoped resources
  reason: string;
  impact: string;
  fix: string;
}

export interface ScanResult {
  findings: Finding[];
  resourcesScanned: number;
}

export interface ReportSummary {
  high: number;
  medium: number;
  resourcesAffected: number;
  namespacesAffected: number;
}

export interface ScanReport {
  summary: ReportSummary;
  findings: Finding[];
}

export type OutputFormat = 'human' | 'json';

export interface ScanOptions {
  includeMedium?: boolean;
  format?: OutputFormat;
}

export const ExitCode = {
  OK: 0,
  MEDIUM: 1,
  HIGH: 2,
  ERROR: 3,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];
