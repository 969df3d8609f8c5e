import chalk from 'chalk';
import { Finding, ScanReport, Severity } from '../types';
import { ScanError, errorMessage } from '../errors';

type Palette = chalk.Chalk;

function severityColor(palette: Palette, severity: Severity): Palette {
  switch (severity) {
    case 'HIGH': return palette.red.bold;
    case 'MEDIUM': return palette.yellow.bold;
  }
}

export const NO_FINDINGS_MESSAGE = 'No security issues found.';

/** chalk instance for the given colour setting; `false` yields plain text. */
export function createPalette(color: boolean): Palette {
  return new chalk.Instance({ level: color ? (chalk.level > 0 ? chalk.level : 1) : 0 });
}

function formatFinding(finding: Finding, palette: Palette): string[] {
  const lines = [
    severityColor(palette, finding.severity)(`${finding.severity} RISK`),
    `Resource: ${finding.kind}/${finding.name}`,
  ];
  if (finding.namespace) {
    lines.push(`Namespace: ${finding.namespace}`);
  }
  lines.push(
    `Rule: ${finding.ruleId}`,
    `Reason: ${finding.reason}`,
    `Impact: ${finding.impact}`,
    palette.green(`Fix: ${finding.fix}`),
  );
  return lines;
}

/**
 * Plain-text report: one block per finding, blank line between blocks, then SUMMARY.
 */
export function formatHumanReport(report: ScanReport, palette: Palette = chalk): string {
  if (report.findings.length === 0) {
    return palette.green(NO_FINDINGS_MESSAGE) + '\n';
  }

  const lines: string[] = [];
  report.findings.forEach((finding, i) => {
    if (i > 0) lines.push('');
    lines.push(...formatFinding(finding, palette));
  });

  const s = report.summary;
  lines.push('');
  lines.push(palette.bold('SUMMARY'));
  lines.push(`High risk: ${s.high}`);
  lines.push(`Medium risk: ${s.medium}`);
  lines.push(`Resources affected: ${s.resourcesAffected}`);
  if (s.namespacesAffected > 0) {
    lines.push(`Namespaces affected: ${s.namespacesAffected}`);
  }

  return lines.join('\n') + '\n';
}

export interface JsonFinding {
  rule_id: string;
  severity: Severity;
  kind: string;
  name: string;
  namespace: string;
  reason: string;
  impact: string;
  fix: string;
}

export interface JsonReport {
  summary: {
    high: number;
    medium: number;
    resources_affected: number;
    namespaces_affected: number;
  };
  findings: JsonFinding[];
}

/** Wire shape with snake_case names; property order here is the output key order. */
export function toJsonReport(report: ScanReport): JsonReport {
  return {
    summary: {
      high: report.summary.high,
      medium: report.summary.medium,
      resources_affected: report.summary.resourcesAffected,
      namespaces_affected: report.summary.namespacesAffected,
    },
    findings: report.findings.map(f => ({
      rule_id: f.ruleId,
      severity: f.severity,
      kind: f.kind,
      name: f.name,
      namespace: f.namespace,
      reason: f.reason,
      impact: f.impact,
      fix: f.fix,
    })),
  };
}

export function formatJsonReport(report: ScanReport): string {
  return JSON.stringify(toJsonReport(report), null, 2) + '\n';
}

export function writeReport(text: string, write: (chunk: string) => void): void {
  try {
    write(text);
  } catch (err) {
    throw new ScanError('OUTPUT_FAILED', `failed to write report: ${errorMessage(err)}`, { cause: err });
  }
}
