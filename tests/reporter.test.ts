import {
  NO_FINDINGS_MESSAGE,
  createPalette,
  formatHumanReport,
  formatJsonReport,
  toJsonReport,
  writeReport,
} from '../src/utils/reporter';
import { ScanError } from '../src/errors';
import { Finding, ScanReport } from '../src/types';

const plain = createPalette(false);

const PRIVILEGED: Finding = {
  ruleId: 'privileged-container',
  severity: 'HIGH',
  kind: 'Pod',
  name: 'api',
  namespace: 'prod',
  reason: 'Container runs in privileged mode',
  impact: 'Full host access if container is compromised',
  fix: 'Remove privileged flag or set to false',
};

const WILDCARD: Finding = {
  ruleId: 'wildcard-rbac',
  severity: 'HIGH',
  kind: 'ClusterRole',
  name: 'god-mode',
  namespace: '',
  reason: 'Grants wildcard permissions (verbs: *, resources: *)',
  impact: 'Complete cluster control for any principal with this role',
  fix: 'Specify explicit verbs and resources',
};

function makeReport(overrides: Partial<ScanReport> = {}): ScanReport {
  return {
    summary: { high: 0, medium: 0, resourcesAffected: 0, namespacesAffected: 0 },
    findings: [],
    ...overrides,
  };
}

describe('formatHumanReport', () => {
  test('no findings prints exactly one line', () => {
    expect(formatHumanReport(makeReport(), plain)).toBe(`${NO_FINDINGS_MESSAGE}\n`);
    expect(NO_FINDINGS_MESSAGE).toBe('No security issues found.');
  });

  test('single namespaced finding with summary', () => {
    const text = formatHumanReport(makeReport({
      findings: [PRIVILEGED],
      summary: { high: 1, medium: 0, resourcesAffected: 1, namespacesAffected: 1 },
    }), plain);

    expect(text).toBe([
      'HIGH RISK',
      'Resource: Pod/api',
      'Namespace: prod',
      'Rule: privileged-container',
      'Reason: Container runs in privileged mode',
      'Impact: Full host access if container is compromised',
      'Fix: Remove privileged flag or set to false',
      '',
      'SUMMARY',
      'High risk: 1',
      'Medium risk: 0',
      'Resources affected: 1',
      'Namespaces affected: 1',
      '',
    ].join('\n'));
  });

  test('cluster-scoped finding omits Namespace and zero namespace count', () => {
    const text = formatHumanReport(makeReport({
      findings: [WILDCARD],
      summary: { high: 1, medium: 0, resourcesAffected: 1, namespacesAffected: 0 },
    }), plain);

    expect(text.split('\n')).toEqual([
      'HIGH RISK',
      'Resource: ClusterRole/god-mode',
      'Rule: wildcard-rbac',
      'Reason: Grants wildcard permissions (verbs: *, resources: *)',
      'Impact: Complete cluster control for any principal with this role',
      'Fix: Specify explicit verbs and resources',
      '',
      'SUMMARY',
      'High risk: 1',
      'Medium risk: 0',
      'Resources affected: 1',
      '',
    ]);
  });

  test('blank line between findings', () => {
    const lines = formatHumanReport(makeReport({
      findings: [PRIVILEGED, { ...PRIVILEGED, severity: 'MEDIUM', ruleId: 'runs-as-root' }],
      summary: { high: 1, medium: 1, resourcesAffected: 1, namespacesAffected: 1 },
    }), plain).split('\n');

    expect(lines[7]).toBe('');
    expect(lines[8]).toBe('MEDIUM RISK');
  });

  test('colour only adds escape codes', () => {
    const report = makeReport({
      findings: [PRIVILEGED],
      summary: { high: 1, medium: 0, resourcesAffected: 1, namespacesAffected: 1 },
    });
    const colored = formatHumanReport(report, createPalette(true));

    expect(colored).toContain('\u001b[31m');
    expect(colored.replace(/\u001b\[[0-9;]*m/g, '')).toBe(formatHumanReport(report, plain));
  });
});

describe('JSON report', () => {
  const report = makeReport({
    findings: [PRIVILEGED, WILDCARD],
    summary: { high: 2, medium: 0, resourcesAffected: 2, namespacesAffected: 1 },
  });

  test('uses snake_case names in a fixed key order', () => {
    const json = toJsonReport(report);
    expect(Object.keys(json)).toEqual(['summary', 'findings']);
    expect(Object.keys(json.summary)).toEqual(['high', 'medium', 'resources_affected', 'namespaces_affected']);
    expect(Object.keys(json.findings[0])).toEqual([
      'rule_id', 'severity', 'kind', 'name', 'namespace', 'reason', 'impact', 'fix',
    ]);
  });

  test('is pretty-printed with a trailing newline', () => {
    const text = formatJsonReport(report);
    expect(text.startsWith('{\n  "summary": {\n    "high": 2,')).toBe(true);
    expect(text.endsWith('}\n')).toBe(true);
  });

  test('decoding restores the summary and finding count', () => {
    const decoded = JSON.parse(formatJsonReport(report));
    expect(decoded.summary).toEqual({ high: 2, medium: 0, resources_affected: 2, namespaces_affected: 1 });
    expect(decoded.findings).toHaveLength(2);
    expect(decoded.findings[1]).toEqual({
      rule_id: 'wildcard-rbac',
      severity: 'HIGH',
      kind: 'ClusterRole',
      name: 'god-mode',
      namespace: '',
      reason: 'Grants wildcard permissions (verbs: *, resources: *)',
      impact: 'Complete cluster control for any principal with this role',
      fix: 'Specify explicit verbs and resources',
    });
  });

  test('empty finding list is an empty array', () => {
    expect(JSON.parse(formatJsonReport(makeReport())).findings).toEqual([]);
  });
});

describe('writeReport', () => {
  test('passes the text through', () => {
    const chunks: string[] = [];
    writeReport('hello\n', chunk => chunks.push(chunk));
    expect(chunks).toEqual(['hello\n']);
  });

  test('write failures become OUTPUT_FAILED', () => {
    const failing = () => {
      throw new Error('EPIPE');
    };
    let caught: unknown;
    try {
      writeReport('x', failing);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ScanError);
    expect(caught).toMatchObject({ code: 'OUTPUT_FAILED', message: 'failed to write report: EPIPE' });
  });
});
