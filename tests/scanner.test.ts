import { parseManifest } from '../src/loader';
import { ResourceScanner, filterHighOnly, findingKey } from '../src/scanner';
import { Finding } from '../src/types';

const PRIVILEGED_POD = `
apiVersion: v1
kind: Pod
metadata:
  name: api
  namespace: prod
spec:
  securityContext:
    runAsNonRoot: true
  containers:
    - name: app
      image: registry.local/api:2.1.0
      securityContext:
        privileged: true
`;

const NOISY_DEPLOYMENT = `
apiVersion: apps/v1
kind: Deployment
metadata:
  name: worker
  namespace: jobs
spec:
  template:
    spec:
      hostNetwork: true
      containers:
        - name: worker
          image: worker:latest
`;

const NODEPORT_SERVICE = `
apiVersion: v1
kind: Service
metadata:
  name: debug
  namespace: jobs
spec:
  type: NodePort
`;

const WILDCARD_ROLE = `
apiVersion: rbac.authorization.k8s.io/v1
kind: ClusterRole
metadata:
  name: god-mode
rules:
  - apiGroups: ["*"]
    resources: ["*"]
    verbs: ["*"]
`;

const CONFIG_MAP = `
apiVersion: v1
kind: ConfigMap
metadata:
  name: settings
data:
  hostNetwork: "true"
`;

function docs(...parts: string[]) {
  return parseManifest(parts.join('\n---\n'));
}

function keys(findings: Finding[]): string[] {
  return findings.map(f => `${f.ruleId}:${f.kind}/${f.name}`);
}

describe('ResourceScanner.scan', () => {
  test('privileged pod yields exactly one HIGH finding', () => {
    const result = new ResourceScanner().scan(docs(PRIVILEGED_POD));
    expect(result.resourcesScanned).toBe(1);
    expect(result.findings).toHaveLength(1);
    expect(result.findings[0]).toMatchObject({
      ruleId: 'privileged-container',
      severity: 'HIGH',
      kind: 'Pod',
      name: 'api',
      namespace: 'prod',
    });
  });

  test('orders findings by resource, then by rule', () => {
    const result = new ResourceScanner({ includeMedium: true }).scan(
      docs(NOISY_DEPLOYMENT, PRIVILEGED_POD, NODEPORT_SERVICE),
    );
    expect(keys(result.findings)).toEqual([
      'runs-as-root:Deployment/worker',
      'latest-image-tag:Deployment/worker',
      'host-network:Deployment/worker',
      'privileged-container:Pod/api',
      'nodeport-service:Service/debug',
    ]);
  });

  test('default run keeps HIGH findings only', () => {
    const result = new ResourceScanner().scan(docs(NOISY_DEPLOYMENT, NODEPORT_SERVICE));
    expect(keys(result.findings)).toEqual(['host-network:Deployment/worker']);
  });

  test('HIGH-only result is the HIGH subset of the full result', () => {
    const resources = docs(NOISY_DEPLOYMENT, PRIVILEGED_POD, NODEPORT_SERVICE, WILDCARD_ROLE);
    const all = new ResourceScanner({ includeMedium: true }).scan(resources).findings;
    const highOnly = new ResourceScanner({ includeMedium: false }).scan(resources).findings;

    expect(highOnly).toEqual(all.filter(f => f.severity === 'HIGH'));
    expect(highOnly.length).toBeLessThan(all.length);
  });

  test('unsupported kinds are skipped and not counted', () => {
    const result = new ResourceScanner({ includeMedium: true }).scan(docs(CONFIG_MAP));
    expect(result).toEqual({ findings: [], resourcesScanned: 0 });
  });

  test('input order does not change the finding set', () => {
    const scanner = new ResourceScanner({ includeMedium: true });
    const forward = scanner.scan(docs(NOISY_DEPLOYMENT, WILDCARD_ROLE)).findings;
    const backward = scanner.scan(docs(WILDCARD_ROLE, NOISY_DEPLOYMENT)).findings;

    expect(forward.map(findingKey).sort()).toEqual(backward.map(findingKey).sort());
    expect(keys(backward)[0]).toBe('wildcard-rbac:ClusterRole/god-mode');
  });

  test('getRules exposes the fixed battery', () => {
    expect(new ResourceScanner().getRules()).toHaveLength(12);
  });
});

describe('ResourceScanner.diff', () => {
  test('identical inputs produce no findings', () => {
    const scanner = new ResourceScanner({ includeMedium: true });
    const set = docs(NOISY_DEPLOYMENT, PRIVILEGED_POD, NODEPORT_SERVICE, WILDCARD_ROLE);
    expect(scanner.diff(set, set).findings).toEqual([]);
  });

  test('one added risky resource yields exactly its finding', () => {
    const scanner = new ResourceScanner();
    const before = docs(NOISY_DEPLOYMENT);
    const after = docs(NOISY_DEPLOYMENT, WILDCARD_ROLE);

    const result = scanner.diff(before, after);
    expect(keys(result.findings)).toEqual(['wildcard-rbac:ClusterRole/god-mode']);
    expect(result.resourcesScanned).toBe(3);
  });

  test('removed findings are not reported', () => {
    const result = new ResourceScanner().diff(docs(PRIVILEGED_POD, WILDCARD_ROLE), docs(PRIVILEGED_POD));
    expect(result.findings).toEqual([]);
  });

  test('the same resource name in another namespace is a new finding', () => {
    const before = docs(PRIVILEGED_POD);
    const after = docs(PRIVILEGED_POD, PRIVILEGED_POD.replace('namespace: prod', 'namespace: staging'));

    const result = new ResourceScanner().diff(before, after);
    expect(result.findings).toHaveLength(1);
    expect(result.findings[0].namespace).toBe('staging');
  });

  test('MEDIUM findings stay out of a HIGH-only diff', () => {
    const result = new ResourceScanner().diff([], docs(NODEPORT_SERVICE));
    expect(result.findings).toEqual([]);
    expect(result.resourcesScanned).toBe(1);
  });

  test('MEDIUM findings appear when included', () => {
    const result = new ResourceScanner({ includeMedium: true }).diff([], docs(NODEPORT_SERVICE));
    expect(keys(result.findings)).toEqual(['nodeport-service:Service/debug']);
  });
});

describe('findingKey', () => {
  const base: Finding = {
    ruleId: 'host-network',
    severity: 'HIGH',
    kind: 'Pod',
    name: 'a',
    namespace: 'b',
    reason: 'r',
    impact: 'i',
    fix: 'f',
  };

  test('ignores severity and texts', () => {
    expect(findingKey({ ...base, severity: 'MEDIUM', reason: 'other' })).toBe(findingKey(base));
  });

  test('does not collide when a separator appears inside a field', () => {
    expect(findingKey({ ...base, name: 'a|b', namespace: '' })).not.toBe(findingKey({ ...base, name: 'a', namespace: 'b|' }));
  });
});

describe('filterHighOnly', () => {
  test('drops MEDIUM findings and keeps order', () => {
    const findings = new ResourceScanner({ includeMedium: true }).scan(docs(NOISY_DEPLOYMENT, PRIVILEGED_POD)).findings;
    expect(keys(filterHighOnly(findings))).toEqual([
      'host-network:Deployment/worker',
      'privileged-container:Pod/api',
    ]);
  });
});
