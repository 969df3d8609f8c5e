import {
  ValueMap,
  getMap,
  getMapList,
  getMapPath,
  getScalarString,
  getString,
  getStringList,
  isScalar,
  isValueMap,
  toValue,
} from './utils/value';

export interface ResourceMetadata {
  readonly name: string;
  readonly namespace: string; // empty for cluster-scoped resources
  readonly labels: Readonly<Record<string, string>>;
  readonly annotations: Readonly<Record<string, string>>;
}

export interface PolicyRule {
  readonly apiGroups: readonly string[];
  readonly resources: readonly string[];
  readonly verbs: readonly string[];
}

export interface RoleRef {
  readonly apiGroup: string;
  readonly kind: string;
  readonly name: string;
}

export interface Subject {
  readonly kind: string;
  readonly name: string;
  readonly namespace: string;
}

/**
 * Normalized view of one manifest document. Rules only read it.
 *
 * `rules` is set for Role/ClusterRole, `roleRef` and `subjects` for
 * RoleBinding/ClusterRoleBinding; other kinds leave them undefined.
 */
export interface Resource {
  readonly apiVersion: string;
  readonly kind: string;
  readonly metadata: ResourceMetadata;
  readonly spec: ValueMap;
  readonly rules?: readonly PolicyRule[];
  readonly roleRef?: RoleRef;
  readonly subjects?: readonly Subject[];
}

export const SUPPORTED_KINDS: ReadonlySet<string> = new Set([
  'Pod',
  'Deployment',
  'StatefulSet',
  'DaemonSet',
  'Job',
  'CronJob',
  'Service',
  'Role',
  'ClusterRole',
  'RoleBinding',
  'ClusterRoleBinding',
]);

const EMPTY_SPEC: ValueMap = Object.freeze({});

const ROLE_KINDS: ReadonlySet<string> = new Set(['Role', 'ClusterRole']);
const BINDING_KINDS: ReadonlySet<string> = new Set(['RoleBinding', 'ClusterRoleBinding']);

export function isSupportedKind(kind: string): boolean {
  return SUPPORTED_KINDS.has(kind);
}

export function isRoleKind(kind: string): boolean {
  return ROLE_KINDS.has(kind);
}

export function isBindingKind(kind: string): boolean {
  return BINDING_KINDS.has(kind);
}

function stringMap(map: ValueMap | undefined): Readonly<Record<string, string>> {
  const out: Record<string, string> = {};
  if (map) {
    for (const [key, value] of Object.entries(map)) {
      if (isScalar(value)) {
        out[key] = String(value);
      }
    }
  }
  return Object.freeze(out);
}

function normalizePolicyRule(raw: ValueMap): PolicyRule {
  return Object.freeze({
    apiGroups: Object.freeze(getStringList(raw, 'apiGroups')),
    resources: Object.freeze(getStringList(raw, 'resources')),
    verbs: Object.freeze(getStringList(raw, 'verbs')),
  });
}

function normalizeSubject(raw: ValueMap): Subject {
  return Object.freeze({
    kind: getString(raw, 'kind') ?? '',
    name: getScalarString(raw, 'name') ?? '',
    namespace: getScalarString(raw, 'namespace') ?? '',
  });
}

function normalizeRoleRef(raw: ValueMap | undefined): RoleRef | undefined {
  if (!raw) return undefined;
  return Object.freeze({
    apiGroup: getString(raw, 'apiGroup') ?? '',
    kind: getString(raw, 'kind') ?? '',
    name: getScalarString(raw, 'name') ?? '',
  });
}

/**
 * Build a Resource from one decoded document.
 * Returns undefined when the document is not a mapping; the loader reports that.
 */
export function normalizeResource(document: unknown): Resource | undefined {
  const root = toValue(document);
  if (!isValueMap(root)) return undefined;

  const kind = getString(root, 'kind') ?? '';
  const meta = getMap(root, 'metadata');

  const metadata: ResourceMetadata = Object.freeze({
    name: getScalarString(meta, 'name') ?? '',
    namespace: getScalarString(meta, 'namespace') ?? '',
    labels: stringMap(getMap(meta, 'labels')),
    annotations: stringMap(getMap(meta, 'annotations')),
  });

  const resource: Resource = {
    apiVersion: getString(root, 'apiVersion') ?? '',
    kind,
    metadata,
    spec: getMap(root, 'spec') ?? EMPTY_SPEC,
  };

  if (isRoleKind(kind)) {
    return Object.freeze({
      ...resource,
      rules: Object.freeze(getMapList(root, 'rules').map(normalizePolicyRule)),
    });
  }
  if (isBindingKind(kind)) {
    return Object.freeze({
      ...resource,
      roleRef: normalizeRoleRef(getMap(root, 'roleRef')),
      subjects: Object.freeze(getMapList(root, 'subjects').map(normalizeSubject)),
    });
  }
  return Object.freeze(resource);
}

/**
 * Locate the pod template of a workload.
 * Undefined means the kind carries no pod spec, which pod rules read as "nothing to check".
 */
export function getPodSpec(resource: Resource): ValueMap | undefined {
  switch (resource.kind) {
    case 'Pod':
      return resource.spec;
    case 'Deployment':
    case 'StatefulSet':
    case 'DaemonSet':
    case 'Job':
      return getMapPath(resource.spec, 'template', 'spec');
    case 'CronJob':
      return getMapPath(resource.spec, 'jobTemplate', 'spec', 'template', 'spec');
    default:
      return undefined;
  }
}

/** Mapping entries of the pod spec's `containers` list. */
export function getContainers(podSpec: ValueMap): ValueMap[] {
  return getMapList(podSpec, 'containers');
}
