import { Finding } from '../types';
import { Resource, isBindingKind, isRoleKind } from '../resource';
import { RuleModule, createFinding } from './rule';

export const wildcardRbacRule: RuleModule = {
  id: 'wildcard-rbac',
  severity: 'HIGH',
  description: 'Role or ClusterRole rule grants verbs "*" on resources "*"',

  evaluate(resource: Resource): Finding[] {
    if (!isRoleKind(resource.kind)) return [];

    // both wildcards must sit in the same rule entry
    const grantsAll = (resource.rules ?? []).some(
      rule => rule.verbs.includes('*') && rule.resources.includes('*'),
    );
    if (!grantsAll) return [];

    return [createFinding(wildcardRbacRule, resource, {
      reason: 'Grants wildcard permissions (verbs: *, resources: *)',
      impact: 'Complete cluster control for any principal with this role',
      fix: 'Specify explicit verbs and resources',
    })];
  },
};

export const defaultServiceAccountBindingRule: RuleModule = {
  id: 'clusterrolebinding-default-sa',
  severity: 'HIGH',
  description: 'RoleBinding or ClusterRoleBinding subject is the default ServiceAccount',

  evaluate(resource: Resource): Finding[] {
    if (!isBindingKind(resource.kind)) return [];

    const bindsDefault = (resource.subjects ?? []).some(
      subject => subject.kind === 'ServiceAccount' && subject.name === 'default',
    );
    if (!bindsDefault) return [];

    return [createFinding(defaultServiceAccountBindingRule, resource, {
      reason: 'Binds permissions to default service account',
      impact: 'All pods without explicit SA inherit these permissions',
      fix: 'Create and use a dedicated ServiceAccount',
    })];
  },
};
