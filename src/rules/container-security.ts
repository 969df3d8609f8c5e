import { Finding } from '../types';
import { Resource, getContainers, getPodSpec } from '../resource';
import { getBoolean, getMap, getNumber, getString, isTrue } from '../utils/value';
import { RuleModule, createFinding } from './rule';

/**
 * Container-level checks. Each rule walks `containers` in order and stops at the
 * first container that violates it, so a resource yields at most one finding per rule.
 */

export const privilegedContainerRule: RuleModule = {
  id: 'privileged-container',
  severity: 'HIGH',
  description: 'Container securityContext sets privileged: true',

  evaluate(resource: Resource): Finding[] {
    const podSpec = getPodSpec(resource);
    if (!podSpec) return [];

    const offender = getContainers(podSpec).find(c => isTrue(getMap(c, 'securityContext'), 'privileged'));
    if (!offender) return [];

    return [createFinding(privilegedContainerRule, resource, {
      reason: 'Container runs in privileged mode',
      impact: 'Full host access if container is compromised',
      fix: 'Remove privileged flag or set to false',
    })];
  },
};

/**
 * A container runs as root unless runAsNonRoot is true or runAsUser is a non-zero UID.
 * Container fields win over pod fields one by one; a field the container leaves out
 * falls back to the pod securityContext. No UID anywhere counts as UID 0.
 */
export const runsAsRootRule: RuleModule = {
  id: 'runs-as-root',
  severity: 'MEDIUM',
  description: 'Effective runAsNonRoot is not true and effective runAsUser is 0 or unset',

  evaluate(resource: Resource): Finding[] {
    const podSpec = getPodSpec(resource);
    if (!podSpec) return [];

    const podContext = getMap(podSpec, 'securityContext');
    const podRunAsNonRoot = getBoolean(podContext, 'runAsNonRoot');
    const podRunAsUser = getNumber(podContext, 'runAsUser');

    for (const container of getContainers(podSpec)) {
      const context = getMap(container, 'securityContext');
      const runAsNonRoot = getBoolean(context, 'runAsNonRoot') ?? podRunAsNonRoot ?? false;
      const runAsUser = getNumber(context, 'runAsUser') ?? podRunAsUser;

      if (!runAsNonRoot && (runAsUser === undefined || runAsUser === 0)) {
        return [createFinding(runsAsRootRule, resource, {
          reason: 'Container runs as root user (UID 0)',
          impact: 'Increases blast radius of container compromise',
          fix: 'Set runAsNonRoot: true or runAsUser to non-zero UID',
        })];
      }
    }
    return [];
  },
};

export const privilegeEscalationRule: RuleModule = {
  id: 'privilege-escalation-allowed',
  severity: 'HIGH',
  description: 'Container securityContext sets allowPrivilegeEscalation: true',

  evaluate(resource: Resource): Finding[] {
    const podSpec = getPodSpec(resource);
    if (!podSpec) return [];

    const offender = getContainers(podSpec).find(c =>
      isTrue(getMap(c, 'securityContext'), 'allowPrivilegeEscalation'),
    );
    if (!offender) return [];

    return [createFinding(privilegeEscalationRule, resource, {
      reason: 'Allows privilege escalation within container',
      impact: 'Enables container escape via kernel exploits',
      fix: 'Set allowPrivilegeEscalation: false',
    })];
  },
};

/** `nginx` and `nginx:latest` are mutable; any other ref with a colon (tag, digest, registry port) is not. */
export function isMutableImageRef(image: string): boolean {
  return image.endsWith(':latest') || !image.includes(':');
}

export const latestImageTagRule: RuleModule = {
  id: 'latest-image-tag',
  severity: 'MEDIUM',
  description: 'Container image uses :latest or carries no tag',

  evaluate(resource: Resource): Finding[] {
    const podSpec = getPodSpec(resource);
    if (!podSpec) return [];

    for (const container of getContainers(podSpec)) {
      const image = getString(container, 'image');
      if (image !== undefined && isMutableImageRef(image)) {
        return [createFinding(latestImageTagRule, resource, {
          reason: 'Uses :latest or untagged image',
          impact: 'Non-reproducible deployments and potential supply chain risk',
          fix: 'Pin to specific image digest or semantic version',
        })];
      }
    }
    return [];
  },
};
