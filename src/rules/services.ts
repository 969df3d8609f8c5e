import { Finding } from '../types';
import { Resource } from '../resource';
import { getString } from '../utils/value';
import { RuleModule, createFinding } from './rule';

/** Namespaces where an internet-facing LoadBalancer is always reported. Fixed, not configurable. */
export const SENSITIVE_NAMESPACES: ReadonlySet<string> = new Set(['kube-system', 'prod', 'production']);

export const NODEPORT_JUSTIFIED_ANNOTATION = 'danger-scan/nodeport-justified';

function serviceType(resource: Resource): string | undefined {
  return resource.kind === 'Service' ? getString(resource.spec, 'type') : undefined;
}

export const publicLoadBalancerRule: RuleModule = {
  id: 'public-loadbalancer',
  severity: 'HIGH',
  description: 'LoadBalancer Service in kube-system, prod or production',

  evaluate(resource: Resource): Finding[] {
    const namespace = resource.metadata.namespace;
    if (!SENSITIVE_NAMESPACES.has(namespace) || serviceType(resource) !== 'LoadBalancer') return [];

    return [createFinding(publicLoadBalancerRule, resource, {
      reason: `LoadBalancer service in ${namespace} namespace`,
      impact: 'Exposes internal services directly to the internet',
      fix: 'Use ClusterIP with Ingress, or add explicit justification',
    })];
  },
};

export const nodePortServiceRule: RuleModule = {
  id: 'nodeport-service',
  severity: 'MEDIUM',
  description: `NodePort Service without the ${NODEPORT_JUSTIFIED_ANNOTATION} annotation`,

  evaluate(resource: Resource): Finding[] {
    if (serviceType(resource) !== 'NodePort') return [];
    // any value counts, including an empty string
    if (Object.prototype.hasOwnProperty.call(resource.metadata.annotations, NODEPORT_JUSTIFIED_ANNOTATION)) {
      return [];
    }

    return [createFinding(nodePortServiceRule, resource, {
      reason: 'NodePort service without justification annotation',
      impact: 'Bypasses ingress controls and exposes port on all nodes',
      fix: `Use ClusterIP/LoadBalancer or add annotation: ${NODEPORT_JUSTIFIED_ANNOTATION}`,
    })];
  },
};
