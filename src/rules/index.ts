import { RuleModule } from './rule';
import {
  latestImageTagRule,
  privilegeEscalationRule,
  privilegedContainerRule,
  runsAsRootRule,
} from './container-security';
import { dockerSocketMountRule, hostPathVolumeRule } from './volumes';
import { hostNetworkRule, hostPidIpcRule } from './host-namespaces';
import { defaultServiceAccountBindingRule, wildcardRbacRule } from './rbac';
import { nodePortServiceRule, publicLoadBalancerRule } from './services';

export type { RuleModule, FindingText } from './rule';
export { createFinding } from './rule';

/**
 * The fixed rule battery. Order is evaluation order and the default output order.
 */
export const DEFAULT_RULES: readonly RuleModule[] = Object.freeze([
  privilegedContainerRule,
  hostPathVolumeRule,
  dockerSocketMountRule,
  runsAsRootRule,
  privilegeEscalationRule,
  wildcardRbacRule,
  defaultServiceAccountBindingRule,
  publicLoadBalancerRule,
  nodePortServiceRule,
  latestImageTagRule,
  hostNetworkRule,
  hostPidIpcRule,
]);
