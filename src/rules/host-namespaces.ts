import { Finding } from '../types';
import { Resource, getPodSpec } from '../resource';
import { isTrue } from '../utils/value';
import { FindingText, RuleModule, createFinding } from './rule';

export const hostNetworkRule: RuleModule = {
  id: 'host-network',
  severity: 'HIGH',
  description: 'Pod spec sets hostNetwork: true',

  evaluate(resource: Resource): Finding[] {
    if (!isTrue(getPodSpec(resource), 'hostNetwork')) return [];

    return [createFinding(hostNetworkRule, resource, {
      reason: 'Uses host network namespace',
      impact: 'Bypasses network policies and accesses host network',
      fix: 'Remove hostNetwork or set to false',
    })];
  },
};

const HOST_PID_TEXT: FindingText = {
  reason: 'Uses host PID namespace',
  impact: 'Can inspect and kill processes on the host',
  fix: 'Remove hostPID or set to false',
};

const HOST_IPC_TEXT: FindingText = {
  reason: 'Uses host IPC namespace',
  impact: 'Can access shared memory and semaphores on host',
  fix: 'Remove hostIPC or set to false',
};

/** hostPID is reported ahead of hostIPC; a pod with both still gets a single finding. */
export const hostPidIpcRule: RuleModule = {
  id: 'host-pid-ipc',
  severity: 'HIGH',
  description: 'Pod spec sets hostPID: true or hostIPC: true',

  evaluate(resource: Resource): Finding[] {
    const podSpec = getPodSpec(resource);
    if (isTrue(podSpec, 'hostPID')) {
      return [createFinding(hostPidIpcRule, resource, HOST_PID_TEXT)];
    }
    if (isTrue(podSpec, 'hostIPC')) {
      return [createFinding(hostPidIpcRule, resource, HOST_IPC_TEXT)];
    }
    return [];
  },
};
