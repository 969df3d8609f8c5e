import { Finding } from '../types';
import { Resource, getPodSpec } from '../resource';
import { ValueMap, getMap, getMapList, getString, hasKey } from '../utils/value';
import { RuleModule, createFinding } from './rule';

const DOCKER_SOCKET = '/var/run/docker.sock';

function getVolumes(resource: Resource): ValueMap[] {
  const podSpec = getPodSpec(resource);
  return podSpec ? getMapList(podSpec, 'volumes') : [];
}

export const hostPathVolumeRule: RuleModule = {
  id: 'hostpath-volume',
  severity: 'HIGH',
  description: 'Pod mounts a hostPath volume',

  evaluate(resource: Resource): Finding[] {
    // key presence is enough, whatever the hostPath body looks like
    if (!getVolumes(resource).some(volume => hasKey(volume, 'hostPath'))) return [];

    return [createFinding(hostPathVolumeRule, resource, {
      reason: 'Uses hostPath volume mount',
      impact: 'Direct filesystem access enables container escape',
      fix: 'Use PersistentVolumes or emptyDir instead',
    })];
  },
};

export const dockerSocketMountRule: RuleModule = {
  id: 'docker-socket-mount',
  severity: 'HIGH',
  description: `hostPath volume path contains ${DOCKER_SOCKET}`,

  evaluate(resource: Resource): Finding[] {
    const mountsSocket = getVolumes(resource).some(volume => {
      const path = getString(getMap(volume, 'hostPath'), 'path');
      return path !== undefined && path.includes(DOCKER_SOCKET);
    });
    if (!mountsSocket) return [];

    return [createFinding(dockerSocketMountRule, resource, {
      reason: 'Mounts Docker socket from host',
      impact: 'Grants root-equivalent access to the node',
      fix: 'Remove Docker socket mount',
    })];
  },
};
