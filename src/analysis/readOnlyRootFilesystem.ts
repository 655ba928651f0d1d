import { InvalidObjectError } from '../errors';
import type { Pod } from '../types/k8s';
import type { PodSource } from '../types/sources';

export interface WritableRootFilesystem {
  namespace: string;
  podName: string;
  containerName: string;
}

// Containers that do not explicitly set readOnlyRootFilesystem: true
export function findWritableRootFilesystems(pod: Pod): WritableRootFilesystem[] {
  if (!pod.spec) {
    throw new InvalidObjectError('Pod', pod.metadata.namespace, pod.metadata.name, 'pod has no spec');
  }

  return pod.spec.containers
    .filter(container => container.securityContext?.readOnlyRootFilesystem !== true)
    .map(container => ({
      namespace: pod.metadata.namespace,
      podName: pod.metadata.name,
      containerName: container.name
    }));
}

export async function runReadOnlyRootFilesystemAudit(
  pods: PodSource,
  namespaces: string[],
  allNamespaces: boolean
): Promise<WritableRootFilesystem[]> {
  const listed = await pods.list(namespaces, allNamespaces);
  return listed.flatMap(findWritableRootFilesystems);
}
