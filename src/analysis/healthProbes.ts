import { isRunning } from './recordBuilder';
import type { Pod, PodContainer } from '../types/k8s';
import type { PodSource } from '../types/sources';

export interface MissingHealthProbe {
  namespace: string;
  podName: string;
  containerName: string;
  livenessProbe?: string | undefined;
  readinessProbe?: string | undefined;
}

function hasAnyProbe(container: PodContainer): boolean {
  return container.livenessProbe !== undefined || container.readinessProbe !== undefined;
}

// Running pods where no container declares a liveness or readiness probe.
// Every container of such a pod is listed.
export function findMissingHealthProbes(pods: Pod[]): MissingHealthProbe[] {
  return pods
    .filter(pod => isRunning(pod) && pod.spec !== undefined)
    .filter(pod => !(pod.spec?.containers ?? []).some(hasAnyProbe))
    .flatMap(pod =>
      (pod.spec?.containers ?? []).map(container => ({
        namespace: pod.metadata.namespace,
        podName: pod.metadata.name,
        containerName: container.name,
        ...(container.livenessProbe && { livenessProbe: JSON.stringify(container.livenessProbe) }),
        ...(container.readinessProbe && { readinessProbe: JSON.stringify(container.readinessProbe) })
      }))
    );
}

export async function runMissingHealthProbesAudit(
  pods: PodSource,
  namespaces: string[],
  allNamespaces: boolean
): Promise<MissingHealthProbe[]> {
  return findMissingHealthProbes(await pods.list(namespaces, allNamespaces));
}
