import type { V1Container, V1ObjectMeta, V1OwnerReference, V1Pod } from '@kubernetes/client-node';
import { InvalidObjectError } from '../errors';
import type { OwnedObject, OwnerReference, Pod, PodContainer, ResourceList } from '../types/k8s';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

// Extract a human-readable message from a K8s API error.
// Tries multiple paths where the K8s client may place the error message.
export function describeError(error: unknown, fallbackContext: string): string {
  if (!isRecord(error)) return typeof error === 'string' ? error : `Unknown error for ${fallbackContext}`;

  // Try error.body (string containing JSON with a "message" field)
  if (typeof error.body === 'string') {
    try {
      const parsed: unknown = JSON.parse(error.body);
      if (isRecord(parsed) && typeof parsed.message === 'string') return parsed.message;
    } catch {
      // Not valid JSON, return the raw string body
      return error.body;
    }
  }

  // Try error.response.body.message
  const response = error.response;
  if (isRecord(response) && isRecord(response.body) && typeof response.body.message === 'string') {
    return response.body.message;
  }

  if (typeof error.message === 'string' && error.message) return error.message;

  return `Unknown error for ${fallbackContext}`;
}

function mapOwnerReferences(refs: V1OwnerReference[] | undefined): OwnerReference[] | undefined {
  if (!refs || refs.length === 0) return undefined;
  return refs.map(ref => ({ kind: ref.kind, name: ref.name, controller: ref.controller }));
}

function mapResourceList(list: Record<string, string> | undefined): ResourceList | undefined {
  if (!list) return undefined;
  return { cpu: list.cpu, memory: list.memory };
}

function mapContainer(container: V1Container): PodContainer {
  const { resources, securityContext } = container;
  return {
    name: container.name,
    ...(resources && {
      resources: {
        requests: mapResourceList(resources.requests),
        limits: mapResourceList(resources.limits)
      }
    }),
    ...(securityContext && {
      securityContext: { readOnlyRootFilesystem: securityContext.readOnlyRootFilesystem }
    }),
    ...(container.livenessProbe && { livenessProbe: container.livenessProbe }),
    ...(container.readinessProbe && { readinessProbe: container.readinessProbe })
  };
}

function requireIdentity(metadata: V1ObjectMeta | undefined, kind: string): { name: string; namespace: string } {
  const name = metadata?.name;
  const namespace = metadata?.namespace;
  if (!name || !namespace) {
    throw new InvalidObjectError(kind, namespace ?? '<unknown>', name ?? '<unknown>', 'missing name or namespace');
  }
  return { name, namespace };
}

// Reduce a client-node pod to the fields the audits read
export function filterPodData(pod: V1Pod): Pod {
  const { name, namespace } = requireIdentity(pod.metadata, 'Pod');
  const phase = pod.status?.phase;
  return {
    metadata: {
      name,
      namespace,
      ownerReferences: mapOwnerReferences(pod.metadata?.ownerReferences)
    },
    ...(pod.status && { status: { phase } }),
    ...(pod.spec && { spec: { containers: pod.spec.containers.map(mapContainer) } })
  };
}

export function filterOwnedObject(object: { metadata?: V1ObjectMeta | undefined }, kind: string): OwnedObject {
  const { name, namespace } = requireIdentity(object.metadata, kind);
  return {
    metadata: {
      name,
      namespace,
      ownerReferences: mapOwnerReferences(object.metadata?.ownerReferences)
    }
  };
}
