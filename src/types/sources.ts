import type { ExpandableOwnerKind, OwnedObject, Pod, PodUsage } from './k8s';

export interface PodSource {
  // Empty namespaces and allNamespaces=false means the current namespace
  list(namespaces: string[], allNamespaces: boolean): Promise<Pod[]>;
}

export interface ObjectSource {
  // Rejects with OwnerLookupError unless exactly one object matches
  getByName(namespace: string, name: string, kind: ExpandableOwnerKind): Promise<OwnedObject>;
}

export interface MetricsSource {
  // Resolves undefined when the metrics API has nothing for the pod
  get(namespace: string, podName: string): Promise<PodUsage | undefined>;
}

export type OwnerLookupFailurePolicy = 'degrade' | 'abort';

// Collaborators threaded through an audit run; swapped for fakes in tests
export interface AuditContext {
  pods: PodSource;
  objects: ObjectSource;
  metrics: MetricsSource;
  ownerLookupFailure?: OwnerLookupFailurePolicy | undefined;
}
