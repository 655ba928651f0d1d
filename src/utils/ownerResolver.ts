import { getLogger } from '@fluidware-it/saddlebag';
import { OwnerLookupError } from '../errors';
import type { ExpandableOwnerKind, OwnerReference } from '../types/k8s';
import type { Owner } from '../types/resources';
import type { ObjectSource, OwnerLookupFailurePolicy } from '../types/sources';

const logger = getLogger();

// Intermediate controllers whose own controller is the workload we want to report:
// ReplicaSet → Deployment, Job → CronJob
const EXPANDABLE_KINDS: readonly ExpandableOwnerKind[] = ['ReplicaSet', 'Job'];

function isExpandable(kind: string): kind is ExpandableOwnerKind {
  return EXPANDABLE_KINDS.some(k => k === kind);
}

// The first reference flagged as controller, if any
export function findControllerRef(refs: OwnerReference[] | undefined): OwnerReference | undefined {
  return refs?.find(ref => ref.controller === true);
}

function toOwner(ref: OwnerReference): Owner {
  return { name: ref.name, kind: ref.kind };
}

export interface ResolveOwnerOptions {
  onLookupFailure?: OwnerLookupFailurePolicy | undefined;
}

// Resolve a pod's top-level controller.
// Walks at most one extra hop: Pod → ReplicaSet → Deployment, Pod → Job → CronJob.
// Other kinds (StatefulSet, DaemonSet, ...) are returned as found on the pod.
export async function resolveOwner(
  namespace: string,
  podOwnerRefs: OwnerReference[] | undefined,
  objects: ObjectSource,
  options: ResolveOwnerOptions = {}
): Promise<Owner | undefined> {
  const direct = findControllerRef(podOwnerRefs);
  if (!direct) return undefined;
  if (!isExpandable(direct.kind)) return toOwner(direct);

  try {
    const intermediate = await objects.getByName(namespace, direct.name, direct.kind);
    const parent = findControllerRef(intermediate.metadata.ownerReferences);
    return toOwner(parent ?? direct);
  } catch (error: unknown) {
    if (!(error instanceof OwnerLookupError) || options.onLookupFailure === 'abort') {
      throw error;
    }
    logger.warn(`Owner lookup failed, using ${direct.kind}/${direct.name} as owner: ${error.message}`);
    return toOwner(direct);
  }
}
