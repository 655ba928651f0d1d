import { getLogger } from '@fluidware-it/saddlebag';
import { MetricsUnavailableError, QuantityParseError, type QuantityContext, type ResourceField } from '../errors';
import { Cpu, Memory } from './quantity';
import { subtractPairs } from './resourcePair';
import { resolveOwner } from '../utils/ownerResolver';
import { describeError } from '../utils/k8sDataFilter';
import type { ContainerResourceBlock, Pod, PodContainer, PodUsage } from '../types/k8s';
import type { AuditedRecord, Owner, RecordKey, ResourcePair, ResourceRecord } from '../types/resources';
import type { AuditContext, MetricsSource } from '../types/sources';

const logger = getLogger();

export function recordKey(key: RecordKey): string {
  return `${key.namespace}/${key.podName}/${key.containerName}`;
}

export function isRunning(pod: Pod): boolean {
  return pod.status?.phase === 'Running';
}

function hasResources(resources: ContainerResourceBlock | undefined): resources is ContainerResourceBlock {
  return resources?.requests !== undefined || resources?.limits !== undefined;
}

function parseField<T>(
  quantity: string | undefined,
  parse: (quantity: string) => T,
  context: QuantityContext
): T | undefined {
  if (quantity === undefined) return undefined;
  try {
    return parse(quantity);
  } catch (error: unknown) {
    if (error instanceof QuantityParseError) throw error.withContext(context);
    throw error;
  }
}

function parsePair(
  list: { cpu?: string | undefined; memory?: string | undefined } | undefined,
  key: RecordKey,
  prefix: 'requests' | 'limits' | 'usage'
): ResourcePair {
  const context = (field: ResourceField): QuantityContext => ({
    namespace: key.namespace,
    podName: key.podName,
    containerName: key.containerName,
    field
  });
  return {
    cpu: parseField(list?.cpu, Cpu.parse, context(`${prefix}.cpu`)),
    memory: parseField(list?.memory, Memory.parse, context(`${prefix}.memory`))
  };
}

export function buildContainerRecord(pod: Pod, container: PodContainer, owner: Owner | undefined): ResourceRecord {
  const key: RecordKey = {
    namespace: pod.metadata.namespace,
    podName: pod.metadata.name,
    containerName: container.name
  };
  return {
    ...key,
    owner,
    requests: parsePair(container.resources?.requests, key, 'requests'),
    limits: parsePair(container.resources?.limits, key, 'limits'),
    usage: {}
  };
}

// Build one record per resource-bearing container of every running pod.
// Owners are resolved concurrently, one resolution per pod.
export async function buildRecords(pods: Pod[], context: AuditContext): Promise<ResourceRecord[]> {
  const candidates = pods.filter(pod => isRunning(pod) && pod.spec !== undefined);

  const perPod = await Promise.all(
    candidates.map(async pod => {
      const containers = (pod.spec?.containers ?? []).filter(c => hasResources(c.resources));
      if (containers.length === 0) return [];

      const owner = await resolveOwner(pod.metadata.namespace, pod.metadata.ownerReferences, context.objects, {
        onLookupFailure: context.ownerLookupFailure
      });
      return containers.map(container => buildContainerRecord(pod, container, owner));
    })
  );

  return dedupeRecords(perPod.flat());
}

// Duplicate keys keep the first record seen
export function dedupeRecords(records: ResourceRecord[]): ResourceRecord[] {
  const seen = new Map<string, ResourceRecord>();
  for (const record of records) {
    const key = recordKey(record);
    if (seen.has(key)) {
      logger.warn(`Duplicate container record ${key}, keeping the first one`);
      continue;
    }
    seen.set(key, record);
  }
  return [...seen.values()];
}

async function fetchUsage(metrics: MetricsSource, namespace: string, podName: string): Promise<PodUsage | undefined> {
  try {
    const usage = await metrics.get(namespace, podName);
    if (!usage) throw new MetricsUnavailableError(namespace, podName, 'no data returned');
    return usage;
  } catch (error: unknown) {
    const unavailable =
      error instanceof MetricsUnavailableError
        ? error
        : new MetricsUnavailableError(namespace, podName, describeError(error, podName));
    logger.warn(unavailable.message);
    return undefined;
  }
}

export function withDifference(record: ResourceRecord): AuditedRecord {
  return {
    ...record,
    difference: {
      requests: subtractPairs(record.requests, record.usage),
      limits: subtractPairs(record.limits, record.usage)
    }
  };
}

// Fetch live usage once per distinct pod and merge it into the pod's container records.
// Pods without metrics keep usage empty.
export async function mergeUsage(records: ResourceRecord[], metrics: MetricsSource): Promise<AuditedRecord[]> {
  const pods = new Map<string, { namespace: string; podName: string }>();
  for (const record of records) {
    pods.set(`${record.namespace}/${record.podName}`, { namespace: record.namespace, podName: record.podName });
  }

  const usageByPod = new Map<string, PodUsage | undefined>();
  await Promise.all(
    [...pods.entries()].map(async ([podKey, { namespace, podName }]) => {
      usageByPod.set(podKey, await fetchUsage(metrics, namespace, podName));
    })
  );

  return records.map(record => {
    const podUsage = usageByPod.get(`${record.namespace}/${record.podName}`);
    const containerUsage = podUsage?.containers.find(c => c.name === record.containerName);
    const usage = containerUsage ? parsePair(containerUsage.usage, record, 'usage') : {};
    return withDifference({ ...record, usage });
  });
}
