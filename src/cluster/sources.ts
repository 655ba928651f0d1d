import type * as k8s from '@kubernetes/client-node';
import { getLogger } from '@fluidware-it/saddlebag';
import { MetricsUnavailableError, OwnerLookupError } from '../errors';
import { describeError, filterOwnedObject, filterPodData } from '../utils/k8sDataFilter';
import type { ExpandableOwnerKind, OwnedObject, Pod, PodUsage } from '../types/k8s';
import type { MetricsSource, ObjectSource, PodSource } from '../types/sources';
import type { ClusterClients } from './k8sClient';

const logger = getLogger();

function nameSelector(name: string): string {
  return `metadata.name=${name}`;
}

export class ClusterPodSource implements PodSource {
  constructor(
    private readonly coreApi: Pick<k8s.CoreV1Api, 'listNamespacedPod' | 'listPodForAllNamespaces'>,
    private readonly currentNamespace: string
  ) {}

  async list(namespaces: string[], allNamespaces: boolean): Promise<Pod[]> {
    if (allNamespaces) {
      logger.info('Listing pods in all namespaces');
      const res = await this.coreApi.listPodForAllNamespaces();
      return res.items.map(filterPodData);
    }

    const targets = namespaces.length > 0 ? namespaces : [this.currentNamespace];
    const pods: Pod[] = [];
    for (const namespace of targets) {
      logger.info(`Listing pods in namespace ${namespace}`);
      const res = await this.coreApi.listNamespacedPod({ namespace });
      pods.push(...res.items.map(filterPodData));
    }
    return pods;
  }
}

export class ClusterObjectSource implements ObjectSource {
  constructor(
    private readonly appsApi: Pick<k8s.AppsV1Api, 'listNamespacedReplicaSet'>,
    private readonly batchApi: Pick<k8s.BatchV1Api, 'listNamespacedJob'>
  ) {}

  async getByName(namespace: string, name: string, kind: ExpandableOwnerKind): Promise<OwnedObject> {
    const fieldSelector = nameSelector(name);
    const items: { metadata?: k8s.V1ObjectMeta | undefined }[] =
      kind === 'ReplicaSet'
        ? (await this.appsApi.listNamespacedReplicaSet({ namespace, fieldSelector })).items
        : (await this.batchApi.listNamespacedJob({ namespace, fieldSelector })).items;

    const [first, ...rest] = items;
    if (!first || rest.length > 0) {
      throw new OwnerLookupError(namespace, name, kind, items.length);
    }
    return filterOwnedObject(first, kind);
  }
}

// Reads metrics-server through the client's Metrics helper. Each namespace is listed once per
// source instance and shared by every pod looked up in it.
export class ClusterMetricsSource implements MetricsSource {
  private readonly listings = new Map<string, Promise<k8s.PodMetricsList>>();

  constructor(private readonly metricsClient: Pick<k8s.Metrics, 'getPodMetrics'>) {}

  private listNamespace(namespace: string): Promise<k8s.PodMetricsList> {
    let listing = this.listings.get(namespace);
    if (!listing) {
      logger.info(`Reading pod metrics in namespace ${namespace}`);
      listing = this.metricsClient.getPodMetrics(namespace);
      this.listings.set(namespace, listing);
    }
    return listing;
  }

  async get(namespace: string, podName: string): Promise<PodUsage | undefined> {
    let metrics: k8s.PodMetricsList;
    try {
      metrics = await this.listNamespace(namespace);
    } catch (error: unknown) {
      throw new MetricsUnavailableError(namespace, podName, describeError(error, podName));
    }

    const pod = metrics.items.find(item => item.metadata?.name === podName);
    return (
      pod && {
        containers: pod.containers.map(c => ({ name: c.name, usage: { cpu: c.usage.cpu, memory: c.usage.memory } }))
      }
    );
  }
}

export function createClusterSources(clients: ClusterClients): {
  pods: PodSource;
  objects: ObjectSource;
  metrics: MetricsSource;
} {
  return {
    pods: new ClusterPodSource(clients.coreApi, clients.currentNamespace),
    objects: new ClusterObjectSource(clients.appsApi, clients.batchApi),
    metrics: new ClusterMetricsSource(clients.metricsClient)
  };
}
