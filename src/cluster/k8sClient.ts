import * as k8s from '@kubernetes/client-node';
import { getLogger } from '@fluidware-it/saddlebag';

export interface ClusterClients {
  coreApi: k8s.CoreV1Api;
  appsApi: k8s.AppsV1Api;
  batchApi: k8s.BatchV1Api;
  metricsClient: k8s.Metrics;
  contextName: string;
  // Namespace of the selected kubeconfig context, or the fallback when it sets none
  currentNamespace: string;
}

export function loadKubeConfig(contextName?: string): k8s.KubeConfig {
  const kc = new k8s.KubeConfig();
  try {
    kc.loadFromDefault();
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    getLogger().error(`Failed to load Kubernetes configuration: ${message}`);
    throw new Error(`Kubernetes configuration error: ${message}`);
  }

  if (contextName) {
    const available = kc.getContexts().map(c => c.name);
    if (!available.includes(contextName)) {
      throw new Error(`Context "${contextName}" not found. Available contexts: ${available.join(', ')}`);
    }
    kc.setCurrentContext(contextName);
  }

  getLogger().info(`K8s context loaded: ${kc.getCurrentContext()}`);
  return kc;
}

export function createClusterClients(contextName?: string, fallbackNamespace = 'default'): ClusterClients {
  const kc = loadKubeConfig(contextName);
  const current = kc.getCurrentContext();

  return {
    coreApi: kc.makeApiClient(k8s.CoreV1Api),
    appsApi: kc.makeApiClient(k8s.AppsV1Api),
    batchApi: kc.makeApiClient(k8s.BatchV1Api),
    metricsClient: new k8s.Metrics(kc),
    contextName: current,
    currentNamespace: kc.getContextObject(current)?.namespace || fallbackNamespace
  };
}
