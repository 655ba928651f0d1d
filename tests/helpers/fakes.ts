import { OwnerLookupError } from '../../src/errors';
import type { ExpandableOwnerKind, OwnedObject, OwnerReference, Pod, PodContainer, PodUsage } from '../../src/types/k8s';
import type { AuditContext, MetricsSource, ObjectSource, PodSource } from '../../src/types/sources';

export class FakePodSource implements PodSource {
  calls: { namespaces: string[]; allNamespaces: boolean }[] = [];

  constructor(private readonly pods: Pod[]) {}

  async list(namespaces: string[], allNamespaces: boolean): Promise<Pod[]> {
    this.calls.push({ namespaces, allNamespaces });
    if (allNamespaces || namespaces.length === 0) return this.pods;
    return this.pods.filter(p => namespaces.includes(p.metadata.namespace));
  }
}

export class FakeObjectSource implements ObjectSource {
  lookups: string[] = [];

  constructor(private readonly objects: (OwnedObject & { kind: ExpandableOwnerKind })[] = []) {}

  async getByName(namespace: string, name: string, kind: ExpandableOwnerKind): Promise<OwnedObject> {
    this.lookups.push(`${namespace}/${kind}/${name}`);
    const matches = this.objects.filter(
      o => o.kind === kind && o.metadata.namespace === namespace && o.metadata.name === name
    );
    const [first] = matches;
    if (!first || matches.length > 1) throw new OwnerLookupError(namespace, name, kind, matches.length);
    return { metadata: first.metadata };
  }
}

export class FakeMetricsSource implements MetricsSource {
  calls: string[] = [];

  constructor(
    private readonly usage: Record<string, PodUsage> = {},
    private readonly failing: string[] = []
  ) {}

  async get(namespace: string, podName: string): Promise<PodUsage | undefined> {
    const key = `${namespace}/${podName}`;
    this.calls.push(key);
    if (this.failing.includes(key)) throw new Error('metrics-server not available');
    return this.usage[key];
  }
}

export function makeContext(
  pods: Pod[],
  objects: FakeObjectSource = new FakeObjectSource(),
  metrics: FakeMetricsSource = new FakeMetricsSource()
): AuditContext & { pods: FakePodSource; objects: FakeObjectSource; metrics: FakeMetricsSource } {
  return { pods: new FakePodSource(pods), objects, metrics };
}

export function makePod(
  name: string,
  containers: PodContainer[],
  options: { namespace?: string; phase?: string; ownerReferences?: OwnerReference[] } = {}
): Pod {
  return {
    metadata: {
      name,
      namespace: options.namespace ?? 'default',
      ownerReferences: options.ownerReferences
    },
    status: { phase: options.phase ?? 'Running' },
    spec: { containers }
  };
}

export function controller(kind: string, name: string): OwnerReference {
  return { kind, name, controller: true };
}
