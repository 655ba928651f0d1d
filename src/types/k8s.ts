// Narrow views of the Kubernetes objects the audits read.
// The cluster adapters map client-node models onto these shapes.

export interface OwnerReference {
  kind: string;
  name: string;
  controller?: boolean | undefined;
}

export interface ResourceList {
  cpu?: string | undefined;
  memory?: string | undefined;
}

export interface ContainerResourceBlock {
  requests?: ResourceList | undefined;
  limits?: ResourceList | undefined;
}

export interface ContainerSecurityContext {
  readOnlyRootFilesystem?: boolean | undefined;
}

export interface PodContainer {
  name: string;
  resources?: ContainerResourceBlock | undefined;
  securityContext?: ContainerSecurityContext | undefined;
  livenessProbe?: object | undefined;
  readinessProbe?: object | undefined;
}

export interface Pod {
  metadata: {
    name: string;
    namespace: string;
    ownerReferences?: OwnerReference[] | undefined;
  };
  status?: {
    phase?: string | undefined;
  };
  spec?: {
    containers: PodContainer[];
  };
}

// Any namespaced object that may carry owner references (ReplicaSet, Job)
export interface OwnedObject {
  metadata: {
    name: string;
    namespace: string;
    ownerReferences?: OwnerReference[] | undefined;
  };
}

export type ExpandableOwnerKind = 'ReplicaSet' | 'Job';

export interface ContainerUsage {
  name: string;
  usage: {
    cpu: string;
    memory: string;
  };
}

export interface PodUsage {
  containers: ContainerUsage[];
}
