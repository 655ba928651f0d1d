import type { Cpu, Memory } from '../analysis/quantity';

// Resource audit types

// Absent fields mean "not declared" (or "not measured" for usage), never zero
export interface ResourcePair {
  cpu?: Cpu | undefined;
  memory?: Memory | undefined;
}

export interface Owner {
  name: string;
  kind: string;
}

export interface ResourceDifference {
  requests: ResourcePair;
  limits: ResourcePair;
}

export interface ResourceSummary {
  usage: ResourcePair;
  requests: ResourcePair;
  limits: ResourcePair;
  difference: ResourceDifference;
}

export interface RecordKey {
  namespace: string;
  podName: string;
  containerName: string;
}

export interface ResourceRecord extends RecordKey {
  owner?: Owner | undefined;
  requests: ResourcePair;
  limits: ResourcePair;
  usage: ResourcePair;
}

// Record after the usage merge, with its derived saturating differences
export interface AuditedRecord extends ResourceRecord {
  difference: ResourceDifference;
}

export interface NamespaceTotal {
  namespace: string;
  resources: ResourceSummary;
}

export interface OwnerTotal {
  namespace: string;
  owner: Owner;
  resources: ResourceSummary;
}

export interface Report {
  namespaceTotals: NamespaceTotal[];
  ownerTotals: OwnerTotal[];
  records: AuditedRecord[];
}

export interface AnomalyFilterOptions {
  // Milli-cores of unused cpu request tolerated before a container is reported
  threshold?: bigint | undefined;
  skipUnderUtilization: boolean;
}
