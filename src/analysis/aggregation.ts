import { addSummaries, emptySummary } from './resourcePair';
import type { AuditedRecord, NamespaceTotal, Owner, OwnerTotal, ResourceSummary } from '../types/resources';

export function summarizeRecord(record: AuditedRecord): ResourceSummary {
  return {
    usage: record.usage,
    requests: record.requests,
    limits: record.limits,
    difference: record.difference
  };
}

function ownerKey(namespace: string, owner: Owner): string {
  return `${namespace}/${owner.kind}/${owner.name}`;
}

function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  return a > b ? 1 : 0;
}

// Coalescing sum per namespace. Output is sorted by namespace so it never depends on input order.
export function totalsByNamespace(records: AuditedRecord[]): NamespaceTotal[] {
  const totals = new Map<string, NamespaceTotal>();

  for (const record of records) {
    const current = totals.get(record.namespace) ?? { namespace: record.namespace, resources: emptySummary() };
    totals.set(record.namespace, {
      namespace: record.namespace,
      resources: addSummaries(current.resources, summarizeRecord(record))
    });
  }

  return [...totals.values()].sort((a, b) => compareStrings(a.namespace, b.namespace));
}

// Coalescing sum per resolved owner within its namespace; records without owner are skipped
export function totalsByOwner(records: AuditedRecord[]): OwnerTotal[] {
  const totals = new Map<string, OwnerTotal>();

  for (const record of records) {
    const { owner } = record;
    if (!owner) continue;

    const key = ownerKey(record.namespace, owner);
    const current = totals.get(key) ?? { namespace: record.namespace, owner, resources: emptySummary() };
    totals.set(key, {
      namespace: record.namespace,
      owner: current.owner,
      resources: addSummaries(current.resources, summarizeRecord(record))
    });
  }

  return [...totals.entries()]
    .sort(([a], [b]) => compareStrings(a, b))
    .map(([, total]) => total);
}
