import type { AuditedRecord, Owner, Report, ResourcePair, ResourceSummary } from '../types/resources';

export interface FormattedPair {
  cpu?: string;
  cpuMillicores?: string;
  memory?: string;
  memoryBytes?: string;
}

export interface FormattedSummary {
  usage: FormattedPair;
  requests: FormattedPair;
  limits: FormattedPair;
  difference: {
    requests: FormattedPair;
    limits: FormattedPair;
  };
}

export interface FormattedRecord {
  namespace: string;
  podName: string;
  containerName: string;
  owner?: Owner;
  resources: FormattedSummary;
}

export interface FormattedReport {
  total: {
    namespaces: { namespace: string; resources: FormattedSummary }[];
    owners: { namespace: string; owner: Owner; resources: FormattedSummary }[];
  };
  pods: FormattedRecord[];
}

// Absent amounts are left out rather than printed as zero.
// Raw amounts are decimal strings; they can exceed Number.MAX_SAFE_INTEGER.
export function formatPair(pair: ResourcePair): FormattedPair {
  const formatted: FormattedPair = {};
  if (pair.cpu) {
    formatted.cpu = pair.cpu.toString();
    formatted.cpuMillicores = pair.cpu.value.toString();
  }
  if (pair.memory) {
    formatted.memory = pair.memory.toString();
    formatted.memoryBytes = pair.memory.value.toString();
  }
  return formatted;
}

export function formatSummary(summary: ResourceSummary): FormattedSummary {
  return {
    usage: formatPair(summary.usage),
    requests: formatPair(summary.requests),
    limits: formatPair(summary.limits),
    difference: {
      requests: formatPair(summary.difference.requests),
      limits: formatPair(summary.difference.limits)
    }
  };
}

function formatRecord(record: AuditedRecord): FormattedRecord {
  return {
    namespace: record.namespace,
    podName: record.podName,
    containerName: record.containerName,
    ...(record.owner && { owner: { name: record.owner.name, kind: record.owner.kind } }),
    resources: formatSummary(record)
  };
}

export function formatReport(report: Report): FormattedReport {
  return {
    total: {
      namespaces: report.namespaceTotals.map(total => ({
        namespace: total.namespace,
        resources: formatSummary(total.resources)
      })),
      owners: report.ownerTotals.map(total => ({
        namespace: total.namespace,
        owner: total.owner,
        resources: formatSummary(total.resources)
      }))
    },
    pods: report.records.map(formatRecord)
  };
}

export function toJson(value: unknown): string {
  return JSON.stringify(value, null, 2);
}
