import { getLogger } from '@fluidware-it/saddlebag';
import { buildRecords, mergeUsage } from './recordBuilder';
import { filterAnomalies } from './anomalyFilter';
import { totalsByNamespace, totalsByOwner } from './aggregation';
import type { AnomalyFilterOptions, AuditedRecord, Report } from '../types/resources';
import type { AuditContext } from '../types/sources';

const logger = getLogger();

export interface ResourceRequestsOptions extends AnomalyFilterOptions {
  namespaces: string[];
  allNamespaces: boolean;
}

function compareRecords(a: AuditedRecord, b: AuditedRecord): number {
  const left = [a.namespace, a.podName, a.containerName];
  const right = [b.namespace, b.podName, b.containerName];
  for (let i = 0; i < left.length; i++) {
    const l = left[i] ?? '';
    const r = right[i] ?? '';
    if (l !== r) return l < r ? -1 : 1;
  }
  return 0;
}

// Compare declared requests/limits of running containers with their live usage.
// Listing failures and malformed declared quantities abort the run; missing metrics do not.
export async function runResourceRequestsAudit(context: AuditContext, options: ResourceRequestsOptions): Promise<Report> {
  const pods = await context.pods.list(options.namespaces, options.allNamespaces);
  logger.info(`Auditing resource requests of ${pods.length} pod(s)`);

  const records = await buildRecords(pods, context);
  const merged = await mergeUsage(records, context.metrics);
  const retained = filterAnomalies(merged, options).sort(compareRecords);
  logger.info(`${retained.length} of ${merged.length} container(s) retained`);

  return {
    namespaceTotals: totalsByNamespace(retained),
    ownerTotals: totalsByOwner(retained),
    records: retained
  };
}
