import type { AnomalyFilterOptions, ResourceRecord } from '../types/resources';

export type RetentionReason = 'over-request' | 'under-utilized' | 'default';

// Why a record is kept in the report, or undefined when it is dropped.
// A record is dropped only when its cpu usage is within the request and the unused
// part of the request is within the threshold.
export function retentionReason(record: ResourceRecord, options: AnomalyFilterOptions): RetentionReason | undefined {
  const usage = record.usage.cpu;
  const request = record.requests.cpu;

  if (usage && request && usage.isGreaterThan(request)) {
    return 'over-request';
  }

  if (options.skipUnderUtilization || options.threshold === undefined || !usage || !request) {
    return 'default';
  }

  const unused = request.saturatingSub(usage);
  return unused.value > options.threshold ? 'under-utilized' : undefined;
}

export function isAnomalous(record: ResourceRecord, options: AnomalyFilterOptions): boolean {
  return retentionReason(record, options) !== undefined;
}

export function filterAnomalies<T extends ResourceRecord>(records: T[], options: AnomalyFilterOptions): T[] {
  return records.filter(record => isAnomalous(record, options));
}
