import { describe, it, expect } from 'vitest';
import { formatPair, formatReport, toJson } from '../../src/utils/reportFormatter';
import { Cpu, Memory } from '../../src/analysis/quantity';
import { withDifference } from '../../src/analysis/recordBuilder';
import { totalsByNamespace, totalsByOwner } from '../../src/analysis/aggregation';
import type { Report } from '../../src/types/resources';

describe('reportFormatter', () => {
  describe('formatPair', () => {
    it('should render text and raw amounts', () => {
      expect(formatPair({ cpu: new Cpu(250n), memory: Memory.parse('512Mi') })).toEqual({
        cpu: '250m',
        cpuMillicores: '250',
        memory: '512MiB',
        memoryBytes: '536870912'
      });
    });

    it('should leave absent amounts out', () => {
      expect(formatPair({})).toEqual({});
      expect(formatPair({ cpu: undefined, memory: new Memory(100n) })).toEqual({ memory: '100B', memoryBytes: '100' });
    });

    it('should keep raw amounts above the safe integer range exact', () => {
      const formatted = formatPair({ cpu: new Cpu(9007199254740993n), memory: Memory.parse('9007199254740993m') });

      expect(formatted.cpuMillicores).toBe('9007199254740993');
      expect(formatted.memoryBytes).toBe('9007199254740993');
    });
  });

  describe('formatReport', () => {
    const record = withDifference({
      namespace: 'shop',
      podName: 'api-1',
      containerName: 'main',
      owner: { name: 'api', kind: 'Deployment' },
      requests: { cpu: new Cpu(100n), memory: Memory.parse('256Mi') },
      limits: { cpu: new Cpu(500n) },
      usage: { cpu: new Cpu(150n), memory: Memory.parse('64Mi') }
    });
    const report: Report = {
      namespaceTotals: totalsByNamespace([record]),
      ownerTotals: totalsByOwner([record]),
      records: [record]
    };

    it('should render records with owner and differences', () => {
      const formatted = formatReport(report);

      expect(formatted.pods).toEqual([
        {
          namespace: 'shop',
          podName: 'api-1',
          containerName: 'main',
          owner: { name: 'api', kind: 'Deployment' },
          resources: {
            usage: { cpu: '150m', cpuMillicores: '150', memory: '64MiB', memoryBytes: '67108864' },
            requests: { cpu: '100m', cpuMillicores: '100', memory: '256MiB', memoryBytes: '268435456' },
            limits: { cpu: '500m', cpuMillicores: '500' },
            difference: {
              requests: { cpu: '0m', cpuMillicores: '0', memory: '192MiB', memoryBytes: '201326592' },
              limits: { cpu: '350m', cpuMillicores: '350' }
            }
          }
        }
      ]);
    });

    it('should render namespace and owner totals', () => {
      const formatted = formatReport(report);

      expect(formatted.total.namespaces.map(t => [t.namespace, t.resources.requests.cpu])).toEqual([['shop', '100m']]);
      expect(formatted.total.owners.map(t => [t.namespace, t.owner.name, t.resources.usage.memory])).toEqual([
        ['shop', 'api', '64MiB']
      ]);
    });

    it('should omit the owner of records without one', () => {
      const formatted = formatReport({
        namespaceTotals: [],
        ownerTotals: [],
        records: [{ ...record, owner: undefined }]
      });

      expect(formatted.pods[0]).not.toHaveProperty('owner');
    });

    it('should serialize as indented JSON', () => {
      expect(toJson({ a: 1 })).toBe('{\n  "a": 1\n}');
    });
  });
});
