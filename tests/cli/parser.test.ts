import { describe, it, expect } from 'vitest';
import { parseArgs } from '../../src/cli/parser';
import { CliUsageError } from '../../src/errors';

describe('CLI Parser', () => {
  describe('parseArgs', () => {
    it('should return default values for a bare command', () => {
      const args = parseArgs(['resource-requests']);

      expect(args).toEqual({
        command: 'resource-requests',
        namespaces: [],
        allNamespaces: false,
        context: undefined,
        threshold: undefined,
        noCheckHigher: false,
        help: false
      });
    });

    it('should parse each command', () => {
      expect(parseArgs(['missing-health-probes']).command).toBe('missing-health-probes');
      expect(parseArgs(['readonly-root-filesystem']).command).toBe('readonly-root-filesystem');
    });

    it('should collect repeated and comma separated namespaces', () => {
      const args = parseArgs(['resource-requests', '--namespaces', 'a,b', '--namespaces=c']);

      expect(args.namespaces).toEqual(['a', 'b', 'c']);
    });

    it('should parse --all-namespaces', () => {
      expect(parseArgs(['--all-namespaces', 'missing-health-probes']).allNamespaces).toBe(true);
    });

    it('should reject --namespaces together with --all-namespaces', () => {
      expect(() => parseArgs(['resource-requests', '--namespaces', 'a', '--all-namespaces'])).toThrow(
        '--namespaces and --all-namespaces cannot be used together'
      );
    });

    it('should parse --context and -c', () => {
      expect(parseArgs(['resource-requests', '--context', 'prod-cluster']).context).toBe('prod-cluster');
      expect(parseArgs(['resource-requests', '-c', 'staging-cluster']).context).toBe('staging-cluster');
      expect(parseArgs(['resource-requests', '--context=dev']).context).toBe('dev');
    });

    it('should parse the threshold as milli-cores', () => {
      expect(parseArgs(['resource-requests', '--threshold', '50']).threshold).toBe(50n);
      expect(parseArgs(['resource-requests', '--threshold=0']).threshold).toBe(0n);
    });

    it('should reject a non-numeric threshold', () => {
      expect(() => parseArgs(['resource-requests', '--threshold', '50m'])).toThrow(
        '--threshold expects a non-negative integer (milli-cores), got "50m"'
      );
    });

    it('should parse --no-check-higher', () => {
      expect(parseArgs(['resource-requests', '--no-check-higher']).noCheckHigher).toBe(true);
    });

    it('should reject resource-requests options on other commands', () => {
      expect(() => parseArgs(['missing-health-probes', '--threshold', '5'])).toThrow(CliUsageError);
    });

    it('should reject missing values', () => {
      expect(() => parseArgs(['resource-requests', '--context'])).toThrow('--context requires a value');
      expect(() => parseArgs(['resource-requests', '--namespaces', '--all-namespaces'])).toThrow(
        '--namespaces requires a value'
      );
    });

    it('should reject unknown options and commands', () => {
      expect(() => parseArgs(['resource-requests', '--verbose'])).toThrow('Unknown option: --verbose');
      expect(() => parseArgs(['cost-report'])).toThrow('Unknown command: cost-report');
      expect(() => parseArgs(['resource-requests', 'extra'])).toThrow('Unexpected argument: extra');
    });

    it('should require a command unless help is requested', () => {
      expect(() => parseArgs([])).toThrow('Missing command');
      expect(parseArgs(['--help']).help).toBe(true);
    });
  });
});
