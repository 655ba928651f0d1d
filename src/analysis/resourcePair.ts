import type { Amount } from './quantity';
import type { ResourcePair, ResourceSummary } from '../types/resources';

// Absence acts as the identity: some+some sums, a single side wins, none+none stays none
export function addOptional<T extends Amount<T>>(a: T | undefined, b: T | undefined): T | undefined {
  if (a && b) return a.add(b);
  return a ?? b;
}

// Saturating difference, only defined when both sides are known
export function subtractOptional<T extends Amount<T>>(a: T | undefined, b: T | undefined): T | undefined {
  if (!a || !b) return undefined;
  return a.saturatingSub(b);
}

export function addPairs(a: ResourcePair, b: ResourcePair): ResourcePair {
  return {
    cpu: addOptional(a.cpu, b.cpu),
    memory: addOptional(a.memory, b.memory)
  };
}

export function subtractPairs(a: ResourcePair, b: ResourcePair): ResourcePair {
  return {
    cpu: subtractOptional(a.cpu, b.cpu),
    memory: subtractOptional(a.memory, b.memory)
  };
}

export function emptySummary(): ResourceSummary {
  return {
    usage: {},
    requests: {},
    limits: {},
    difference: { requests: {}, limits: {} }
  };
}

export function addSummaries(a: ResourceSummary, b: ResourceSummary): ResourceSummary {
  return {
    usage: addPairs(a.usage, b.usage),
    requests: addPairs(a.requests, b.requests),
    limits: addPairs(a.limits, b.limits),
    difference: {
      requests: addPairs(a.difference.requests, b.difference.requests),
      limits: addPairs(a.difference.limits, b.difference.limits)
    }
  };
}
