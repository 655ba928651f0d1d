import type { ExpandableOwnerKind } from './types/k8s';

export type ResourceField =
  | 'requests.cpu'
  | 'requests.memory'
  | 'limits.cpu'
  | 'limits.memory'
  | 'usage.cpu'
  | 'usage.memory';

// Where a quantity came from, so a bad value can be traced back to its object
export interface QuantityContext {
  namespace: string;
  podName: string;
  containerName: string;
  field: ResourceField;
}

export type QuantityParseReason = 'NotANumber' | 'UnknownSuffix';

export class QuantityParseError extends Error {
  readonly reason: QuantityParseReason;
  readonly quantity: string;
  readonly context?: QuantityContext | undefined;

  constructor(reason: QuantityParseReason, quantity: string, context?: QuantityContext) {
    super(QuantityParseError.describe(reason, quantity, context));
    this.name = 'QuantityParseError';
    this.reason = reason;
    this.quantity = quantity;
    this.context = context;
  }

  // Re-raise with the pod/container/field the quantity belongs to
  withContext(context: QuantityContext): QuantityParseError {
    return new QuantityParseError(this.reason, this.quantity, context);
  }

  private static describe(reason: QuantityParseReason, quantity: string, context?: QuantityContext): string {
    const what = reason === 'NotANumber' ? 'is not a number' : 'has an unknown suffix';
    const where = context
      ? ` (${context.namespace}/${context.podName}, container "${context.containerName}", ${context.field})`
      : '';
    return `Quantity "${quantity}" ${what}${where}`;
  }
}

export type OwnerLookupReason = 'NotFound' | 'Ambiguous';

export class OwnerLookupError extends Error {
  readonly reason: OwnerLookupReason;
  readonly namespace: string;
  readonly objectName: string;
  readonly kind: ExpandableOwnerKind;
  readonly matches: number;

  constructor(namespace: string, objectName: string, kind: ExpandableOwnerKind, matches: number) {
    const reason: OwnerLookupReason = matches === 0 ? 'NotFound' : 'Ambiguous';
    super(`Expected exactly one ${kind} "${objectName}" in namespace "${namespace}", found ${matches}`);
    this.name = 'OwnerLookupError';
    this.reason = reason;
    this.namespace = namespace;
    this.objectName = objectName;
    this.kind = kind;
    this.matches = matches;
  }
}

export class MetricsUnavailableError extends Error {
  readonly namespace: string;
  readonly podName: string;

  constructor(namespace: string, podName: string, detail: string) {
    super(`Metrics unavailable for pod ${namespace}/${podName}: ${detail}`);
    this.name = 'MetricsUnavailableError';
    this.namespace = namespace;
    this.podName = podName;
  }
}

export class InvalidObjectError extends Error {
  readonly kind: string;

  constructor(kind: string, namespace: string, objectName: string, detail: string) {
    super(`${kind} ${namespace}/${objectName} is invalid: ${detail}`);
    this.name = 'InvalidObjectError';
    this.kind = kind;
  }
}

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}
