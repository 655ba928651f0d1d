import { QuantityParseError } from '../errors';

// Multipliers/divisors for the suffixes accepted in resource quantities.
// The result is in milli-units for cpu ("m" is the identity) and in bytes for memory.
const SUFFIXES = new Map<string, (value: bigint) => bigint>([
  ['n', value => value / 1_000_000n],
  ['m', value => value],
  ['k', value => value * 1_000_000n],
  ['Ki', value => value * 1024n],
  ['Mi', value => value * 1024n ** 2n],
  ['Gi', value => value * 1024n ** 3n]
]);

function isDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9';
}

// Parse a quantity string ("1500m", "1Ki", "2") into a unit-less integer.
// Digits are read up to the first non-digit character; everything from there on is the suffix.
// A quantity without suffix is scaled by 1000 regardless of resource. For memory this yields
// bytes × 1000 ("64" → 64000), which does not match Kubernetes semantics but is kept as-is.
export function parseQuantity(quantity: string): bigint {
  let split = 0;
  while (split < quantity.length && isDigit(quantity.charAt(split))) split++;

  const digits = quantity.slice(0, split);
  const suffix = quantity.slice(split);

  if (digits.length === 0) {
    throw new QuantityParseError('NotANumber', quantity);
  }

  const value = BigInt(digits);
  if (suffix.length === 0) {
    return value * 1000n;
  }

  const scale = SUFFIXES.get(suffix);
  if (!scale) {
    throw new QuantityParseError('UnknownSuffix', quantity);
  }
  return scale(value);
}

export interface Amount<T> {
  readonly value: bigint;
  add(other: T): T;
  saturatingSub(other: T): T;
  toString(): string;
}

function saturate(value: bigint): bigint {
  return value < 0n ? 0n : value;
}

// CPU amount in milli-cores
export class Cpu implements Amount<Cpu> {
  readonly value: bigint;

  constructor(milliCores: bigint) {
    this.value = saturate(milliCores);
  }

  static parse(quantity: string): Cpu {
    return new Cpu(parseQuantity(quantity));
  }

  add(other: Cpu): Cpu {
    return new Cpu(this.value + other.value);
  }

  saturatingSub(other: Cpu): Cpu {
    return new Cpu(this.value - other.value);
  }

  isGreaterThan(other: Cpu): boolean {
    return this.value > other.value;
  }

  toString(): string {
    return `${this.value}m`;
  }
}

const BINARY_UNITS = ['KiB', 'MiB', 'GiB', 'TiB', 'PiB', 'EiB'];

// Binary-scaled byte string: "512MiB", "1.5GiB", "900B"
export function formatBytes(bytes: bigint): string {
  if (bytes < 1024n) return `${bytes}B`;

  let exponent = 1;
  while (exponent < BINARY_UNITS.length && bytes >= 1024n ** BigInt(exponent + 1)) exponent++;

  const base = 1024n ** BigInt(exponent);
  const tenths = (bytes * 10n + base / 2n) / base;
  const whole = tenths / 10n;
  const fraction = tenths % 10n;
  const unit = BINARY_UNITS[exponent - 1] ?? 'EiB';

  return fraction === 0n ? `${whole}${unit}` : `${whole}.${fraction}${unit}`;
}

// Memory amount in bytes
export class Memory implements Amount<Memory> {
  readonly value: bigint;

  constructor(bytes: bigint) {
    this.value = saturate(bytes);
  }

  static parse(quantity: string): Memory {
    return new Memory(parseQuantity(quantity));
  }

  add(other: Memory): Memory {
    return new Memory(this.value + other.value);
  }

  saturatingSub(other: Memory): Memory {
    return new Memory(this.value - other.value);
  }

  toString(): string {
    return formatBytes(this.value);
  }
}
