import { getLogger } from '@fluidware-it/saddlebag';
import type { BareMemoryUnit } from '../types/resources';

const logger = getLogger();

// MiB per unit. Suffixes without the trailing "i" are read with the binary multipliers too:
// a known approximation, "512M" is taken as 512 MiB and not 512 * 10^6 bytes.
const MEMORY_MULTIPLIERS = Object.freeze([
  ['Ki', 1 / 1024],
  ['Mi', 1],
  ['Gi', 1024],
  ['Ti', 1024 * 1024],
  ['K', 1 / 1024],
  ['M', 1],
  ['G', 1024],
  ['T', 1024 * 1024]
] as const);

// Units of the suffix per millicore
const CPU_SUFFIXES = Object.freeze([
  ['m', 1],
  ['u', 1000],
  ['n', 1_000_000]
] as const);

const BYTES_PER_MIB = 1024 * 1024;

const DECIMAL_PATTERN = /^\+?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?$/;

export interface ParseFailure {
  kind: 'cpu' | 'memory';
  value: string;
  context?: string | undefined;
}

// Decimal float syntax only: no sign other than "+", no hex, no NaN/Infinity, no blanks
function parseDecimal(text: string): number | undefined {
  if (!DECIMAL_PATTERN.test(text)) return undefined;
  const value = Number(text);
  return Number.isFinite(value) ? value : undefined;
}

// A prefix that is finite can still overflow once scaled ("1e308Ti")
function scaled(amount: number | undefined, scale: (amount: number) => number): number | undefined {
  if (amount === undefined) return undefined;
  const value = scale(amount);
  return Number.isFinite(value) ? value : undefined;
}

// Strict CPU parse: millicores, or undefined when the string is not a quantity
export function tryParseCpu(value: string): number | undefined {
  for (const [suffix, perMillicore] of CPU_SUFFIXES) {
    if (value.endsWith(suffix)) {
      return scaled(parseDecimal(value.slice(0, -suffix.length)), amount => amount / perMillicore);
    }
  }
  return scaled(parseDecimal(value), cores => cores * 1000);
}

// Strict memory parse: MiB, or undefined when the string is not a quantity
export function tryParseMemory(value: string, bareUnit: BareMemoryUnit): number | undefined {
  for (const [suffix, multiplier] of MEMORY_MULTIPLIERS) {
    if (value.endsWith(suffix)) {
      return scaled(parseDecimal(value.slice(0, -suffix.length)), amount => amount * multiplier);
    }
  }
  const bare = parseDecimal(value);
  if (bare === undefined) return undefined;
  return bareUnit === 'bytes' ? bare / BYTES_PER_MIB : bare;
}

// Permissive CPU parse: absent or empty is 0 ("nothing declared"), malformed is 0 and reported
export function parseCpu(value: string | undefined, onFailure?: (failure: ParseFailure) => void): number {
  if (!value) return 0;
  const parsed = tryParseCpu(value);
  if (parsed === undefined) {
    onFailure?.({ kind: 'cpu', value });
    return 0;
  }
  return parsed;
}

export function parseMemory(
  value: string | undefined,
  bareUnit: BareMemoryUnit,
  onFailure?: (failure: ParseFailure) => void
): number {
  if (!value) return 0;
  const parsed = tryParseMemory(value, bareUnit);
  if (parsed === undefined) {
    onFailure?.({ kind: 'memory', value });
    return 0;
  }
  return parsed;
}

/**
 * Quantity parser bound to one report run. Holds the bare-number convention of its call
 * site and records every malformed quantity it met, so the report can say how many values
 * were counted as zero.
 */
export class QuantityParser {
  readonly bareMemoryUnit: BareMemoryUnit;
  private readonly recorded: ParseFailure[] = [];

  constructor(bareMemoryUnit: BareMemoryUnit) {
    this.bareMemoryUnit = bareMemoryUnit;
  }

  get failures(): readonly ParseFailure[] {
    return this.recorded;
  }

  get failureCount(): number {
    return this.recorded.length;
  }

  cpu(value: string | undefined, context?: string): number {
    return parseCpu(value, failure => this.record(failure, context));
  }

  memory(value: string | undefined, context?: string): number {
    return parseMemory(value, this.bareMemoryUnit, failure => this.record(failure, context));
  }

  // Strict variants for callers that skip bad values instead of counting them as zero
  tryCpu(value: string, context?: string): number | undefined {
    const parsed = tryParseCpu(value);
    if (parsed === undefined) this.record({ kind: 'cpu', value }, context);
    return parsed;
  }

  tryMemory(value: string, context?: string): number | undefined {
    const parsed = tryParseMemory(value, this.bareMemoryUnit);
    if (parsed === undefined) this.record({ kind: 'memory', value }, context);
    return parsed;
  }

  private record(failure: ParseFailure, context: string | undefined): void {
    const entry: ParseFailure = context ? { ...failure, context } : failure;
    this.recorded.push(entry);
    logger.warn(`Unparseable ${failure.kind} quantity "${failure.value}"${context ? ` (${context})` : ''}`);
  }
}
