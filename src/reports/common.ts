import { getLogger } from '@fluidware-it/saddlebag';
import type { ClusterDataSource } from '../cluster/clusterDataSource';
import type { NamespaceTotals } from '../types/resources';
import type { MemoryDisplayUnit } from '../types/report';
import { DEFAULT_SYSTEM_PREFIXES } from '../config/config';
import { QuantityParser } from '../analysis/quantityParser';
import { toDataFetchError } from '../utils/errors';

const logger = getLogger();

export interface ProgressEvent {
  // Units completed so far, 1-based; completion order, not input order
  index: number;
  total: number;
  namespace: string;
  totals: NamespaceTotals;
}

export interface NamespaceSelection {
  // A single namespace; when set, the filters below are not applied
  namespace?: string | undefined;
  skipSystem?: boolean | undefined;
  systemPrefixes?: readonly string[] | undefined;
  exclude?: readonly string[] | undefined;
}

export interface CommonReportOptions {
  memoryUnit?: MemoryDisplayUnit | undefined;
  includeUsage?: boolean | undefined;
  concurrency?: number | undefined;
  now?: (() => Date) | undefined;
}

// Spec quantities follow the report's bare-memory convention; usage samples are always bytes
export interface ReportParsers {
  spec: QuantityParser;
  usage: QuantityParser;
}

export function isSystemNamespace(namespace: string, prefixes: readonly string[]): boolean {
  return prefixes.some(prefix => namespace.startsWith(prefix));
}

export function filterNamespaces(namespaces: readonly string[], selection: NamespaceSelection): string[] {
  const prefixes = selection.systemPrefixes ?? DEFAULT_SYSTEM_PREFIXES;
  const excluded = new Set(selection.exclude ?? []);
  return namespaces.filter(
    ns => !excluded.has(ns) && !(selection.skipSystem && isSystemNamespace(ns, prefixes))
  );
}

export async function selectNamespaces(source: ClusterDataSource, selection: NamespaceSelection): Promise<string[]> {
  if (selection.namespace) {
    await source.readNamespace(selection.namespace);
    return [selection.namespace];
  }

  const all = await source.listNamespaces();
  const selected = filterNamespaces(all, selection);
  logger.info(`Namespaces: ${all.length} found, ${selected.length} selected`);
  return selected;
}

// Metrics API quantities come from the API server, where a bare memory number is bytes
export function usageParser(): QuantityParser {
  return new QuantityParser('bytes');
}

// Message stored on a failed entity
export function failureMessage(e: unknown, resource: string): string {
  return toDataFetchError(e, resource).message;
}

// Wraps a per-namespace unit so each completion reports progress
export function withProgress<R extends { totals: NamespaceTotals }>(
  total: number,
  onProgress: ((event: ProgressEvent) => void) | undefined,
  unit: (namespace: string) => Promise<R>
): (namespace: string) => Promise<R> {
  let completed = 0;
  return async namespace => {
    const result = await unit(namespace);
    completed++;
    onProgress?.({ index: completed, total, namespace, totals: result.totals });
    return result;
  };
}
