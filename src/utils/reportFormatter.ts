import type {
  AccountingReport,
  DisplayUsage,
  MemoryDisplayUnit,
  NamespaceRow,
  NamespaceTotalRow,
  NodeReport,
  NodeRow,
  OutputFormat,
  ReportWarning,
  WorkloadRow
} from '../types/report';
import { IssueSeverity } from '../types/report';

const TITLES: Record<AccountingReport['kind'], string> = {
  namespaces: 'Namespace Resource Report',
  workloads: 'Workload Resource Report',
  nodes: 'Node Capacity Report'
};

// 250 -> "250 m", 1500 -> "1.50 c", 0 -> "-"
export function formatCpu(millicores: number): string {
  if (millicores === 0) return '-';
  if (Math.abs(millicores) >= 1000) return `${(millicores / 1000).toFixed(2)} c`;
  return `${millicores.toFixed(0)} m`;
}

// Display rows are already divided and rounded
export function formatMemory(value: number, unit: MemoryDisplayUnit): string {
  if (value === 0) return '-';
  return `${value} ${unit}`;
}

export function formatPercent(value: number): string {
  return `${value.toFixed(1)}%`;
}

function usageCells(usage: DisplayUsage | undefined, unit: MemoryDisplayUnit): [string, string] {
  if (!usage || !usage.available) return ['N/A', 'N/A'];
  return [formatCpu(usage.cpuM), formatMemory(usage.mem, unit)];
}

function table(headers: string[], rows: string[][]): string[] {
  return [
    `| ${headers.join(' | ')} |`,
    `|${headers.map(() => '---').join('|')}|`,
    ...rows.map(row => `| ${row.join(' | ')} |`)
  ];
}

function namespaceCells(
  label: string,
  pods: string,
  row: NamespaceRow | NamespaceTotalRow,
  unit: MemoryDisplayUnit,
  showUsage: boolean
): string[] {
  const [cpuActual, memActual] = usageCells(row.usage, unit);
  return [
    label,
    pods,
    formatCpu(row.cpuRequestM),
    formatCpu(row.cpuLimitM),
    ...(showUsage ? [cpuActual] : []),
    formatMemory(row.memRequest, unit),
    formatMemory(row.memLimit, unit),
    ...(showUsage ? [memActual] : [])
  ];
}

function formatNamespaceTable(rows: NamespaceRow[], total: NamespaceTotalRow, unit: MemoryDisplayUnit): string[] {
  const showUsage = rows.some(row => row.usage) || total.usage !== undefined;
  const headers = [
    'Namespace',
    'Pods',
    'CPU Req',
    'CPU Lim',
    ...(showUsage ? ['CPU Actual'] : []),
    'Mem Req',
    'Mem Lim',
    ...(showUsage ? ['Mem Actual'] : [])
  ];

  const body = rows.map(row => {
    if (row.error) return [row.namespace, 'ERR', ...headers.slice(2).map(() => '-')];
    const marker = row.podsWithoutRequests > 0 ? ' (*)' : '';
    return namespaceCells(row.namespace, `${row.podCount}${marker}`, row, unit, showUsage);
  });
  body.push(
    namespaceCells(`**Cluster total (${total.namespaceCount} namespaces)**`, `${total.podCount}`, total, unit, showUsage)
  );

  const lines = table(headers, body);
  if (total.podsWithoutRequests > 0) {
    lines.push('', `(*) ${total.podsWithoutRequests} pod(s) without requests: totals are underestimated`);
  }
  if (total.errorCount > 0) {
    lines.push('', `${total.errorCount} namespace(s) could not be read and are not in the total`);
  }
  return lines;
}

function formatWorkloadTable(workloads: WorkloadRow[], unit: MemoryDisplayUnit): string[] {
  const headers = ['Namespace', 'Kind', 'Name', 'Declared', 'Counted', 'CPU Req', 'CPU Lim', 'Mem Req', 'Mem Lim', 'Status'];
  const body = workloads.map(w => [
    w.namespace,
    w.kind,
    w.name,
    `${w.declaredReplicas}`,
    `${w.effectiveReplicas}`,
    formatCpu(w.cpuRequestM),
    formatCpu(w.cpuLimitM),
    formatMemory(w.memRequest, unit),
    formatMemory(w.memLimit, unit),
    w.note ? `${w.status} (${w.note})` : w.status
  ]);
  return table(headers, body);
}

function nodeCells(row: NodeRow, unit: MemoryDisplayUnit, showUsage: boolean): string[] {
  const usage = showUsage ? usageCells(row.usage, unit) : [];
  if (row.error) {
    return [
      row.nodeName,
      'ERR',
      formatMemory(row.capacity, unit),
      formatMemory(row.allocatable, unit),
      ...Array.from({ length: 8 }, () => '-'),
      ...usage
    ];
  }
  return [
    row.nodeName,
    `${row.podCount}`,
    formatMemory(row.capacity, unit),
    formatMemory(row.allocatable, unit),
    formatMemory(row.committed, unit),
    formatMemory(row.freeReserve, unit),
    formatPercent(row.utilizationPct),
    formatCpu(row.allocatableCpuM),
    formatCpu(row.committedCpuM),
    formatPercent(row.cpuUtilizationPct),
    formatMemory(row.committedLimit, unit),
    formatPercent(row.memOvercommitPct),
    ...usage
  ];
}

function formatNodeTable(report: NodeReport): string[] {
  const unit = report.memoryUnit;
  const total = report.grandTotal;
  const showUsage = report.rows.some(row => row.usage);
  const headers = [
    'Node',
    'Pods',
    'Capacity',
    'Allocatable',
    'Committed',
    'Free',
    'Mem %',
    'CPU Alloc',
    'CPU Committed',
    'CPU %',
    'Mem Limits',
    'Overcommit %',
    ...(showUsage ? ['CPU Actual', 'Mem Actual'] : [])
  ];

  const body = report.rows.map(row => nodeCells(row, unit, showUsage));
  body.push([
    `**Total (${total.nodeCount} nodes)**`,
    `${total.podCount}`,
    formatMemory(total.capacity, unit),
    formatMemory(total.allocatable, unit),
    formatMemory(total.committed, unit),
    formatMemory(total.freeReserve, unit),
    formatPercent(total.utilizationPct),
    formatCpu(total.allocatableCpuM),
    formatCpu(total.committedCpuM),
    formatPercent(total.cpuUtilizationPct),
    formatMemory(total.committedLimit, unit),
    formatPercent(total.memOvercommitPct),
    ...(showUsage ? ['', ''] : [])
  ]);

  const lines = table(headers, body);
  if (report.unscheduledPodCount > 0) {
    lines.push('', `${report.unscheduledPodCount} pod(s) not scheduled yet; not committed on any node`);
  }
  if (report.unmatchedPodCount > 0) {
    lines.push('', `${report.unmatchedPodCount} pod(s) assigned to nodes outside the report`);
  }
  return lines;
}

function formatWarning(warning: ReportWarning): string {
  const { kind, name, namespace } = warning.resource;
  const where = namespace ? ` in ${namespace}` : '';
  return `- **${kind}/${name}**${where}: ${warning.message}`;
}

function formatWarnings(warnings: ReportWarning[]): string[] {
  const lines: string[] = [];

  // Render warning sections grouped by severity
  const severitySections: { severity: IssueSeverity; title: string }[] = [
    { severity: IssueSeverity.ERROR, title: 'Errors' },
    { severity: IssueSeverity.WARNING, title: 'Warnings' },
    { severity: IssueSeverity.INFO, title: 'Info' }
  ];

  for (const { severity, title } of severitySections) {
    const matching = warnings.filter(w => w.severity === severity);
    if (matching.length > 0) {
      lines.push('', `## ${title}`, '');
      matching.forEach(warning => {
        lines.push(formatWarning(warning));
      });
    }
  }

  return lines;
}

export function formatMarkdown(report: AccountingReport): string {
  const lines: string[] = [];

  // Header
  lines.push(`# ${TITLES[report.kind]}`);
  lines.push('');
  lines.push(`**Generated:** ${report.generatedAt}`);
  lines.push('');
  lines.push(`**Sorted by:** ${report.sortBy}`);
  lines.push('');
  lines.push(`**Memory unit:** ${report.memoryUnit}`);
  lines.push('');

  switch (report.kind) {
    case 'namespaces':
      lines.push(...formatNamespaceTable(report.rows, report.grandTotal, report.memoryUnit));
      break;
    case 'workloads':
      lines.push(...formatNamespaceTable(report.rows, report.grandTotal, report.memoryUnit));
      lines.push('', '## Workloads', '');
      lines.push(...formatWorkloadTable(report.workloads, report.memoryUnit));
      break;
    case 'nodes':
      lines.push(...formatNodeTable(report));
      break;
  }

  lines.push(...formatWarnings(report.warnings));

  return lines.join('\n');
}

export function formatReport(report: AccountingReport, format: OutputFormat = 'markdown'): string {
  return format === 'json' ? JSON.stringify(report, null, 2) : formatMarkdown(report);
}
