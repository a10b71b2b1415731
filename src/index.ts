import * as dotenv from 'dotenv';
import { getLogger } from '@fluidware-it/saddlebag';
import { parseArgs, USAGE } from './cli/parser';
import { getConfig } from './config/config';
import { createKubeClients } from './cluster/k8sClient';
import { K8sClusterDataSource } from './cluster/clusterDataSource';
import { runReport } from './reports/runReport';
import type { ProgressEvent } from './reports/common';
import { formatReport } from './utils/reportFormatter';
import { DataFetchError, FatalConfigurationError } from './utils/errors';

dotenv.config();

const logger = getLogger();

function logProgress(event: ProgressEvent): void {
  const status = event.totals.error ? `not counted (${event.totals.error})` : `${event.totals.podCount} pods`;
  logger.info(`[${event.index}/${event.total}] ${event.namespace}: ${status}`);
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  if (args.help) {
    process.stdout.write(`${USAGE}\n`);
    return;
  }

  const config = getConfig();
  const clients = createKubeClients(args.context ?? config.context);
  const source = new K8sClusterDataSource(clients);

  const version = await source.checkAccess();
  logger.info(`Connected to ${clients.contextName} (server ${version}), building ${args.report} report`);

  const report = await runReport(args, config, source, logProgress);
  process.stdout.write(`${formatReport(report, args.format)}\n`);

  logger.info(`Report complete: ${report.rows.length} row(s), ${report.warnings.length} warning(s)`);
}

main().catch((e: unknown) => {
  if (e instanceof FatalConfigurationError || e instanceof DataFetchError) {
    logger.error(e.message);
  } else {
    logger.error(e instanceof Error ? (e.stack ?? e.message) : String(e));
  }
  process.exitCode = 1;
});
