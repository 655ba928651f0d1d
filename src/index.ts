import * as dotenv from 'dotenv';
import { getLogger } from '@fluidware-it/saddlebag';
import { parseArgs, USAGE, type CliArgs } from './cli/parser';
import { getConfig } from './config/config';
import { createClusterClients } from './cluster/k8sClient';
import { createClusterSources } from './cluster/sources';
import { CliUsageError } from './errors';
import { runResourceRequestsAudit } from './analysis/resourceRequests';
import { runMissingHealthProbesAudit } from './analysis/healthProbes';
import { runReadOnlyRootFilesystemAudit } from './analysis/readOnlyRootFilesystem';
import { formatReport, toJson } from './utils/reportFormatter';

dotenv.config();

const logger = getLogger();

async function runCommand(args: CliArgs): Promise<unknown> {
  const config = getConfig();
  const clients = createClusterClients(args.context ?? config.context, config.defaultNamespace);
  const sources = createClusterSources(clients);

  logger.info(`Running ${args.command} against context ${clients.contextName}`);

  switch (args.command) {
    case 'resource-requests': {
      const report = await runResourceRequestsAudit(
        { ...sources, ownerLookupFailure: config.ownerLookupFailure },
        {
          namespaces: args.namespaces,
          allNamespaces: args.allNamespaces,
          threshold: args.threshold,
          skipUnderUtilization: args.noCheckHigher
        }
      );
      return formatReport(report);
    }
    case 'missing-health-probes':
      return runMissingHealthProbesAudit(sources.pods, args.namespaces, args.allNamespaces);
    case 'readonly-root-filesystem':
      return runReadOnlyRootFilesystemAudit(sources.pods, args.namespaces, args.allNamespaces);
  }
}

async function main(): Promise<void> {
  let args: CliArgs;
  try {
    args = parseArgs(process.argv.slice(2));
  } catch (error: unknown) {
    if (error instanceof CliUsageError) {
      // eslint-disable-next-line no-console
      console.error(`${error.message}\n\n${USAGE}`);
      process.exit(2);
    }
    throw error;
  }

  if (args.help) {
    // eslint-disable-next-line no-console
    console.log(USAGE);
    return;
  }

  const output = await runCommand(args);
  // eslint-disable-next-line no-console
  console.log(toJson(output));
}

main().catch((e: unknown) => {
  logger.error(e instanceof Error ? e.message : String(e));
  process.exit(1);
});
