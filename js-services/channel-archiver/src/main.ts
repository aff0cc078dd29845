import { randomUUID } from 'node:crypto';
import { archiveChannels } from './archiver/channelArchiver';
import {
  parseArgs,
  policyFromArgs,
  resolveApiToken,
  type ParsedArgs,
  type ResolvedToken,
} from './config';
import { UserDirectory } from './directory/userDirectory';
import { ConfigError } from './errors';
import { displayReport } from './report/consoleReport';
import { writeCsvReport } from './report/csvReport';
import { WorkspaceClient, type SlackApi } from './slack/workspaceClient';
import type { ArchivePolicy, RunResultRecord } from './types';
import { logger, LogContext } from './utils/logger';

export const USAGE = `
Channel Sweeper

Archives Slack channels that are inactive or whose members all belong to given email domains.

Usage:
  channel-sweeper [api_token] [options]

Options:
  --email-domains <domain>...  Archive channels whose members all use these email domains
  --days <n>                   Archive channels with no messages in the last n days
  --live                       Archive for real (default is a dry run)
  --join-channels              Join channels the token cannot read before checking history
  --include-private            Also evaluate private channels
  --csv <path>                 Write a CSV report
  --verbose                    Debug logging
  --help, -h                   Show this help message

Environment Variables:
  SLACK_API_TOKEN              Used when api_token is not given (read from .env too)
  LOG_LEVEL                    error | warn | info | debug (default: info)
`;

export interface SweepDependencies {
  createApi: (token: string) => SlackApi;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

function describeRun(policy: ArchivePolicy, credentials: ResolvedToken): void {
  if (credentials.source === 'environment') {
    logger.info('Using SLACK_API_TOKEN from the environment');
  }
  if (policy.inactivityThresholdDays !== null) {
    logger.info(`Archiving channels with no messages in the last ${policy.inactivityThresholdDays} days`);
  }
  if (policy.targetDomains.length > 0) {
    logger.info(`Checking for channels with users from ${policy.targetDomains.join(', ')}`);
  }
  if (policy.inactivityThresholdDays === null && policy.targetDomains.length === 0) {
    logger.warn('Neither --days nor --email-domains given, no channel can be archived');
  }
  if (policy.joinChannels) {
    logger.info('Will join channels if not already a member');
  }
  logger.info(policy.live ? 'Running in live mode' : 'DRY RUN: use --live to run in live mode');
}

/**
 * Run one sweep from command line arguments. Resolves to the process exit code.
 */
export async function runChannelSweep(
  argv: string[],
  env: NodeJS.ProcessEnv,
  deps: SweepDependencies
): Promise<number> {
  let args: ParsedArgs;
  let policy: ArchivePolicy;
  try {
    args = parseArgs(argv);
    policy = policyFromArgs(args);
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(`Error: ${error.message}`);
      console.log(USAGE);
      return 1;
    }
    throw error;
  }

  if (args.help) {
    console.log(USAGE);
    return 0;
  }

  if (args.verbose) {
    logger.setLevel('debug');
  }

  const credentials = resolveApiToken(args, env);
  if (!credentials) {
    console.error('Error: a Slack API token is required (argument or SLACK_API_TOKEN)');
    console.log(USAGE);
    return 1;
  }

  describeRun(policy, credentials);

  const client = new WorkspaceClient(deps.createApi(credentials.token), { sleep: deps.sleep });
  const directory = new UserDirectory(client);

  let records: RunResultRecord[];
  try {
    records = await LogContext.run({ runId: randomUUID().slice(0, 8) }, () =>
      archiveChannels(policy, client, directory, deps.now)
    );
  } catch (error) {
    logger.error('Channel sweep could not start', error);
    return 1;
  }

  displayReport(records, policy.live);

  if (args.csv) {
    const written = writeCsvReport(args.csv, records);
    logger.info(`CSV report written to ${written}`);
  }

  return 0;
}
