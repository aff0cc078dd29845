import { z } from 'zod';
import { ConfigError } from './errors';
import type { ArchivePolicy } from './types';
import { isValidDomain, normalizeDomain } from './utils/emailDomains';

export const DEFAULT_HISTORY_LOOKBACK = 100;

/**
 * Parsed command line arguments
 */
export interface ParsedArgs {
  apiToken?: string;
  emailDomains: string[];
  days?: number;
  live: boolean;
  joinChannels: boolean;
  includePrivate: boolean;
  csv?: string;
  verbose: boolean;
  help: boolean;
}

export type TokenSource = 'argument' | 'environment';

export interface ResolvedToken {
  token: string;
  source: TokenSource;
}

const ArchivePolicySchema = z.object({
  targetDomains: z.array(
    z
      .string()
      .transform(normalizeDomain)
      .refine(isValidDomain, (value) => ({ message: `Invalid email domain: ${value}` }))
  ),
  inactivityThresholdDays: z
    .number()
    .int('--days must be a whole number')
    .nonnegative('--days must not be negative')
    .nullable(),
  live: z.boolean(),
  joinChannels: z.boolean(),
  includePrivate: z.boolean(),
  historyLookback: z.number().int().min(1).max(1000),
});

export type ArchivePolicyInput = z.input<typeof ArchivePolicySchema>;

function takeValue(argv: string[], index: number, option: string): string {
  const value = argv[index];
  if (value === undefined || value.startsWith('--')) {
    throw new ConfigError(`${option} requires a value`);
  }
  return value;
}

export function parseArgs(argv: string[]): ParsedArgs {
  const parsed: ParsedArgs = {
    emailDomains: [],
    live: false,
    joinChannels: false,
    includePrivate: false,
    verbose: false,
    help: false,
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    switch (arg) {
      case '--help':
      case '-h':
        parsed.help = true;
        break;
      case '--live':
        parsed.live = true;
        break;
      case '--join-channels':
        parsed.joinChannels = true;
        break;
      case '--include-private':
        parsed.includePrivate = true;
        break;
      case '--verbose':
        parsed.verbose = true;
        break;
      case '--email-domains': {
        const domains: string[] = [];
        while (i + 1 < argv.length && !argv[i + 1].startsWith('--')) {
          domains.push(argv[++i]);
        }
        if (domains.length === 0) {
          throw new ConfigError('--email-domains requires at least one domain');
        }
        parsed.emailDomains.push(...domains);
        break;
      }
      case '--days': {
        const value = takeValue(argv, ++i, '--days');
        if (!/^\d+$/.test(value)) {
          throw new ConfigError(`--days expects a whole number of days, got "${value}"`);
        }
        parsed.days = Number(value);
        break;
      }
      case '--csv':
        parsed.csv = takeValue(argv, ++i, '--csv');
        break;
      default:
        if (arg.startsWith('-')) {
          throw new ConfigError(`Unknown option: ${arg}`);
        }
        if (parsed.apiToken !== undefined) {
          throw new ConfigError(`Unexpected argument: ${arg}`);
        }
        parsed.apiToken = arg;
    }
  }

  return parsed;
}

/**
 * The token from the command line wins over SLACK_API_TOKEN
 */
export function resolveApiToken(
  args: Pick<ParsedArgs, 'apiToken'>,
  env: NodeJS.ProcessEnv
): ResolvedToken | null {
  if (args.apiToken) {
    return { token: args.apiToken, source: 'argument' };
  }
  const envToken = env.SLACK_API_TOKEN?.trim();
  return envToken ? { token: envToken, source: 'environment' } : null;
}

/**
 * Validate and freeze the policy for a run
 */
export function createArchivePolicy(input: ArchivePolicyInput): ArchivePolicy {
  const parsed = ArchivePolicySchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => issue.message).join('; '));
  }

  const policy = parsed.data;
  return Object.freeze({
    ...policy,
    targetDomains: Object.freeze([...new Set(policy.targetDomains)]),
  });
}

export function policyFromArgs(args: ParsedArgs): ArchivePolicy {
  return createArchivePolicy({
    targetDomains: args.emailDomains,
    inactivityThresholdDays: args.days ?? null,
    live: args.live,
    joinChannels: args.joinChannels,
    includePrivate: args.includePrivate,
    historyLookback: DEFAULT_HISTORY_LOOKBACK,
  });
}
