#!/usr/bin/env tsx
/**
 * Channel Sweeper CLI
 *
 * Usage:
 *   tsx src/cli.ts [api_token] [--email-domains <domain>...] [--days <n>] [--live] [--csv <path>]
 *
 * Run with --help for every option.
 */

import 'dotenv/config';
import { runChannelSweep } from './main';
import { createWebClient } from './slack/workspaceClient';
import { logger } from './utils/logger';

process.on('SIGINT', () => {
  console.log('\n\n⚠️  Sweep interrupted (Ctrl+C), channels archived so far stay archived');
  process.exit(130);
});

runChannelSweep(process.argv.slice(2), process.env, { createApi: createWebClient })
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error) => {
    logger.error('Unexpected error', error);
    process.exitCode = 1;
  });
