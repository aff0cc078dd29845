import { jest, describe, test, expect, beforeEach, afterEach } from '@jest/globals';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { DAY_MS } from '../classification/classifyChannel';
import { USAGE, runChannelSweep } from '../main';
import { logger } from '../utils/logger';
import { createFakeSlackApi, platformError, type FakeWorkspace } from './helpers/fakeSlackApi';

jest.mock('../utils/logger', () => ({
  logger: {
    info: jest.fn(),
    debug: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    setLevel: jest.fn(),
  },
  LogContext: {
    run: jest.fn((_context: unknown, fn: () => unknown) => fn()),
  },
}));

const NOW = Date.UTC(2024, 5, 1);

const workspace: FakeWorkspace = {
  channels: [
    { id: 'C1', name: 'proj-x' },
    { id: 'C2', name: 'general' },
  ],
  members: { C1: ['U1'], C2: ['U1', 'U2'] },
  messages: {
    C1: [{ ts: String((NOW - 5 * DAY_MS) / 1000) }],
    C2: [{ ts: String((NOW - 1 * DAY_MS) / 1000) }],
  },
  users: [
    { id: 'U1', profile: { email: 'ana@acme.com' } },
    { id: 'U2', profile: { email: 'lee@example.org' } },
  ],
};

describe('runChannelSweep', () => {
  beforeEach(() => {
    jest.clearAllMocks();
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  test('prints usage for --help without touching Slack', async () => {
    const createApi = jest.fn((_token: string) => createFakeSlackApi(workspace).api);

    const exitCode = await runChannelSweep(['--help'], {}, { createApi });

    expect(exitCode).toBe(0);
    expect(console.log).toHaveBeenCalledWith(USAGE);
    expect(createApi).not.toHaveBeenCalled();
  });

  test('fails when no token is available', async () => {
    const createApi = jest.fn((_token: string) => createFakeSlackApi(workspace).api);

    const exitCode = await runChannelSweep(['--days', '30'], {}, { createApi });

    expect(exitCode).toBe(1);
    expect(console.error).toHaveBeenCalledWith(
      'Error: a Slack API token is required (argument or SLACK_API_TOKEN)'
    );
    expect(createApi).not.toHaveBeenCalled();
  });

  test('reports invalid options before calling Slack', async () => {
    const createApi = jest.fn((_token: string) => createFakeSlackApi(workspace).api);

    const exitCode = await runChannelSweep(['test-token', '--email-domains', '*'], {}, {
      createApi,
    });

    expect(exitCode).toBe(1);
    expect(console.error).toHaveBeenCalledWith('Error: Invalid email domain: *');
    expect(createApi).not.toHaveBeenCalled();
  });

  test('runs a dry run with the token from the environment and writes the CSV', async () => {
    const fake = createFakeSlackApi(workspace);
    const createApi = jest.fn((_token: string) => fake.api);
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'channel-sweeper-'));
    const csvPath = path.join(dir, 'report.csv');

    try {
      const exitCode = await runChannelSweep(
        ['--email-domains', 'acme.com', '--days', '30', '--csv', csvPath, '--verbose'],
        { SLACK_API_TOKEN: 'test-token' },
        { createApi, now: () => NOW }
      );

      expect(exitCode).toBe(0);
      expect(createApi).toHaveBeenCalledWith('test-token');
      expect(logger.setLevel).toHaveBeenCalledWith('debug');
      expect(logger.info).toHaveBeenCalledWith('Using SLACK_API_TOKEN from the environment');
      expect(fake.api.conversations.archive).not.toHaveBeenCalled();
      expect(fs.readFileSync(csvPath, 'utf-8')).toBe(
        [
          'channel_id,channel_name,verdict,action,reason',
          'C1,proj-x,archive_by_domain,simulated,all members belong to acme.com',
          'C2,general,keep,none,active within 30 days',
          '',
        ].join('\n')
      );
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  test('archives in live mode', async () => {
    const fake = createFakeSlackApi(workspace);

    const exitCode = await runChannelSweep(
      ['test-token', '--email-domains', 'acme.com', '--live'],
      {},
      { createApi: () => fake.api, now: () => NOW }
    );

    expect(exitCode).toBe(0);
    expect(fake.api.conversations.archive).toHaveBeenCalledTimes(1);
    expect(fake.api.conversations.archive).toHaveBeenCalledWith({ channel: 'C1' });
  });

  test('exits non-zero when the channel list cannot be fetched', async () => {
    const fake = createFakeSlackApi({
      ...workspace,
      failures: { list: platformError('invalid_auth') },
    });

    const exitCode = await runChannelSweep(['test-token', '--days', '30'], {}, {
      createApi: () => fake.api,
    });

    expect(exitCode).toBe(1);
    expect(logger.error).toHaveBeenCalledWith(
      'Channel sweep could not start',
      expect.objectContaining({ category: 'auth', code: 'invalid_auth' })
    );
  });
});
