import { classifyChannel, isArchiveVerdict, keepVerdict } from '../classification/classifyChannel';
import type { ArchivePolicy, Channel, RunResultRecord, Verdict } from '../types';
import type { WorkspaceClient } from '../slack/workspaceClient';
import { logger, LogContext } from '../utils/logger';

export type ArchiverClient = Pick<
  WorkspaceClient,
  'listChannels' | 'listMembers' | 'fetchRecentMessages' | 'archiveChannel' | 'joinChannel'
>;

export interface DomainResolver {
  resolveDomain(userId: string): Promise<string | null>;
}

// Join and leave notices are not conversation activity
const IGNORED_MESSAGE_SUBTYPES = new Set(['channel_join', 'channel_leave']);

function record(
  channel: Channel,
  verdict: Verdict,
  action: RunResultRecord['action'],
  error: string | null = null
): RunResultRecord {
  return { channelId: channel.id, channelName: channel.name, verdict, action, error };
}

async function resolveMemberDomains(
  memberIds: string[],
  directory: DomainResolver
): Promise<Set<string>> {
  const domains = new Set<string>();
  for (const memberId of memberIds) {
    const domain = await directory.resolveDomain(memberId);
    if (domain) {
      domains.add(domain);
    }
  }
  return domains;
}

/**
 * Milliseconds since the newest non-notice message, or null when history is unavailable
 * or holds no such message
 */
async function fetchActivityAge(
  channel: Channel,
  policy: ArchivePolicy,
  client: ArchiverClient,
  now: number
): Promise<number | null> {
  let history = await client.fetchRecentMessages(channel.id, policy.historyLookback);

  if (!history.success && history.error.code === 'not_in_channel' && policy.joinChannels) {
    logger.info(`Joining #${channel.name ?? channel.id} to read its history`);
    const joined = await client.joinChannel(channel.id);
    if (joined.success) {
      history = await client.fetchRecentMessages(channel.id, policy.historyLookback);
    } else {
      logger.warn(`Could not join #${channel.name ?? channel.id}`, {
        errorCode: joined.error.code,
      });
    }
  }

  if (!history.success) {
    logger.warn('Channel history unavailable, treating activity as unknown', {
      errorCode: history.error.code,
      errorCategory: history.error.category,
    });
    return null;
  }

  const latest = history.value.find(
    (message) => !message.subtype || !IGNORED_MESSAGE_SUBTYPES.has(message.subtype)
  );
  return latest ? Math.max(0, now - latest.postedAt.getTime()) : null;
}

async function processChannel(
  channel: Channel,
  policy: ArchivePolicy,
  client: ArchiverClient,
  directory: DomainResolver,
  now: number
): Promise<RunResultRecord> {
  if (channel.isArchived === true) {
    const verdict = classifyChannel(
      { isArchived: true, activityAgeMs: null, memberDomains: new Set() },
      policy
    );
    return record(channel, verdict, 'none');
  }

  const members = await client.listMembers(channel.id);
  if (!members.success) {
    logger.warn('Could not list channel members, keeping channel', {
      errorCode: members.error.code,
      errorCategory: members.error.category,
    });
    return record(channel, keepVerdict('data unavailable'), 'none', members.error.message);
  }

  const memberDomains = await resolveMemberDomains(members.value, directory);
  const activityAgeMs =
    policy.inactivityThresholdDays === null
      ? null
      : await fetchActivityAge(channel, policy, client, now);

  const verdict = classifyChannel({ isArchived: false, activityAgeMs, memberDomains }, policy);
  logger.debug(`Classified as ${verdict.kind}: ${verdict.reason}`, {
    memberCount: members.value.length,
    memberDomains: verdict.memberDomains,
  });

  if (!isArchiveVerdict(verdict)) {
    return record(channel, verdict, 'none');
  }

  if (!policy.live) {
    logger.info(`Dry run: would archive #${channel.name ?? channel.id} (${verdict.reason})`);
    return record(channel, verdict, 'simulated');
  }

  const archived = await client.archiveChannel(channel.id);
  if (!archived.success) {
    logger.error(`Failed to archive #${channel.name ?? channel.id}`, archived.error, {
      errorCategory: archived.error.category,
    });
    return record(channel, verdict, 'failed', archived.error.message);
  }

  logger.info(`Archived #${channel.name ?? channel.id} (${verdict.reason})`);
  return record(channel, verdict, 'archived');
}

/**
 * Classify every channel in the workspace and archive the eligible ones.
 *
 * Channels are handled one at a time in the order Slack lists them, so archive calls never
 * overlap. A failure on one channel becomes a `failed` (archive) or `data unavailable`
 * (member listing) record and the run carries on. Only a failure to list channels rejects.
 *
 * @param now - clock used to age the last message; fixed in tests for repeatable verdicts
 */
export async function archiveChannels(
  policy: ArchivePolicy,
  client: ArchiverClient,
  directory: DomainResolver,
  now: () => number = Date.now
): Promise<RunResultRecord[]> {
  const channels = await client.listChannels({ includePrivate: policy.includePrivate });
  if (!channels.success) {
    throw channels.error;
  }

  logger.info(`Found ${channels.value.length} channels to evaluate`, {
    totalChannels: channels.value.length,
    live: policy.live,
  });

  const startedAt = now();
  const records: RunResultRecord[] = [];
  for (const channel of channels.value) {
    const result = await LogContext.run({ channelId: channel.id }, () =>
      processChannel(channel, policy, client, directory, startedAt)
    );
    records.push(result);
  }

  return records;
}
