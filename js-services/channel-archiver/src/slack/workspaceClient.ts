import { WebClient } from '@slack/web-api';
import type { z } from 'zod';
import { RemoteError, type RemoteResult } from '../errors';
import type { Channel, ChannelMessage, WorkspaceUser } from '../types';
import { logger } from '../utils/logger';
import {
  ChannelRowSchema,
  ConversationsHistoryPageSchema,
  ConversationsListPageSchema,
  ConversationsMembersPageSchema,
  MessageRowSchema,
  UserInfoSchema,
} from './schemas';
import { rateLimitRetryAfter, toRemoteError } from './slackErrors';

/**
 * The Web API methods the archiver calls. A WebClient satisfies it; tests pass a fake.
 */
export type SlackApi = {
  conversations: Pick<WebClient['conversations'], 'list' | 'members' | 'history' | 'archive' | 'join'>;
  users: Pick<WebClient['users'], 'info'>;
};

export interface WorkspaceClientOptions {
  /** Rate-limit retries per request before giving up (default 5) */
  maxRateLimitRetries?: number;
  /** Page size for listing calls (default 200) */
  pageSize?: number;
  sleep?: (ms: number) => Promise<void>;
}

export interface ListChannelsOptions {
  includePrivate: boolean;
}

interface Page<T> {
  items: T[];
  nextCursor: string | undefined;
}

const defaultSleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

export const createWebClient = (token: string): WebClient => {
  return new WebClient(token, {
    // Network and 5xx retries stay short and inside the client
    retryConfig: {
      retries: 2,
      maxTimeout: 5000,
      maxRetryTime: 5000,
    },
    // Rate limits surface as errors so WorkspaceClient can honour Retry-After itself
    rejectRateLimitedCalls: true,
  });
};

function parseResponse<T>(
  method: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  response: unknown
): T {
  const parsed = schema.safeParse(response);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const detail = issue ? `${issue.path.join('.') || 'response'}: ${issue.message}` : 'invalid';
    throw new RemoteError('unknown', 'invalid_response', `${method} returned ${detail}`);
  }
  return parsed.data;
}

function toChannel(row: unknown): Channel | null {
  const parsed = ChannelRowSchema.safeParse(row);
  if (!parsed.success) {
    return null;
  }
  const channel = parsed.data;
  return {
    id: channel.id,
    name: channel.name ?? null,
    createdAt: channel.created === undefined ? null : new Date(channel.created * 1000),
    isArchived: channel.is_archived ?? null,
    isPrivate: channel.is_private ?? null,
  };
}

function toMessage(row: unknown): ChannelMessage | null {
  const parsed = MessageRowSchema.safeParse(row);
  if (!parsed.success) {
    return null;
  }
  return {
    ts: parsed.data.ts,
    postedAt: new Date(Number(parsed.data.ts) * 1000),
    subtype: parsed.data.subtype ?? null,
  };
}

/**
 * Slack workspace access for the archiver.
 *
 * Every listing call follows `next_cursor` until it is empty. Rate-limited requests are
 * retried after the server's Retry-After interval; any other failure comes back as a
 * `{ success: false, error }` result carrying a RemoteError, so callers decide per channel
 * whether to continue.
 */
export class WorkspaceClient {
  private readonly maxRateLimitRetries: number;
  private readonly pageSize: number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly api: SlackApi,
    options: WorkspaceClientOptions = {}
  ) {
    this.maxRateLimitRetries = options.maxRateLimitRetries ?? 5;
    this.pageSize = options.pageSize ?? 200;
    this.sleep = options.sleep ?? defaultSleep;
  }

  listChannels(options: ListChannelsOptions): Promise<RemoteResult<Channel[]>> {
    const method = 'conversations.list';
    const types = options.includePrivate ? 'public_channel,private_channel' : 'public_channel';

    return this.attempt(method, () =>
      this.paginate(method, async (cursor) => {
        const response = await this.call(method, () =>
          this.api.conversations.list({
            types,
            exclude_archived: true,
            limit: this.pageSize,
            cursor,
          })
        );
        const page = parseResponse(method, ConversationsListPageSchema, response);
        const channels: Channel[] = [];
        for (const row of page.channels) {
          const channel = toChannel(row);
          if (channel) {
            channels.push(channel);
          } else {
            logger.debug('Skipping channel row without an id', { operation: method });
          }
        }
        return { items: channels, nextCursor: page.response_metadata?.next_cursor };
      })
    );
  }

  listMembers(channelId: string): Promise<RemoteResult<string[]>> {
    const method = 'conversations.members';

    return this.attempt(method, () =>
      this.paginate(method, async (cursor) => {
        const response = await this.call(method, () =>
          this.api.conversations.members({ channel: channelId, limit: this.pageSize, cursor })
        );
        const page = parseResponse(method, ConversationsMembersPageSchema, response);
        return { items: page.members, nextCursor: page.response_metadata?.next_cursor };
      })
    );
  }

  /**
   * Most recent messages first, at most `limit` of them (a single page)
   */
  fetchRecentMessages(channelId: string, limit: number): Promise<RemoteResult<ChannelMessage[]>> {
    const method = 'conversations.history';

    return this.attempt(method, async () => {
      const response = await this.call(method, () =>
        this.api.conversations.history({ channel: channelId, limit })
      );
      const page = parseResponse(method, ConversationsHistoryPageSchema, response);
      return page.messages
        .map(toMessage)
        .filter((message): message is ChannelMessage => message !== null);
    });
  }

  resolveUser(userId: string): Promise<RemoteResult<WorkspaceUser>> {
    const method = 'users.info';

    return this.attempt(method, async () => {
      const response = await this.call(method, () => this.api.users.info({ user: userId }));
      const { user } = parseResponse(method, UserInfoSchema, response);
      return {
        id: user.id,
        email: user.profile?.email || null,
        isBot: user.is_bot === true,
        isDeleted: user.deleted === true,
      };
    });
  }

  archiveChannel(channelId: string): Promise<RemoteResult<void>> {
    const method = 'conversations.archive';

    return this.attempt(method, async () => {
      await this.call(method, () => this.api.conversations.archive({ channel: channelId }));
    });
  }

  joinChannel(channelId: string): Promise<RemoteResult<void>> {
    const method = 'conversations.join';

    return this.attempt(method, async () => {
      await this.call(method, () => this.api.conversations.join({ channel: channelId }));
    });
  }

  private async attempt<T>(method: string, operation: () => Promise<T>): Promise<RemoteResult<T>> {
    try {
      return { success: true, value: await operation() };
    } catch (error) {
      return { success: false, error: toRemoteError(method, error) };
    }
  }

  private async paginate<T>(
    method: string,
    fetchPage: (cursor: string | undefined) => Promise<Page<T>>
  ): Promise<T[]> {
    const items: T[] = [];
    let cursor: string | undefined;

    do {
      const page = await fetchPage(cursor);
      items.push(...page.items);
      cursor = page.nextCursor || undefined;

      if (cursor) {
        logger.debug(`Fetched ${page.items.length} items from ${method}, continuing`, {
          operation: method,
          batchSize: page.items.length,
        });
      }
    } while (cursor);

    return items;
  }

  private async call<T>(method: string, request: () => Promise<T>): Promise<T> {
    for (let retries = 0; ; retries++) {
      try {
        return await request();
      } catch (error) {
        const retryAfter = rateLimitRetryAfter(error);
        if (retryAfter === null) {
          throw toRemoteError(method, error);
        }
        if (retries >= this.maxRateLimitRetries) {
          throw new RemoteError(
            'rate_limited',
            'ratelimited',
            `${method} still rate limited after ${retries} retries`
          );
        }

        logger.warn(`Rate limited on ${method}, retrying in ${retryAfter}s`, {
          operation: method,
          retryAfter,
          attempt: retries + 1,
        });
        await this.sleep(retryAfter * 1000);
      }
    }
  }
}
