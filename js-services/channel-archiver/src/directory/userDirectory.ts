import type { RemoteResult } from '../errors';
import type { WorkspaceUser } from '../types';
import { emailDomain } from '../utils/emailDomains';
import { logger } from '../utils/logger';

export interface UserLookup {
  resolveUser(userId: string): Promise<RemoteResult<WorkspaceUser>>;
}

// Slackbot is a member of every channel but is not reported as a bot
const SLACKBOT_USER_ID = 'USLACKBOT';

/**
 * Per-run memo of user id to email domain.
 *
 * The pending lookup is cached, so concurrent callers asking for the same user share one
 * request. Users that cannot be resolved, bots, deleted accounts and accounts without an
 * email map to null and take no part in domain matching.
 */
export class UserDirectory {
  private readonly domains = new Map<string, Promise<string | null>>();

  constructor(private readonly users: UserLookup) {}

  resolveDomain(userId: string): Promise<string | null> {
    const cached = this.domains.get(userId);
    if (cached) {
      return cached;
    }

    const pending = this.lookup(userId);
    this.domains.set(userId, pending);
    return pending;
  }

  get size(): number {
    return this.domains.size;
  }

  private async lookup(userId: string): Promise<string | null> {
    if (userId === SLACKBOT_USER_ID) {
      return null;
    }

    const result = await this.users.resolveUser(userId);
    if (!result.success) {
      logger.debug(`Could not resolve user ${userId}`, {
        userId,
        errorCode: result.error.code,
      });
      return null;
    }

    const user = result.value;
    if (user.isBot || user.isDeleted || !user.email) {
      return null;
    }
    return emailDomain(user.email);
  }
}
