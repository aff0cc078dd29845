export type RemoteErrorCategory =
  | 'auth'
  | 'permission'
  | 'not_found'
  | 'conflict'
  | 'rate_limited'
  | 'unknown';

/**
 * A Slack Web API failure that is not retried
 */
export class RemoteError extends Error {
  constructor(
    public readonly category: RemoteErrorCategory,
    public readonly code: string,
    message: string
  ) {
    super(message);
    this.name = 'RemoteError';
  }
}

/**
 * Invalid command line or policy input, raised before any API call
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export type RemoteResult<T> = { success: true; value: T } | { success: false; error: RemoteError };

const PLATFORM_ERROR_CATEGORIES: Record<string, RemoteErrorCategory> = {
  not_authed: 'auth',
  invalid_auth: 'auth',
  account_inactive: 'auth',
  token_revoked: 'auth',
  token_expired: 'auth',
  missing_scope: 'permission',
  not_in_channel: 'permission',
  no_permission: 'permission',
  restricted_action: 'permission',
  cant_archive_general: 'permission',
  cant_archive_required: 'permission',
  method_not_supported_for_channel_type: 'permission',
  ekm_access_denied: 'permission',
  channel_not_found: 'not_found',
  user_not_found: 'not_found',
  user_not_visible: 'not_found',
  already_archived: 'conflict',
  is_archived: 'conflict',
  ratelimited: 'rate_limited',
};

const HTTP_STATUS_CATEGORIES: Record<number, RemoteErrorCategory> = {
  401: 'auth',
  403: 'permission',
  404: 'not_found',
  409: 'conflict',
  429: 'rate_limited',
};

export function categorizePlatformError(code: string): RemoteErrorCategory {
  return PLATFORM_ERROR_CATEGORIES[code] ?? 'unknown';
}

export function categorizeHttpStatus(status: number): RemoteErrorCategory {
  return HTTP_STATUS_CATEGORIES[status] ?? 'unknown';
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
