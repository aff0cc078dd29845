import { ErrorCode } from '@slack/web-api';
import { RemoteError, categorizeHttpStatus, categorizePlatformError, errorMessage } from '../errors';

function hasCode(error: unknown): error is Error & { code: unknown } {
  return error instanceof Error && 'code' in error;
}

/**
 * Seconds to wait when the error is a Slack rate-limit rejection, otherwise null.
 * Requires the WebClient to be created with `rejectRateLimitedCalls: true`.
 */
export function rateLimitRetryAfter(error: unknown): number | null {
  if (!hasCode(error) || error.code !== ErrorCode.RateLimitedError) {
    return null;
  }
  const retryAfter = 'retryAfter' in error ? error.retryAfter : undefined;
  return typeof retryAfter === 'number' && retryAfter >= 0 ? retryAfter : 1;
}

function platformErrorCode(error: Error): string | null {
  if (!('data' in error) || typeof error.data !== 'object' || error.data === null) {
    return null;
  }
  const code = 'error' in error.data ? error.data.error : undefined;
  return typeof code === 'string' ? code : null;
}

/**
 * Map any error thrown by a Web API call to a RemoteError
 */
export function toRemoteError(method: string, error: unknown): RemoteError {
  if (error instanceof RemoteError) {
    return error;
  }

  if (hasCode(error)) {
    if (error.code === ErrorCode.PlatformError) {
      const code = platformErrorCode(error) ?? 'unknown_error';
      return new RemoteError(categorizePlatformError(code), code, `${method} failed: ${code}`);
    }

    if (error.code === ErrorCode.HTTPError) {
      const status = 'statusCode' in error && typeof error.statusCode === 'number' ? error.statusCode : 0;
      return new RemoteError(
        categorizeHttpStatus(status),
        `http_${status}`,
        `${method} failed with HTTP ${status}`
      );
    }

    if (error.code === ErrorCode.RateLimitedError) {
      return new RemoteError('rate_limited', 'ratelimited', `${method} is rate limited`);
    }
  }

  return new RemoteError('unknown', 'request_failed', `${method} failed: ${errorMessage(error)}`);
}
