import { describe, test, expect } from '@jest/globals';
import { RemoteError } from '../errors';
import { rateLimitRetryAfter, toRemoteError } from '../slack/slackErrors';
import { httpError, platformError, rateLimitedError } from './helpers/fakeSlackApi';

describe('rateLimitRetryAfter', () => {
  test('reads the Retry-After seconds of a rate-limit rejection', () => {
    expect(rateLimitRetryAfter(rateLimitedError(12))).toBe(12);
  });

  test('is null for every other error', () => {
    expect(rateLimitRetryAfter(platformError('ratelimited'))).toBeNull();
    expect(rateLimitRetryAfter(new Error('socket hang up'))).toBeNull();
    expect(rateLimitRetryAfter('rate limited')).toBeNull();
  });
});

describe('toRemoteError', () => {
  test('categorizes platform errors by their Slack error code', () => {
    expect(toRemoteError('conversations.archive', platformError('already_archived'))).toMatchObject({
      category: 'conflict',
      code: 'already_archived',
      message: 'conversations.archive failed: already_archived',
    });
    expect(toRemoteError('users.info', platformError('fatal_error'))).toMatchObject({
      category: 'unknown',
      code: 'fatal_error',
    });
  });

  test('categorizes HTTP errors by status', () => {
    expect(toRemoteError('conversations.list', httpError(403))).toMatchObject({
      category: 'permission',
      code: 'http_403',
      message: 'conversations.list failed with HTTP 403',
    });
  });

  test('wraps unexpected errors', () => {
    expect(toRemoteError('conversations.join', new Error('socket hang up'))).toMatchObject({
      category: 'unknown',
      code: 'request_failed',
      message: 'conversations.join failed: socket hang up',
    });
  });

  test('passes RemoteError through unchanged', () => {
    const error = new RemoteError('auth', 'invalid_auth', 'bad token');

    expect(toRemoteError('conversations.list', error)).toBe(error);
  });
});
