/**
 * Channel archiver logger, backed by the backend-common winston setup.
 * Use LogContext.run() to tag entries with the run and channel being processed.
 */

import { createLogger, LogContext, ContextAwareLogger } from '@channel-sweeper/backend-common';

export const logger = new ContextAwareLogger(createLogger('channel-archiver'));

export { LogContext };
