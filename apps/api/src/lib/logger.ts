/**
 * Pino Logger Instance
 *
 * Structured JSON logging, mirrored into the activity log the dashboard reads.
 */

import { createRootLogger, type Logger } from '@seedsync/utils';
import type { AppConfig } from '../config/index.js';

export function createApiLogger(config: AppConfig): Logger {
  return createRootLogger({
    service: 'seedsync-api',
    level: config.logLevel,
    env: config.nodeEnv,
    activityLogPath: config.nodeEnv === 'test' ? undefined : config.activityLogPath,
  });
}
