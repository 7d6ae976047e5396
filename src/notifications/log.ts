import { logger as rootLogger, type Logger } from '../utils/logger';
import type { NotificationSink } from './types';

/** Used when Slack is not configured */
export class LogNotificationSink implements NotificationSink {
  constructor(private readonly logger: Logger = rootLogger.child('[alert]')) {}

  async notify(message: string, sourceId: string): Promise<boolean> {
    this.logger.warn(`Alert for ${sourceId}:\n${message}`);
    return true;
  }
}
