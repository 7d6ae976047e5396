import { z } from 'zod';
import { toErrorMessage } from '../utils/errors';
import { logger as rootLogger, type Logger } from '../utils/logger';
import type { NotificationSink } from './types';

export const SLACK_POST_MESSAGE_URL = 'https://slack.com/api/chat.postMessage';

const slackResponse = z.object({
  ok: z.boolean(),
  error: z.string().optional(),
});

export interface SlackNotificationOptions {
  botToken: string;
  channelId: string;
  timeoutMs?: number;
  logger?: Logger;
}

/**
 * Posts alerts to a channel with a bot token via chat.postMessage.
 */
export class SlackNotificationSink implements NotificationSink {
  private readonly logger: Logger;

  constructor(private readonly options: SlackNotificationOptions) {
    this.logger = options.logger ?? rootLogger.child('[slack]');
  }

  async notify(message: string, sourceId: string): Promise<boolean> {
    try {
      const response = await fetch(SLACK_POST_MESSAGE_URL, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json; charset=utf-8',
          Authorization: `Bearer ${this.options.botToken}`,
        },
        body: JSON.stringify({ channel: this.options.channelId, text: message }),
        signal: AbortSignal.timeout(this.options.timeoutMs ?? 10_000),
      });

      if (!response.ok) {
        this.logger.warn(`Slack returned HTTP ${response.status} for ${sourceId} alert`);
        return false;
      }

      const payload = slackResponse.safeParse(await response.json());
      if (!payload.success || !payload.data.ok) {
        const reason = payload.success ? payload.data.error : 'malformed response';
        this.logger.warn(`Slack rejected ${sourceId} alert: ${reason ?? 'unknown error'}`);
        return false;
      }

      return true;
    } catch (error) {
      this.logger.error(`Failed to send Slack alert for ${sourceId}`, toErrorMessage(error));
      return false;
    }
  }
}
