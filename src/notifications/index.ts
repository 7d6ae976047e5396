import type { EnvironmentConfig } from '../config/environment';
import { LogNotificationSink } from './log';
import { SlackNotificationSink } from './slack';
import type { NotificationSink } from './types';

export type { NotificationSink } from './types';
export { formatFailureAlert } from './alert';
export { SlackNotificationSink, SLACK_POST_MESSAGE_URL } from './slack';
export { LogNotificationSink } from './log';

export function createNotificationSink(config: EnvironmentConfig): NotificationSink {
  const { botToken, channelId } = config.slack;
  if (botToken && channelId) {
    return new SlackNotificationSink({ botToken, channelId });
  }
  return new LogNotificationSink();
}
