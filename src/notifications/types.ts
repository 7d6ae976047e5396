/**
 * Best-effort alert channel. `notify` resolves to false on delivery failure
 * and never rejects.
 */
export interface NotificationSink {
  notify(message: string, sourceId: string): Promise<boolean>;
}
