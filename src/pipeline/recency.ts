import type { Notice, SourceDefinition } from '../types/notice';
import { DAY_MS } from '../utils/time';

export interface RecencySettings {
  recencyWindowDays: number;
  windowOverrides: Readonly<Record<string, number>>;
}

/** Inclusive: a notice exactly `windowDays` old is still recent */
export function isRecent(notice: Notice, windowDays: number, now: Date): boolean {
  return notice.published.getTime() >= now.getTime() - windowDays * DAY_MS;
}

/** Env override, then the source definition, then the run default */
export function windowFor(definition: SourceDefinition, settings: RecencySettings): number {
  return settings.windowOverrides[definition.id] ?? definition.windowDays ?? settings.recencyWindowDays;
}
