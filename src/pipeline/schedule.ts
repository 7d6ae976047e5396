import { seoulParts } from '../utils/time';

export const PROD_INTERVAL_MINUTES = 10;
export const DEV_INTERVAL_MINUTES = 2;

const WORK_START_HOUR = 8;
const WORK_END_HOUR = 21;

export function intervalMinutes(isProd: boolean): number {
  return isProd ? PROD_INTERVAL_MINUTES : DEV_INTERVAL_MINUTES;
}

/** Monday to Saturday, 08:00 to 20:59 Seoul time */
export function isWithinWorkingHours(now: Date): boolean {
  const { weekday, hour } = seoulParts(now);
  return weekday !== 0 && hour >= WORK_START_HOUR && hour < WORK_END_HOUR;
}

/** Outside production every cycle runs */
export function shouldRunCycle(now: Date, isProd: boolean): boolean {
  return !isProd || isWithinWorkingHours(now);
}
