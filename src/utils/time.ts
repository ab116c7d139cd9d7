import { format } from 'date-fns';

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

// Calendar date in the machine's local timezone, which is what the inspector means by "today"
export function todayIso(clock: Clock = systemClock): string {
  return format(clock(), 'yyyy-MM-dd');
}

// Timestamp for audit columns: UTC ISO string, never earlier than `after` plus 1ms
export function nextTimestamp(clock: Clock, after?: string | null): string {
  const now = clock().getTime();
  const floor = after ? Date.parse(after) + 1 : -Infinity;
  return new Date(Math.max(now, floor)).toISOString();
}

// Compact stamp for file names, e.g. 20240710_153000
export function fileStamp(clock: Clock = systemClock): string {
  return format(clock(), 'yyyyMMdd_HHmmss');
}
