import { INSPECTION_STATUSES, type InspectionRecord, type InspectionStatus, type StatusCounts } from '../types/inspection';

export function emptyStatusCounts(): StatusCounts {
  return { OK: 0, DUE_SOON: 0, OVERDUE: 0, total: 0 };
}

export function countByStatus(records: readonly { status: InspectionStatus }[]): StatusCounts {
  const counts = emptyStatusCounts();
  for (const r of records) {
    counts[r.status] += 1;
    counts.total += 1;
  }
  return counts;
}

// Counts per distinct value of a field, keys sorted for stable output
export function countBy<T, K extends keyof T>(records: readonly T[], key: K): [string, number][] {
  const map = new Map<string, number>();
  for (const r of records) {
    const k = String(r[key] ?? 'N/A');
    map.set(k, (map.get(k) ?? 0) + 1);
  }
  return [...map.entries()].sort(([a], [b]) => a.localeCompare(b));
}

export const STATUS_LABELS: Record<InspectionStatus, string> = {
  OK: 'Up to date',
  DUE_SOON: 'Due soon',
  OVERDUE: 'Overdue',
};

// Most urgent first: overdue, then due soon, then ok; ties by next date
export function sortByUrgency<T extends Pick<InspectionRecord, 'status' | 'nextInspectionDate' | 'id'>>(records: readonly T[]): T[] {
  const rank = (s: InspectionStatus) => INSPECTION_STATUSES.length - 1 - INSPECTION_STATUSES.indexOf(s);
  return [...records].sort(
    (a, b) => rank(a.status) - rank(b.status) || a.nextInspectionDate.localeCompare(b.nextInspectionDate) || a.id - b.id,
  );
}
