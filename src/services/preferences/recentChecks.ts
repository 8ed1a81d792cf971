import type { RecentCheckRecord } from '../../domain/contracts';

export const RECENT_CHECKS_LIMIT = 10;

export function prependRecentCheck(
  history: RecentCheckRecord[],
  record: RecentCheckRecord,
  limit = RECENT_CHECKS_LIMIT,
): RecentCheckRecord[] {
  return [record, ...history].slice(0, limit);
}
