/** Fields that decide which copy of a stored row wins. */
export interface Versioned {
  readonly version_at: Date;
  readonly is_backfilled: boolean;
}

/**
 * Last-write-wins by version timestamp. On a tie a live copy wins, so a
 * backfilled copy only replaces another backfilled copy.
 */
export function supersedes(next: Versioned, current: Versioned): boolean {
  const diff = next.version_at.getTime() - current.version_at.getTime();
  if (diff !== 0) return diff > 0;
  return !next.is_backfilled || current.is_backfilled;
}
