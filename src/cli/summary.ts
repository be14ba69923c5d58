// ============================================================
// Shape Scatter - Summary Reporter
// ============================================================

/** Local wall-clock time as HH:MM:SS. */
export function formatClock(epochMs: number): string {
  const d = new Date(epochMs);
  return [d.getHours(), d.getMinutes(), d.getSeconds()]
    .map((n) => String(n).padStart(2, '0'))
    .join(':');
}

/** `09:00:00 - 09:00:05 - 5.0 - 42` */
export function formatSummary(startedAt: number, endedAt: number, count: number): string {
  const elapsed = ((endedAt - startedAt) / 1000).toFixed(1);
  return `${formatClock(startedAt)} - ${formatClock(endedAt)} - ${elapsed} - ${count}`;
}
