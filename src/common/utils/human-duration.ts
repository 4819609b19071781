const UNIT_MS = { s: 1_000, m: 60_000, h: 60 * 60_000, d: 24 * 60 * 60_000 } as const;

/** "30s", "5m", "2h", "1d" → milliseconds. */
export function parseHumanDuration(s: string): number {
  const m = String(s ?? '').trim().match(/^(\d+)\s*([smhd])$/i);
  if (!m) throw new RangeError('Duration must look like "30s", "5m", "2h", or "1d"');
  const unit = m[2].toLowerCase();
  if (unit !== 's' && unit !== 'm' && unit !== 'h' && unit !== 'd') throw new RangeError('Unsupported time unit');
  return parseInt(m[1], 10) * UNIT_MS[unit];
}
