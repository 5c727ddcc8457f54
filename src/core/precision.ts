export function roundTo(value: number, decimals: number): number {
  const factor = Math.pow(10, decimals);
  return Math.round(value * factor) / factor;
}

/** Relative comparison; two values within `tolerance` of the larger magnitude are equal. */
export function withinTolerance(a: number, b: number, tolerance: number): boolean {
  if (a === b) return true;
  const scale = Math.max(Math.abs(a), Math.abs(b));
  return Math.abs(a - b) <= tolerance * scale;
}

/** Raw integer amount → human units. */
export function rawToHuman(raw: string | number, decimals: number): number {
  const n = typeof raw === 'string' ? Number(raw) : raw;
  if (!Number.isFinite(n) || n === 0) return 0;
  return n / Math.pow(10, decimals);
}
