/** Rounds half away from zero to `digits` decimal places. */
export function roundTo(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round((value + Math.sign(value) * Number.EPSILON) * factor) / factor;
}

/** `part / total` as a percentage with two decimals; 0 when `total` is 0. */
export function percentage(part: number, total: number): number {
  return total > 0 ? roundTo((part / total) * 100, 2) : 0;
}

/**
 * Aggregates come back as numbers from SQLite and as strings from
 * PostgreSQL (COUNT is a bigint, AVG a numeric).
 */
export function toNumberOrNull(value: string | number | null | undefined): number | null {
  return value === null || value === undefined ? null : Number(value);
}
