const pad = (value: number) => String(value).padStart(2, '0');

/** Local calendar date as `YYYY-MM-DD`. */
export function toIsoDate(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

export function today(): string {
  return toIsoDate(new Date());
}

/** The calendar date `days` before `date` (`YYYY-MM-DD` in, `YYYY-MM-DD` out). */
export function daysBefore(date: string, days: number): string {
  const [year, month, day] = date.split('-').map(Number);
  return toIsoDate(new Date(year, month - 1, day - days));
}
