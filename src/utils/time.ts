/**
 * Format a date as "YYYY-MM-DD HH:MM:SS" in UTC
 */
export function formatTimestamp(date: Date): string {
  return date.toISOString().replace('T', ' ').slice(0, 19);
}

/**
 * Parse a feed date string; returns null when it is missing or unparseable
 */
export function parseDate(value: string | undefined | null): Date | null {
  if (!value?.trim()) {
    return null;
  }
  const date = new Date(value.trim());
  return Number.isNaN(date.getTime()) ? null : date;
}
