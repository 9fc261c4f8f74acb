/**
 * Date formatting utilities for Signature V4
 */

/**
 * Format date as YYYYMMDD
 */
export function formatDateStamp(date: Date): string {
  const year = date.getUTCFullYear();
  const month = String(date.getUTCMonth() + 1).padStart(2, '0');
  const day = String(date.getUTCDate()).padStart(2, '0');
  return `${year}${month}${day}`;
}

/**
 * Format date as YYYYMMDDTHHmmssZ (ISO 8601 basic format)
 */
export function formatAmzDate(date: Date): string {
  const hours = String(date.getUTCHours()).padStart(2, '0');
  const minutes = String(date.getUTCMinutes()).padStart(2, '0');
  const seconds = String(date.getUTCSeconds()).padStart(2, '0');
  return `${formatDateStamp(date)}T${hours}${minutes}${seconds}Z`;
}

const AMZ_DATE_PATTERN = /^(\d{4})(\d{2})(\d{2})T(\d{2})(\d{2})(\d{2})Z$/;

/**
 * Parse AMZ date string (YYYYMMDDTHHmmssZ) to Date object.
 * Returns undefined when the string is not in that format.
 */
export function parseAmzDate(amzDate: string): Date | undefined {
  const match = AMZ_DATE_PATTERN.exec(amzDate);
  if (!match) {
    return undefined;
  }
  const [, year, month, day, hours, minutes, seconds] = match;
  const date = new Date(
    Date.UTC(
      Number(year),
      Number(month) - 1,
      Number(day),
      Number(hours),
      Number(minutes),
      Number(seconds)
    )
  );
  return isNaN(date.getTime()) ? undefined : date;
}
