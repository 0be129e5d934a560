/**
 * Current time as Unix epoch seconds, the unit stored in the audit and log tables
 */
export function nowSeconds(): number {
  return Date.now() / 1000;
}

/**
 * Local calendar date as YYYYMMDD
 */
export function formatDateKey(date: Date): string {
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${year}${month}${day}`;
}

/**
 * Timestamp string for filenames (YYYYMMDD-HHMMSS)
 */
export function getTimestamp(now: Date = new Date()): string {
  const hours = String(now.getHours()).padStart(2, '0');
  const minutes = String(now.getMinutes()).padStart(2, '0');
  const seconds = String(now.getSeconds()).padStart(2, '0');
  return `${formatDateKey(now)}-${hours}${minutes}${seconds}`;
}

/**
 * Local clock time in 12-hour format without a leading zero (9:05 AM)
 */
export function formatClockTime(date: Date): string {
  const hours24 = date.getHours();
  const period = hours24 >= 12 ? 'PM' : 'AM';
  let hours = hours24 % 12;
  if (hours === 0) {
    hours = 12;
  }
  const minutes = String(date.getMinutes()).padStart(2, '0');
  return `${hours}:${minutes} ${period}`;
}
