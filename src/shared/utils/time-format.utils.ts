/**
 * Shared time formatting utilities.
 */

function pad2(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Formats a date as a local-time file name stamp.
 * Example: 2024-01-15 14:30:45 -> "20240115_143045"
 */
export function formatFileTimestamp(date: Date): string {
  const day = `${date.getFullYear()}${pad2(date.getMonth() + 1)}${pad2(date.getDate())}`;
  const time = `${pad2(date.getHours())}${pad2(date.getMinutes())}${pad2(date.getSeconds())}`;
  return `${day}_${time}`;
}
