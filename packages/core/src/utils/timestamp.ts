function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Formats a local time as `YYYY-MM-DD_HH-mm-ss`, safe for file names.
 */
export function formatTimestamp(date: Date = new Date()): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}-${pad(date.getMinutes())}-${pad(date.getSeconds())}`;
  return `${day}_${time}`;
}
