function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/**
 * Formats as "YYYY-MM-DD HH:mm:ss" in server-local time, the format the
 * chat history and concern log display.
 */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}
