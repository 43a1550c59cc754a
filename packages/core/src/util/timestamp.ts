function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

/** Local time as `YYYYMMDD_HHMMSS` */
export function formatRunTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}
