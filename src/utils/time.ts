function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

/** Local calendar day, `YYYY-MM-DD`; names daily activity logs */
export function dayStamp(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

/** Local time, `YYYYMMDD_HHMMSS`; names snapshot files; sorts chronologically */
export function fileStamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}
