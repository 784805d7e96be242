// ---------------------------------------------------------------------------
// Date formatting in the shapes the Control Panel API expects (UTC).
// ---------------------------------------------------------------------------

const pad = (n: number): string => String(n).padStart(2, "0");

/** `YYYY-MM-DD` */
export function formatApiDate(date: Date): string {
  return `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}`;
}

/** `YYYY-MM-DD HH:mm:ss` */
export function formatApiDateTime(date: Date): string {
  return (
    `${formatApiDate(date)} ` +
    `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`
  );
}
