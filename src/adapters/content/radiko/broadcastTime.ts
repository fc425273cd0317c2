const JST_OFFSET_MS = 9 * 60 * 60 * 1000;
/** A broadcast day runs 05:00 to 29:00 local time. */
const BROADCAST_DAY_START_MS = 5 * 60 * 60 * 1000;

const pad = (value: number) => String(value).padStart(2, '0');

/**
 * Broadcast-day key (`YYYYMMDD`, JST) for an instant: 02:00 on the 2nd still belongs to the 1st.
 */
export function broadcastDateKey(now: number): string {
  const local = new Date(now + JST_OFFSET_MS - BROADCAST_DAY_START_MS);
  return `${local.getUTCFullYear()}${pad(local.getUTCMonth() + 1)}${pad(local.getUTCDate())}`;
}

/** Parses `YYYYMMDDHHmmss` in JST; null when malformed. */
export function parseJstTimestamp(raw: string): number | null {
  const match = raw.trim().match(/^(\d{4})(\d{2})(\d{2})(\d{2})(\d{2})(\d{2})$/);
  if (!match) {
    return null;
  }
  const [, year, month, day, hour, minute, second] = match.map(Number);
  return Date.UTC(year, month - 1, day, hour, minute, second) - JST_OFFSET_MS;
}
