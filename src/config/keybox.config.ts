// Fixed policy: not configurable per device.
export const HEARTBEAT_ONLINE_WINDOW_MS = 30_000;

// Matches the controller poll interval (commands older than this are ignored).
export const COMMAND_RECENCY_WINDOW_MS = 5_000;

export const DEFAULT_TIME_ZONE = 'Asia/Manila';

/** Injection token for the IANA zone used to read weekdays and times of day. */
export const KEYBOX_TIME_ZONE = 'KEYBOX_TIME_ZONE';

export function resolveTimeZone(raw = process.env.KEYBOX_TIME_ZONE) {
  const tz = String(raw ?? '').trim();
  if (!tz) return DEFAULT_TIME_ZONE;

  try {
    new Intl.DateTimeFormat('en-US', { timeZone: tz });
    return tz;
  } catch {
    throw new Error(`Invalid KEYBOX_TIME_ZONE: "${tz}" is not an IANA time zone`);
  }
}
