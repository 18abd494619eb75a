const MINUTES_PER_DAY = 24 * 60;

/** Parses the leading integer of a string; anything unparseable counts as 0. */
export function parseLenientInt(value: string): number {
  const parsed = parseInt(value.trim(), 10);
  return Number.isFinite(parsed) ? parsed : 0;
}

/**
 * Wall-clock arrival for a journey leaving at `hour:minute` and reaching a stop
 * `offsetMinutes` later. Fractional offsets are truncated toward zero and the
 * result wraps around midnight.
 */
export function calculateArrivalTime(hour: string, minute: string, offsetMinutes: number): string {
  const total = parseLenientInt(hour) * 60 + parseLenientInt(minute) + Math.trunc(offsetMinutes);
  const wrapped = ((total % MINUTES_PER_DAY) + MINUTES_PER_DAY) % MINUTES_PER_DAY;
  const hours = String(Math.floor(wrapped / 60)).padStart(2, "0");
  const minutes = String(wrapped % 60).padStart(2, "0");
  return `${hours}:${minutes}`;
}
