import type { Clock } from "./types.js";

export const systemClock: Clock = {
  now: () => new Date(),
};

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/**
 * Format a date as `YYYY-MM-DD HH:MM:SS` in UTC shifted by `offsetMinutes`
 */
export function formatSqlDate(date: Date, offsetMinutes = 0): string {
  const shifted = new Date(date.getTime() + offsetMinutes * 60_000);
  return (
    `${shifted.getUTCFullYear()}-${pad(shifted.getUTCMonth() + 1)}-${pad(shifted.getUTCDate())} ` +
    `${pad(shifted.getUTCHours())}:${pad(shifted.getUTCMinutes())}:${pad(shifted.getUTCSeconds())}`
  );
}
