const MS_PER_SECOND = 1000;
const SECONDS_PER_MINUTE = 60;
const SECONDS_PER_HOUR = 3600;

function pad2(value: number): string {
  return String(value).padStart(2, "0");
}

/** Formats a millisecond offset as `HH:MM:SS`, truncating sub-second parts. */
export function msToTimeStr(ms: number): string {
  const totalSeconds = Math.max(0, Math.floor(ms / MS_PER_SECOND));
  const hours = Math.floor(totalSeconds / SECONDS_PER_HOUR);
  const minutes = Math.floor((totalSeconds % SECONDS_PER_HOUR) / SECONDS_PER_MINUTE);
  const seconds = totalSeconds % SECONDS_PER_MINUTE;
  return `${pad2(hours)}:${pad2(minutes)}:${pad2(seconds)}`;
}

export function minutesToMs(minutes: number): number {
  return Math.round(minutes * SECONDS_PER_MINUTE * MS_PER_SECOND);
}

export function formatDuration(ms: number): string {
  const totalSeconds = Math.max(0, Math.round(ms / MS_PER_SECOND));
  if (totalSeconds < SECONDS_PER_MINUTE) {
    return `${totalSeconds}s`;
  }
  const hours = Math.floor(totalSeconds / SECONDS_PER_HOUR);
  const minutes = Math.floor((totalSeconds % SECONDS_PER_HOUR) / SECONDS_PER_MINUTE);
  if (hours === 0) {
    return `${minutes}m ${totalSeconds % SECONDS_PER_MINUTE}s`;
  }
  return `${hours}h ${minutes}m`;
}
