export function nowUtcIsoSeconds(date: Date = new Date()): string {
  const iso = date.toISOString();
  return iso.replace(/\.\d{3}Z$/, "Z");
}

/** Renders a duration as `H:MM:SS.mmm`. */
export function formatDuration(ms: number): string {
  const clamped = Math.max(0, Math.round(ms));
  const hours = Math.floor(clamped / 3_600_000);
  const minutes = Math.floor((clamped % 3_600_000) / 60_000);
  const seconds = Math.floor((clamped % 60_000) / 1000);
  const millis = clamped % 1000;
  const pad = (value: number, width: number) => String(value).padStart(width, "0");
  return `${hours}:${pad(minutes, 2)}:${pad(seconds, 2)}.${pad(millis, 3)}`;
}
