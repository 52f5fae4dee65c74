import type { LogEvent } from "../session/types";

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

/** `[YYYY-MM-DD HH:mm:ss] [LEVEL] message`, local time. */
export function formatLogLine(event: LogEvent): string {
  return `[${formatTimestamp(event.timestamp)}] [${event.level.toUpperCase()}] ${event.message}`;
}

/** Rendered lines, newest first. */
export function renderLogLines(events: readonly LogEvent[]): string[] {
  return events.map(formatLogLine).reverse();
}
