// Recorder timestamp tokens, always UTC: yyyy-MM-ddTHHmmss.zzzZ and its parts.

export function formatUtcDate(input: Date = new Date()): string {
  return `${pad(input.getUTCFullYear(), 4)}-${pad(input.getUTCMonth() + 1)}-${pad(input.getUTCDate())}`;
}

export function formatUtcTime(input: Date = new Date()): string {
  const clock = `${pad(input.getUTCHours())}${pad(input.getUTCMinutes())}${pad(input.getUTCSeconds())}`;
  return `${clock}.${pad(input.getUTCMilliseconds(), 3)}Z`;
}

export function formatUtcDateTime(input: Date = new Date()): string {
  return `${formatUtcDate(input)}T${formatUtcTime(input)}`;
}

function pad(value: number, width = 2): string {
  return value.toString().padStart(width, "0");
}
