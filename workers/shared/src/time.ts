export function toIsoTimestamp(value: Date): string {
  return value.toISOString();
}

export function formatRunBanner(now: Date = new Date()): string {
  return now.toISOString().slice(0, 19).replace("T", " ");
}
