/** Current time as an ISO-8601 UTC string. Stored timestamps always use this. */
export function utcNowIso(): string {
  return new Date().toISOString();
}

/** e.g. "2025-01-01 12:34 UTC". Unparseable input is returned unchanged. */
export function formatTimestampForDisplay(iso: string): string {
  const date = new Date(iso);
  if (Number.isNaN(date.getTime())) return iso;
  // toISOString is always YYYY-MM-DDTHH:MM:SS.sssZ
  const [day, time] = date.toISOString().split("T");
  return `${day} ${time.slice(0, 5)} UTC`;
}
