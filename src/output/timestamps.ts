const TIMESTAMP_FIELDS = ['created', 'updated'];

/**
 * Epoch milliseconds to an ISO-8601 UTC string with an explicit `+00:00` offset,
 * e.g. `2023-11-14T22:13:20+00:00`. A sub-second part is written as six-digit
 * microseconds and left out when zero. Values outside years 1-9999 come back
 * as their decimal string.
 */
export function toIso8601(timestampMs: number): string {
  const date = new Date(timestampMs);
  const year = date.getUTCFullYear();
  if (Number.isNaN(date.getTime()) || year < 1 || year > 9999) {
    return String(timestampMs);
  }
  const seconds = date.toISOString().slice(0, 19);
  const millis = date.getUTCMilliseconds();
  const fraction = millis === 0 ? '' : `.${String(millis * 1000).padStart(6, '0')}`;
  return `${seconds}${fraction}+00:00`;
}

/**
 * Recursively add `<field>_iso8601` next to every integer `created` / `updated`
 * field. Returns a copy; the input is not modified.
 */
export function addIsoTimestamps(data: unknown): unknown {
  if (Array.isArray(data)) {
    return data.map(item => addIsoTimestamps(item));
  }
  if (data === null || typeof data !== 'object') {
    return data;
  }

  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(data)) {
    result[key] = addIsoTimestamps(value);
  }
  for (const field of TIMESTAMP_FIELDS) {
    const value = result[field];
    if (typeof value === 'number' && Number.isInteger(value)) {
      result[`${field}_iso8601`] = toIso8601(value);
    }
  }
  return result;
}
