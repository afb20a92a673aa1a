// YouTrack results can carry integers past Number.MAX_SAFE_INTEGER. They are
// parsed to bigint so the pretty-printed result keeps every digit.

// String literals are matched first so digits inside them are never touched.
const TOKENS = /"(?:[^"\\]|\\.)*"|(?<![\d.eE+-])-?\d{16,}(?![\d.eE])/g;
const MARKER = '\u0000bigint:';
const MARKED = /"\\u0000bigint:(-?\d+)"/g;

/** JSON.parse, with integer literals outside the safe range returned as bigint. */
export function parseJson(text: string): unknown {
  const marked = text.replace(TOKENS, token =>
    token.startsWith('"') || Number.isSafeInteger(Number(token)) ? token : JSON.stringify(MARKER + token)
  );
  return JSON.parse(marked, (_key: string, value: unknown) =>
    typeof value === 'string' && value.startsWith(MARKER) ? BigInt(value.slice(MARKER.length)) : value
  );
}

/** JSON.stringify that writes bigint values as plain integer literals. */
export function stringifyJson(value: unknown, indent?: number): string {
  const text: string | undefined = JSON.stringify(
    value,
    (_key: string, v: unknown) => (typeof v === 'bigint' ? MARKER + v.toString() : v),
    indent
  );
  // undefined (and functions) have no JSON form
  return text === undefined ? String(value) : text.replace(MARKED, '$1');
}
