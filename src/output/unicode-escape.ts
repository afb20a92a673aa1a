const SIMPLE_ESCAPES: Record<string, string> = {
  '\\': '\\',
  "'": "'",
  '"': '"',
  a: '\x07',
  b: '\b',
  f: '\f',
  n: '\n',
  r: '\r',
  t: '\t',
  v: '\v',
  '\n': '',
};

const HEX_WIDTH: Record<string, number> = { x: 2, u: 4, U: 8 };

/**
 * Decode backslash escapes the way the MCP client's repr()-style log output
 * encodes them (\\ \' \" \n \t \xHH \uHHHH \UHHHHHHHH and octal).
 * Unrecognised escapes are kept verbatim. Truncated hex escapes and a trailing
 * lone backslash throw.
 */
export function decodeUnicodeEscapes(input: string): string {
  let out = '';
  let i = 0;
  while (i < input.length) {
    const ch = input[i];
    if (ch !== '\\') {
      out += ch;
      i++;
      continue;
    }

    if (i + 1 >= input.length) {
      throw new SyntaxError('\\ at end of string');
    }
    const next = input[i + 1];

    const simple = SIMPLE_ESCAPES[next];
    if (simple !== undefined) {
      out += simple;
      i += 2;
      continue;
    }

    const width = HEX_WIDTH[next];
    if (width !== undefined) {
      const digits = input.slice(i + 2, i + 2 + width);
      if (digits.length !== width || !/^[0-9a-fA-F]+$/.test(digits)) {
        throw new SyntaxError(`truncated \\${next} escape at position ${i}`);
      }
      const codePoint = parseInt(digits, 16);
      if (codePoint > 0x10ffff) {
        throw new SyntaxError(`illegal Unicode character at position ${i}`);
      }
      out += String.fromCodePoint(codePoint);
      i += 2 + width;
      continue;
    }

    const octal = /^[0-7]{1,3}/.exec(input.slice(i + 1, i + 4));
    if (octal) {
      out += String.fromCharCode(parseInt(octal[0], 8));
      i += 1 + octal[0].length;
      continue;
    }

    out += ch + next;
    i += 2;
  }
  return out;
}
