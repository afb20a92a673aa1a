const GREEN = '\x1b[0;32m';
const BLUE = '\x1b[0;34m';
const YELLOW = '\x1b[1;33m';
const RED = '\x1b[0;31m';
const RESET = '\x1b[0m';

export type Colorize = (text: string) => string;

export interface Palette {
  green: Colorize;
  blue: Colorize;
  yellow: Colorize;
  red: Colorize;
}

const wrap = (code: string): Colorize => text => `${code}${text}${RESET}`;
const identity: Colorize = text => text;

export function createPalette(enabled: boolean): Palette {
  if (!enabled) {
    return { green: identity, blue: identity, yellow: identity, red: identity };
  }
  return { green: wrap(GREEN), blue: wrap(BLUE), yellow: wrap(YELLOW), red: wrap(RED) };
}

/** Colours are on for a TTY unless NO_COLOR is set. */
export function colorsEnabled(stream: NodeJS.WriteStream = process.stdout): boolean {
  return !process.env['NO_COLOR'] && stream.isTTY === true;
}
