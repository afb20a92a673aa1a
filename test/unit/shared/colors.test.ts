import { createPalette } from '../../../src/shared/colors.js';

describe('createPalette', () => {
  it('wraps text in ANSI codes when enabled', () => {
    const palette = createPalette(true);
    expect(palette.green('ok')).toBe('\x1b[0;32mok\x1b[0m');
    expect(palette.yellow('run')).toBe('\x1b[1;33mrun\x1b[0m');
    expect(palette.red('no')).toBe('\x1b[0;31mno\x1b[0m');
    expect(palette.blue('hi')).toBe('\x1b[0;34mhi\x1b[0m');
  });

  it('returns text unchanged when disabled', () => {
    expect(createPalette(false).red('plain')).toBe('plain');
  });
});
