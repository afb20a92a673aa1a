import { addIsoTimestamps, toIso8601 } from '../../../src/output/timestamps.js';

describe('toIso8601', () => {
  it('converts whole seconds without a fraction', () => {
    expect(toIso8601(1700000000000)).toBe('2023-11-14T22:13:20+00:00');
    expect(toIso8601(0)).toBe('1970-01-01T00:00:00+00:00');
  });

  it('writes milliseconds as six-digit microseconds', () => {
    expect(toIso8601(1700000000123)).toBe('2023-11-14T22:13:20.123000+00:00');
    expect(toIso8601(1700000000005)).toBe('2023-11-14T22:13:20.005000+00:00');
  });

  it('handles timestamps before the epoch', () => {
    expect(toIso8601(-1000)).toBe('1969-12-31T23:59:59+00:00');
  });

  it('returns the number as text when out of range', () => {
    expect(toIso8601(9e20)).toBe('900000000000000000000');
    expect(toIso8601(253402300800000)).toBe('253402300800000');
  });
});

describe('addIsoTimestamps', () => {
  it('adds _iso8601 siblings recursively', () => {
    const input = {
      id: 'AI-1',
      created: 1700000000000,
      comments: [{ text: 'first', updated: 0 }],
    };
    expect(addIsoTimestamps(input)).toEqual({
      id: 'AI-1',
      created: 1700000000000,
      created_iso8601: '2023-11-14T22:13:20+00:00',
      comments: [{ text: 'first', updated: 0, updated_iso8601: '1970-01-01T00:00:00+00:00' }],
    });
    expect(input).not.toHaveProperty('created_iso8601');
  });

  it('ignores non-integer and non-numeric timestamps', () => {
    expect(addIsoTimestamps({ created: 1.5, updated: '1700000000000' }))
      .toEqual({ created: 1.5, updated: '1700000000000' });
  });

  it('passes scalars through', () => {
    expect(addIsoTimestamps('x')).toBe('x');
    expect(addIsoTimestamps(null)).toBeNull();
  });
});
