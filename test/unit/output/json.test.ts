import { parseJson, stringifyJson } from '../../../src/output/json.js';

describe('parseJson', () => {
  it('keeps integers beyond the safe range exact', () => {
    const value = parseJson('{"id": 12345678901234567891, "neg": -98765432109876543210, "small": 42}');
    expect(value).toEqual({ id: 12345678901234567891n, neg: -98765432109876543210n, small: 42 });
  });

  it('leaves safe integers, decimals and strings as they are', () => {
    expect(parseJson('[9007199254740991, 1.12345678901234567, 1e12345678901234567, "12345678901234567891"]'))
      .toEqual([9007199254740991, 1.1234567890123457, Infinity, '12345678901234567891']);
  });

  it('does not look inside escaped strings', () => {
    expect(parseJson('{"note": "say \\"12345678901234567891\\""}'))
      .toEqual({ note: 'say "12345678901234567891"' });
  });

  it('throws on invalid JSON', () => {
    expect(() => parseJson('{nope}')).toThrow(SyntaxError);
  });
});

describe('stringifyJson', () => {
  it('prints bigint values as integer literals', () => {
    expect(stringifyJson({ id: 12345678901234567891n, name: 'x' }, 2))
      .toBe('{\n  "id": 12345678901234567891,\n  "name": "x"\n}');
  });

  it('matches JSON.stringify otherwise', () => {
    expect(stringifyJson(['a', 1, null])).toBe('["a",1,null]');
    expect(stringifyJson(undefined)).toBe('undefined');
  });
});
