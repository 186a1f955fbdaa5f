import { describe, it, expect } from 'vitest';
import { decodeInto } from '../src/binder.js';
import {
  InvalidUnmarshalError,
  JsonSyntaxError,
  UnknownFieldError,
  UnmarshalTypeError,
} from '../src/errors.js';
import { t } from '../src/types.js';
import { JsonNumber, OrderedObject } from '../src/value.js';

function caught(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error('expected an error');
}

const Person = t.struct('Person', [
  { name: 'Name', type: t.string, tag: 'name' },
  { name: 'Age', type: t.int, tag: 'age' },
  { name: 'Tags', type: t.slice(t.string), tag: 'tags' },
]);

const StringTag = t.struct('StringTag', [
  { name: 'BoolStr', type: t.bool, tag: ',string' },
  { name: 'IntStr', type: t.int64, tag: ',string' },
  { name: 'StrStr', type: t.string, tag: ',string' },
]);

describe('structs', () => {
  it('fills fields by name', () => {
    expect(decodeInto('{"name":"Ann","age":30,"tags":["a","b"]}', Person)).toEqual({
      Name: 'Ann',
      Age: 30,
      Tags: ['a', 'b'],
    });
  });

  it('prefers an exact key match over a case-insensitive one', () => {
    const S = t.struct('S', [
      { name: 'upper', type: t.string, tag: 'Key' },
      { name: 'lower', type: t.string, tag: 'key' },
    ]);
    expect(decodeInto('{"key":"1","KEY":"2"}', S)).toEqual({ upper: '2', lower: '1' });
  });

  it('skips unknown keys unless told not to', () => {
    const input = '{"name":"Ann","extra":{"x":[1]}}';
    expect(decodeInto(input, Person)).toEqual({ Name: 'Ann', Age: 0, Tags: null });
    expect(() => decodeInto(input, Person, undefined, { disallowUnknownFields: true })).toThrow(
      new UnknownFieldError('extra')
    );
    expect(() => decodeInto(input, Person, undefined, { disallowUnknownFields: true })).toThrow(UnknownFieldError);
  });

  it('reports a mismatched field and keeps decoding the rest', () => {
    const target = Person.create();
    const err = caught(() => decodeInto('{"age":"old","name":"Bo"}', Person, target));
    if (!(err instanceof UnmarshalTypeError)) throw err;
    expect(err.message).toBe('cannot unmarshal string into struct field Person.age of type int');
    expect(err.byteOffset).toBe(12);
    expect(err.struct).toBe('Person');
    expect(err.field).toBe('age');
    expect(target).toEqual({ Name: 'Bo', Age: 0, Tags: null });
  });

  it('names the full field path for nested structs', () => {
    const Leaf = t.struct('Leaf', [{ name: 'n', type: t.int }]);
    const Mid = t.struct('Mid', [{ name: 'in', type: Leaf }]);
    const Top = t.struct('Top', [{ name: 'Inner2', type: Mid }]);
    expect(() => decodeInto('{"Inner2":{"in":{"n":"x"}}}', Top)).toThrow(
      'cannot unmarshal string into struct field Leaf.Inner2.in.n of type int'
    );
  });

  it('reports syntax errors before type errors', () => {
    expect(() => decodeInto('{"age":"old",}', Person)).toThrow(JsonSyntaxError);
  });

  it('allocates embedded pointers on demand', () => {
    const Inner = t.struct('Inner', [
      { name: 'X', type: t.int },
      { name: 'Y', type: t.int },
    ]);
    const Outer = t.struct('Outer', [
      { name: 'First', type: t.int },
      { name: 'Inner', type: t.pointer(Inner), embedded: true },
      { name: 'Last', type: t.int },
    ]);
    expect(decodeInto('{"Last":1}', Outer)).toEqual({ First: 0, Inner: null, Last: 1 });
    expect(decodeInto('{"X":2,"Last":1}', Outer)).toEqual({ First: 0, Inner: { X: 2, Y: 0 }, Last: 1 });
  });

  it('calls unmarshalJSON on class instances held in fields', () => {
    class Temp {
      value = 0;
      unmarshalJSON(data: Uint8Array): void {
        this.value = Number(new TextDecoder().decode(data));
      }
    }
    const TempType = t.struct('Temp', [], { create: () => new Temp() });
    const W = t.struct('W', [{ name: 'T', type: TempType }]);
    const temp = decodeInto('{"T":42}', W).T;
    expect(temp).toBeInstanceOf(Temp);
    expect(temp instanceof Temp ? temp.value : undefined).toBe(42);
  });
});

describe('null', () => {
  it('clears reference kinds and leaves scalars alone', () => {
    const S = t.struct('S', [
      { name: 'P', type: t.pointer(t.int) },
      { name: 'L', type: t.slice(t.int) },
      { name: 'N', type: t.int },
      { name: 'S', type: t.string },
    ]);
    const target = { P: 1, L: [1], N: 5, S: 'x' };
    expect(decodeInto('{"P":null,"L":null,"N":null,"S":null}', S, target)).toEqual({ P: null, L: null, N: 5, S: 'x' });
  });

  it('fills through a nil pointer', () => {
    const S = t.struct('S', [{ name: 'P', type: t.pointer(t.int) }]);
    expect(decodeInto('{"P":7}', S)).toEqual({ P: 7 });
  });
});

describe('numbers', () => {
  it('checks integer ranges', () => {
    expect(decodeInto('255', t.uint8)).toBe(255);
    expect(() => decodeInto('300', t.uint8)).toThrow('cannot unmarshal number 300 into value of type uint8');
    expect(() => decodeInto('9007199254740993', t.int)).toThrow(UnmarshalTypeError);
    expect(decodeInto('-9223372036854775808', t.int64)).toBe(-(2n ** 63n));
    expect(decodeInto('18446744073709551615', t.uint64)).toBe(2n ** 64n - 1n);
  });

  it('accepts integral exponents only on request', () => {
    expect(() => decodeInto('1e3', t.int)).toThrow('cannot unmarshal number 1e3 into value of type int');
    expect(decodeInto('1e3', t.int, undefined, { allowIntegralExponent: true })).toBe(1000);
  });

  it('parses floats at their width', () => {
    expect(decodeInto('1.5', t.float64)).toBe(1.5);
    expect(decodeInto('0.1', t.float32)).toBe(Math.fround(0.1));
    expect(() => decodeInto('1e400', t.float64)).toThrow('cannot unmarshal number 1e400 into value of type float64');
  });

  it('keeps number text, quoted or not', () => {
    expect(decodeInto('1.50', t.number)).toEqual(new JsonNumber('1.50'));
    expect(decodeInto('"12.5"', t.number)).toEqual(new JsonNumber('12.5'));
    expect(() => decodeInto('"abc"', t.number)).toThrow(
      'invalid number literal, trying to unmarshal "abc" into Number'
    );
  });
});

describe('bytes', () => {
  it('decodes base64 strings', () => {
    expect(decodeInto('"YWJj"', t.bytes)).toEqual(Uint8Array.from([97, 98, 99]));
    expect(decodeInto('"CQM="', t.slice(t.uint8))).toEqual([9, 3]);
  });

  it('reports the first bad base64 byte', () => {
    expect(() => decodeInto('"YW!j"', t.bytes)).toThrow('illegal base64 data at input byte 2');
  });
});

describe('containers', () => {
  it('truncates and pads fixed arrays', () => {
    expect(decodeInto('[1,2,3]', t.array(t.int, 2))).toEqual([1, 2]);
    expect(decodeInto('[1]', t.array(t.int, 2))).toEqual([1, 0]);
  });

  it('keeps map insertion order and fills an existing map', () => {
    const m = decodeInto('{"b":1,"a":2}', t.map(t.string, t.int));
    expect(m === null ? [] : [...m.entries()]).toEqual([
      ['b', 1],
      ['a', 2],
    ]);

    const existing = new Map([['z', 0]]);
    const filled = decodeInto('{"a":1}', t.map(t.string, t.int), existing);
    expect(filled).toBe(existing);
    expect([...existing.keys()]).toEqual(['z', 'a']);
  });

  it('parses integer map keys', () => {
    const m = decodeInto('{"10":"x","-2":"y"}', t.map(t.int, t.string));
    expect(m === null ? [] : [...m.keys()]).toEqual([10, -2]);
    expect(() => decodeInto('{"1":"x","x":"y"}', t.map(t.int, t.string))).toThrow(
      'cannot unmarshal number x into value of type int'
    );
  });

  it('refuses map keys with no text form', () => {
    expect(() => decodeInto('{"a":1}', t.map(t.bool, t.int))).toThrow(InvalidUnmarshalError);
  });

  it('stores __proto__ as an ordinary record key', () => {
    const r = decodeInto('{"__proto__":{"polluted":true},"a":1}', t.record(t.value));
    if (r === null) throw new Error('expected a record');
    expect(Object.keys(r)).toEqual(['__proto__', 'a']);
    expect(Object.getPrototypeOf(r)).toBe(Object.prototype);
    expect(Reflect.get({}, 'polluted')).toBeUndefined();
  });

  it('builds the value model for untyped slots', () => {
    const v = decodeInto('{"a":[1],"a":true}', t.value);
    expect(v).toBeInstanceOf(OrderedObject);
    expect(v instanceof OrderedObject ? v.keys() : []).toEqual(['a', 'a']);
    expect(() => decodeInto('[1]', t.object)).toThrow('cannot unmarshal array into value of type OrderedObject');
  });

  it('keeps raw values byte for byte', () => {
    expect(decodeInto('{ "a" : [1, 2] }', t.raw)?.toString()).toBe('{ "a" : [1, 2] }');
    const S = t.struct('S', [{ name: 'M', type: t.raw }]);
    const r = decodeInto('{"M": {"x" : 1} }', S).M;
    expect(String(r)).toBe('{"x" : 1}');
  });
});

describe('hooks', () => {
  it('hands unmarshalJSON the raw bytes, null included', () => {
    const H = t.hook<string>('H', {
      zero: () => '',
      unmarshalJSON: (data) => new TextDecoder().decode(data),
    });
    expect(decodeInto('[null, {"a" : 1}]', t.slice(H))).toEqual(['null', '{"a" : 1}']);
  });

  it('uses whatever unmarshalJSON returns', () => {
    const Ref = t.hook<number>('Ref', { zero: () => 0, unmarshalJSON: () => 12 });
    expect(decodeInto('"anything"', Ref)).toBe(12);
  });

  it('passes strings to unmarshalText', () => {
    const Upper = t.hook<string>('Upper', { zero: () => '', unmarshalText: (s) => s.toUpperCase() });
    expect(decodeInto('"abc"', Upper)).toBe('ABC');
    expect(decodeInto('null', Upper)).toBe('');
    expect(() => decodeInto('1', Upper)).toThrow('cannot unmarshal number into value of type Upper');
    const m = decodeInto('{"a":1}', t.map(Upper, t.int));
    expect(m === null ? [] : [...m.keys()]).toEqual(['A']);
  });
});

describe('string-tagged fields', () => {
  it('reads scalars from inside strings', () => {
    expect(decodeInto('{"BoolStr":"true","IntStr":"42","StrStr":"\\"x\\""}', StringTag)).toEqual({
      BoolStr: true,
      IntStr: 42n,
      StrStr: 'x',
    });
    expect(decodeInto('{"IntStr":null}', StringTag)).toEqual({ BoolStr: false, IntStr: 0n, StrStr: '' });
  });

  it('rejects unquoted values', () => {
    expect(() => decodeInto('{"IntStr":42}', StringTag)).toThrow(
      'invalid use of ,string struct tag, trying to unmarshal unquoted value into int64'
    );
  });

  it('rejects strings that do not hold a literal', () => {
    expect(() => decodeInto('{"IntStr":"abc"}', StringTag)).toThrow(
      'invalid use of ,string struct tag, trying to unmarshal "abc" into int64'
    );
    expect(() => decodeInto('{"BoolStr":"tru"}', StringTag)).toThrow(
      'invalid use of ,string struct tag, trying to unmarshal "tru" into bool'
    );
    expect(() => decodeInto('{"IntStr":"42 "}', StringTag)).toThrow(
      'invalid use of ,string struct tag, trying to unmarshal "42 " into int64'
    );
  });
});
