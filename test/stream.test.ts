import { Readable, Writable } from 'node:stream';
import { describe, it, expect } from 'vitest';
import { JsonEOFError, JsonSyntaxError, UnmarshalTypeError, UnsupportedValueError } from '../src/errors.js';
import { StreamDecoder, StreamEncoder } from '../src/stream.js';
import { t } from '../src/types.js';
import { JsonNumber, OrderedObject, toPlain, type Value } from '../src/value.js';

async function* chunks(...parts: string[]): AsyncGenerator<string> {
  for (const p of parts) yield p;
}

function collector(): { stream: Writable; text: () => string } {
  const parts: Buffer[] = [];
  const stream = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      parts.push(chunk);
      callback();
    },
  });
  return { stream, text: () => Buffer.concat(parts).toString('utf8') };
}

describe('StreamDecoder', () => {
  it('reads values split across chunks', async () => {
    const dec = new StreamDecoder(Readable.from(['{"a":1}{"b"', ':2} [1', ',2] "x" 3 ']));
    const seen: Value[] = [];
    for (let i = 0; i < 5; i++) seen.push(await dec.decode());
    expect(seen.map(toPlain)).toEqual([{ a: 1 }, { b: 2 }, [1, 2], 'x', 3]);
    const err = await dec.decode().catch((e: unknown) => e);
    expect(err).toBeInstanceOf(JsonEOFError);
    expect(err instanceof JsonEOFError ? err.byteOffset : undefined).toBe(28);
  });

  it('waits for the end of a number split between chunks', async () => {
    const dec = new StreamDecoder(chunks('12', '34'));
    expect(await dec.decode()).toEqual(new JsonNumber('1234'));
  });

  it('keeps unread input buffered', async () => {
    const dec = new StreamDecoder(chunks('{"a":1}{"b"', ':2}'));
    await dec.decode();
    expect(new TextDecoder().decode(dec.buffered())).toBe('{"b"');
  });

  it('reports truncated input and keeps failing', async () => {
    const dec = new StreamDecoder(chunks('{"a":', '1'));
    const err = await dec.decode().catch((e: unknown) => e);
    if (!(err instanceof JsonSyntaxError)) throw err;
    expect(err.message).toBe('unexpected end of JSON input');
    expect(err.byteOffset).toBe(6);
    await expect(dec.decode()).rejects.toBe(err);
  });

  it('reports syntax errors at their stream offset', async () => {
    const dec = new StreamDecoder(chunks('[1] ', '[1,]'));
    expect(toPlain(await dec.decode())).toEqual([1]);
    const err = await dec.decode().catch((e: unknown) => e);
    if (!(err instanceof JsonSyntaxError)) throw err;
    expect(err.message).toBe("invalid character ']' looking for beginning of value");
    expect(err.byteOffset).toBe(8);
  });

  it('iterates until the stream ends', async () => {
    const values: Value[] = [];
    for await (const v of new StreamDecoder(chunks('1 ', '{"k":[]}', ' "s"\n'))) values.push(v);
    expect(values).toHaveLength(3);
    expect(values[1]).toBeInstanceOf(OrderedObject);
    expect(values.map(toPlain)).toEqual([1, { k: [] }, 's']);
  });

  it('reports whether more input follows', async () => {
    expect(await new StreamDecoder(chunks('  \n')).more()).toBe(false);
    const dec = new StreamDecoder(chunks('{"a":1}  '));
    expect(await dec.more()).toBe(true);
    await dec.decode();
    expect(await dec.more()).toBe(false);
  });

  it('decodes typed values and carries on after a type mismatch', async () => {
    const N = t.struct('N', [{ name: 'n', type: t.int }]);
    const dec = new StreamDecoder(chunks('{"n":1} {"n":"x"} {"n":3}'));
    expect(await dec.decodeInto(N)).toEqual({ n: 1 });
    await expect(dec.decodeInto(N)).rejects.toThrow(UnmarshalTypeError);
    expect(await dec.decodeInto(N)).toEqual({ n: 3 });
  });
});

describe('StreamEncoder', () => {
  it('writes one value per line', async () => {
    const out = collector();
    const enc = new StreamEncoder(out.stream);
    await enc.encode({ a: '<b>' });
    await enc.encode([1]);
    expect(out.text()).toBe('{"a":"\\u003Cb\\u003E"}\n[1]\n');
  });

  it('can turn HTML escaping off', async () => {
    const out = collector();
    const enc = new StreamEncoder(out.stream);
    enc.setEscapeHTML(false);
    await enc.encode({ a: '<b>' });
    expect(out.text()).toBe('{"a":"<b>"}\n');
  });

  it('indents when asked to', async () => {
    const out = collector();
    const enc = new StreamEncoder(out.stream);
    enc.setIndent('', '  ');
    await enc.encode({ a: [1] });
    expect(out.text()).toBe('{\n  "a": [\n    1\n  ]\n}\n');
  });

  it('writes nothing for a value that fails to encode', async () => {
    const out = collector();
    const enc = new StreamEncoder(out.stream);
    await expect(enc.encode(NaN)).rejects.toThrow(UnsupportedValueError);
    expect(out.text()).toBe('');
  });
});
