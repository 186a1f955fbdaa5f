/**
 * Growable output buffer shared by the encoder and the re-renderers.
 */

const INITIAL = 4096;

export class ByteWriter {
  private buf: Uint8Array;
  private off = 0;

  constructor(initial = INITIAL) {
    this.buf = new Uint8Array(initial);
  }

  get length(): number {
    return this.off;
  }

  private ensure(n: number): void {
    if (this.off + n > this.buf.length) {
      const next = new Uint8Array(Math.max(this.buf.length * 2, this.off + n));
      next.set(this.buf.subarray(0, this.off));
      this.buf = next;
    }
  }

  write(b: Uint8Array): void {
    this.ensure(b.length);
    this.buf.set(b, this.off);
    this.off += b.length;
  }

  writeByte(x: number): void {
    this.ensure(1);
    this.buf[this.off++] = x;
  }

  /** Append a string known to hold only 7-bit characters. */
  writeAscii(s: string): void {
    this.ensure(s.length);
    for (let i = 0; i < s.length; i++) this.buf[this.off++] = s.charCodeAt(i);
  }

  bytes(): Uint8Array {
    return this.buf.slice(0, this.off);
  }
}
