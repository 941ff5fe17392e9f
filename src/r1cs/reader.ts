import { FormatError } from "../errors";

/** Little-endian cursor over an in-memory container */
export class BinaryReader {
  private readonly view: DataView;
  private offset = 0;

  constructor(private readonly bytes: Uint8Array) {
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  }

  get position(): number {
    return this.offset;
  }

  get length(): number {
    return this.bytes.length;
  }

  get remaining(): number {
    return this.bytes.length - this.offset;
  }

  seek(position: number): void {
    if (position < 0 || position > this.bytes.length) {
      throw new FormatError(`seek to ${position} outside of ${this.bytes.length} bytes`);
    }
    this.offset = position;
  }

  skip(count: number): void {
    this.ensure(count, "skipped bytes");
    this.offset += count;
  }

  readU32(what = "u32"): number {
    this.ensure(4, what);
    const value = this.view.getUint32(this.offset, true);
    this.offset += 4;
    return value;
  }

  readU64(what = "u64"): bigint {
    this.ensure(8, what);
    const value = this.view.getBigUint64(this.offset, true);
    this.offset += 8;
    return value;
  }

  /** Returns a view into the underlying buffer, not a copy */
  readBytes(count: number, what = "bytes"): Uint8Array {
    this.ensure(count, what);
    const out = this.bytes.subarray(this.offset, this.offset + count);
    this.offset += count;
    return out;
  }

  private ensure(count: number, what: string): void {
    if (this.offset + count > this.bytes.length) {
      throw new FormatError(
        `unexpected end of data reading ${what} at offset ${this.offset}`,
        { offset: this.offset, needed: count, available: this.remaining },
      );
    }
  }
}
