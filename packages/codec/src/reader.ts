/**
 * Bounds-checked big-endian byte reader.
 *
 * Every read failure throws DecodeError; `decode()` turns it into a value.
 */

export class DecodeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "DecodeError";
  }
}

export class Reader {
  private readonly view: DataView;
  private offset = 0;

  constructor(private readonly bytes: Uint8Array) {
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  }

  get position(): number {
    return this.offset;
  }

  get remaining(): number {
    return this.bytes.length - this.offset;
  }

  private demand(count: number): void {
    if (this.remaining < count) {
      throw new DecodeError(
        `Too few bytes: needed ${count} at offset ${this.offset}, ${this.remaining} left`
      );
    }
  }

  readUint8(): number {
    this.demand(1);
    const value = this.view.getUint8(this.offset);
    this.offset += 1;
    return value;
  }

  readInt64(): bigint {
    this.demand(8);
    const value = this.view.getBigInt64(this.offset, false);
    this.offset += 8;
    return value;
  }

  readBytes(count: number): Uint8Array {
    this.demand(count);
    const value = this.bytes.slice(this.offset, this.offset + count);
    this.offset += count;
    return value;
  }
}
