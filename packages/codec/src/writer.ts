/**
 * Growable big-endian byte writer.
 */

const INITIAL_CAPACITY = 64;

export class Writer {
  private buffer: Uint8Array;
  private view: DataView;
  private length = 0;

  constructor(capacity: number = INITIAL_CAPACITY) {
    this.buffer = new Uint8Array(capacity);
    this.view = new DataView(this.buffer.buffer);
  }

  private ensure(extra: number): void {
    const needed = this.length + extra;
    if (needed <= this.buffer.length) return;

    let capacity = Math.max(1, this.buffer.length * 2);
    while (capacity < needed) capacity *= 2;

    const next = new Uint8Array(capacity);
    next.set(this.buffer.subarray(0, this.length));
    this.buffer = next;
    this.view = new DataView(next.buffer);
  }

  writeUint8(value: number): void {
    this.ensure(1);
    this.view.setUint8(this.length, value);
    this.length += 1;
  }

  writeInt64(value: bigint): void {
    this.ensure(8);
    this.view.setBigInt64(this.length, value, false); // BE
    this.length += 8;
  }

  writeBytes(bytes: Uint8Array): void {
    this.ensure(bytes.length);
    this.buffer.set(bytes, this.length);
    this.length += bytes.length;
  }

  /** Copy of the bytes written so far */
  finish(): Uint8Array {
    return this.buffer.slice(0, this.length);
  }
}
