/**
 * Binary codecs.
 *
 * Framing (all integers big-endian):
 * - bool, enumeration tag, maybe/either tag: 1 byte
 * - int: 8 bytes, signed
 * - bytes/text: int64 length + payload (text is UTF-8)
 * - list: int64 count + elements
 * - tuples and records: concatenation of their fields, in declaration order
 * - uuid: 16 raw bytes
 */

import { DecodeError, Reader } from "./reader.ts";
import { Writer } from "./writer.ts";

export interface Codec<T> {
  write(writer: Writer, value: T): void;
  read(reader: Reader): T;
}

export type Either<L, R> = { tag: "left"; value: L } | { tag: "right"; value: R };

export const left = <L, R = never>(value: L): Either<L, R> => ({ tag: "left", value });
export const right = <R, L = never>(value: R): Either<L, R> => ({ tag: "right", value });

/**
 * Define a codec by hand. Record codecs read their fields inside an object
 * literal, whose properties are evaluated in source order.
 */
export const codec = <T>(impl: Codec<T>): Codec<T> => impl;

// ============================================================================
// Primitives
// ============================================================================

export const unit: Codec<null> = {
  write: () => {},
  read: () => null,
};

export const bool: Codec<boolean> = {
  write: (w, value) => w.writeUint8(value ? 1 : 0),
  read: (r) => {
    const at = r.position;
    const tag = r.readUint8();
    if (tag === 0) return false;
    if (tag === 1) return true;
    throw new DecodeError(`Invalid bool tag ${tag} at offset ${at}`);
  },
};

export const int: Codec<number> = {
  write: (w, value) => {
    if (!Number.isSafeInteger(value)) {
      throw new RangeError(`int is not a safe integer: ${value}`);
    }
    w.writeInt64(BigInt(value));
  },
  read: (r) => {
    const at = r.position;
    const value = r.readInt64();
    if (value > BigInt(Number.MAX_SAFE_INTEGER) || value < BigInt(Number.MIN_SAFE_INTEGER)) {
      throw new DecodeError(`Integer ${value} at offset ${at} exceeds the safe range`);
    }
    return Number(value);
  },
};

/**
 * Read a length/count prefix. It can never exceed the bytes left. For lists
 * this assumes every element encodes to at least one byte, so a list of
 * zero-width elements (`list(unit)`) only decodes while it is empty.
 */
const readLength = (r: Reader): number => {
  const at = r.position;
  const length = int.read(r);
  if (length < 0) {
    throw new DecodeError(`Negative length ${length} at offset ${at}`);
  }
  if (length > r.remaining) {
    throw new DecodeError(`Length ${length} at offset ${at} exceeds the ${r.remaining} bytes left`);
  }
  return length;
};

export const bytes: Codec<Uint8Array> = {
  write: (w, value) => {
    int.write(w, value.length);
    w.writeBytes(value);
  },
  read: (r) => r.readBytes(readLength(r)),
};

const utf8Encoder = new TextEncoder();
const utf8Decoder = new TextDecoder("utf-8", { fatal: true });

export const text: Codec<string> = {
  write: (w, value) => bytes.write(w, utf8Encoder.encode(value)),
  read: (r) => {
    const at = r.position;
    const raw = bytes.read(r);
    try {
      return utf8Decoder.decode(raw);
    } catch {
      throw new DecodeError(`Invalid UTF-8 in text at offset ${at}`);
    }
  },
};

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

export const uuid: Codec<string> = {
  write: (w, value) => {
    if (!UUID_PATTERN.test(value)) {
      throw new RangeError(`Invalid UUID: ${value}`);
    }
    const hex = value.replace(/-/g, "");
    for (let i = 0; i < 32; i += 2) {
      w.writeUint8(Number.parseInt(hex.slice(i, i + 2), 16));
    }
  },
  read: (r) => {
    const hex = Array.from(r.readBytes(16), (b) => b.toString(16).padStart(2, "0")).join("");
    return [
      hex.slice(0, 8),
      hex.slice(8, 12),
      hex.slice(12, 16),
      hex.slice(16, 20),
      hex.slice(20),
    ].join("-");
  },
};

// ============================================================================
// Combinators
// ============================================================================

/**
 * Closed set of string values, tagged by their index in `values`.
 */
export const enumeration = <T extends string>(values: readonly T[]): Codec<T> => ({
  write: (w, value) => {
    const index = values.indexOf(value);
    if (index < 0) {
      throw new RangeError(`Unknown enumeration value: ${value}`);
    }
    w.writeUint8(index);
  },
  read: (r) => {
    const at = r.position;
    const tag = r.readUint8();
    const value = values[tag];
    if (value === undefined) {
      throw new DecodeError(`Invalid enumeration tag ${tag} at offset ${at}`);
    }
    return value;
  },
});

export const maybe = <T>(inner: Codec<T>): Codec<T | null> => ({
  write: (w, value) => {
    if (value === null) {
      w.writeUint8(0);
    } else {
      w.writeUint8(1);
      inner.write(w, value);
    }
  },
  read: (r) => {
    const at = r.position;
    const tag = r.readUint8();
    if (tag === 0) return null;
    if (tag === 1) return inner.read(r);
    throw new DecodeError(`Invalid maybe tag ${tag} at offset ${at}`);
  },
});

export const either = <L, R>(l: Codec<L>, r: Codec<R>): Codec<Either<L, R>> => ({
  write: (w, value) => {
    if (value.tag === "left") {
      w.writeUint8(0);
      l.write(w, value.value);
    } else {
      w.writeUint8(1);
      r.write(w, value.value);
    }
  },
  read: (reader) => {
    const at = reader.position;
    const tag = reader.readUint8();
    if (tag === 0) return left(l.read(reader));
    if (tag === 1) return right(r.read(reader));
    throw new DecodeError(`Invalid either tag ${tag} at offset ${at}`);
  },
});

export const list = <T>(element: Codec<T>): Codec<T[]> => ({
  write: (w, values) => {
    int.write(w, values.length);
    for (const value of values) {
      element.write(w, value);
    }
  },
  read: (r) => {
    const count = readLength(r);
    const values: T[] = [];
    for (let i = 0; i < count; i++) {
      values.push(element.read(r));
    }
    return values;
  },
});

export const pair = <A, B>(a: Codec<A>, b: Codec<B>): Codec<[A, B]> => ({
  write: (w, [va, vb]) => {
    a.write(w, va);
    b.write(w, vb);
  },
  read: (r) => {
    const va = a.read(r);
    const vb = b.read(r);
    return [va, vb];
  },
});

export const triple = <A, B, C>(a: Codec<A>, b: Codec<B>, c: Codec<C>): Codec<[A, B, C]> => ({
  write: (w, [va, vb, vc]) => {
    a.write(w, va);
    b.write(w, vb);
    c.write(w, vc);
  },
  read: (r) => {
    const va = a.read(r);
    const vb = b.read(r);
    const vc = c.read(r);
    return [va, vb, vc];
  },
});

/**
 * Codec for B through an isomorphism with A.
 */
export const map = <A, B>(inner: Codec<A>, to: (a: A) => B, from: (b: B) => A): Codec<B> => ({
  write: (w, value) => inner.write(w, from(value)),
  read: (r) => to(inner.read(r)),
});

// ============================================================================
// Entry points
// ============================================================================

export type DecodeResult<T> = { ok: true; value: T } | { ok: false; error: string };

export function encode<T>(c: Codec<T>, value: T): Uint8Array {
  const writer = new Writer();
  c.write(writer, value);
  return writer.finish();
}

/**
 * Decode a complete value. Never throws; trailing bytes are an error.
 */
export function decode<T>(c: Codec<T>, data: Uint8Array): DecodeResult<T> {
  const reader = new Reader(data);
  try {
    const value = c.read(reader);
    if (reader.remaining > 0) {
      return {
        ok: false,
        error: `Trailing bytes: ${reader.remaining} left after offset ${reader.position}`,
      };
    }
    return { ok: true, value };
  } catch (err) {
    return { ok: false, error: err instanceof Error ? err.message : String(err) };
  }
}
