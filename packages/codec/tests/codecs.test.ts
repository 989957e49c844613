/**
 * Codec encoding/decoding tests
 */
import { describe, expect, it } from "vitest";
import {
  bool,
  bytes,
  codec,
  decode,
  either,
  type Either,
  encode,
  enumeration,
  int,
  left,
  list,
  map,
  maybe,
  pair,
  right,
  text,
  triple,
  unit,
  uuid,
  Writer,
} from "../src/index.ts";

const ZERO7 = [0, 0, 0, 0, 0, 0, 0];

describe("encode", () => {
  it("should encode unit as zero bytes", () => {
    expect(encode(unit, null).length).toBe(0);
  });

  it("should prefix text with its int64 BE byte length", () => {
    expect(Array.from(encode(text, "hi"))).toEqual([...ZERO7, 2, 0x68, 0x69]);
  });

  it("should length-prefix the UTF-8 bytes, not the characters", () => {
    // "é" is two bytes in UTF-8
    expect(Array.from(encode(text, "é"))).toEqual([...ZERO7, 2, 0xc3, 0xa9]);
  });

  it("should encode negative ints in two's complement", () => {
    expect(Array.from(encode(int, -1))).toEqual(new Array(8).fill(0xff));
  });

  it("should tag maybe and either with a single byte", () => {
    expect(Array.from(encode(maybe(int), null))).toEqual([0]);
    expect(Array.from(encode(either(text, int), right(5)))).toEqual([1, ...ZERO7, 5]);
    expect(Array.from(encode(either(text, int), left("x")))).toEqual([0, ...ZERO7, 1, 0x78]);
  });

  it("should concatenate tuple components", () => {
    expect(Array.from(encode(pair(text, bool), ["a", true]))).toEqual([...ZERO7, 1, 0x61, 1]);
  });

  it("should encode an enumeration by index", () => {
    const color = enumeration(["red", "green", "blue"] as const);
    expect(Array.from(encode(color, "blue"))).toEqual([2]);
  });

  it("should encode a uuid as 16 raw bytes", () => {
    expect(Array.from(encode(uuid, "123e4567-e89b-12d3-a456-426614174000"))).toEqual([
      0x12, 0x3e, 0x45, 0x67, 0xe8, 0x9b, 0x12, 0xd3, 0xa4, 0x56, 0x42, 0x66, 0x14, 0x17, 0x40,
      0x00,
    ]);
  });

  it("should be deterministic", () => {
    const c = list(pair(text, maybe(int)));
    const value: Array<[string, number | null]> = [
      ["a", 1],
      ["b", null],
    ];
    expect(encode(c, value)).toEqual(encode(c, value));
  });

  it("should grow past the initial buffer", () => {
    const payload = new Uint8Array(1000).fill(7);
    expect(encode(bytes, payload).length).toBe(1008);
  });

  it("should start growing from an empty buffer", () => {
    const writer = new Writer(0);
    writer.writeUint8(5);
    writer.writeInt64(1n);
    expect(Array.from(writer.finish())).toEqual([5, ...ZERO7, 1]);
  });

  it("should reject values outside the codec's domain", () => {
    expect(() => encode(int, 1.5)).toThrow("int is not a safe integer: 1.5");
    expect(() => encode(uuid, "not-a-uuid")).toThrow("Invalid UUID: not-a-uuid");
  });
});

describe("decode", () => {
  it("should round-trip nested values", () => {
    const c = triple(list(text), maybe(either(text, bool)), bytes);
    const value: [string[], Either<string, boolean> | null, Uint8Array] = [
      ["alpha", "beta"],
      right(false),
      new Uint8Array([1, 2, 3]),
    ];
    expect(decode(c, encode(c, value))).toEqual({ ok: true, value });
  });

  it("should round-trip hand-written record codecs", () => {
    type Entry = { name: string; size: number; tags: string[] };
    const entry = codec<Entry>({
      write: (w, v) => {
        text.write(w, v.name);
        int.write(w, v.size);
        list(text).write(w, v.tags);
      },
      read: (r) => ({ name: text.read(r), size: int.read(r), tags: list(text).read(r) }),
    });
    const value: Entry = { name: "Foo.Bar:0.0.1", size: 42, tags: ["x"] };
    expect(decode(entry, encode(entry, value))).toEqual({ ok: true, value });
  });

  it("should map through an isomorphism", () => {
    const wrapped = map(
      text,
      (s) => ({ id: s }),
      (v: { id: string }) => v.id
    );
    expect(decode(wrapped, encode(wrapped, { id: "p1" }))).toEqual({
      ok: true,
      value: { id: "p1" },
    });
  });

  it("should return a lowercase canonical uuid", () => {
    const encoded = encode(uuid, "123E4567-E89B-12D3-A456-426614174000");
    expect(decode(uuid, encoded)).toEqual({
      ok: true,
      value: "123e4567-e89b-12d3-a456-426614174000",
    });
  });

  it("should fail on too few bytes", () => {
    expect(decode(int, new Uint8Array([0, 0, 0]))).toEqual({
      ok: false,
      error: "Too few bytes: needed 8 at offset 0, 3 left",
    });
  });

  it("should fail on a length longer than the input", () => {
    expect(decode(text, new Uint8Array([...ZERO7, 5, 0x61]))).toEqual({
      ok: false,
      error: "Length 5 at offset 0 exceeds the 1 bytes left",
    });
  });

  it("should fail on a negative length", () => {
    expect(decode(bytes, new Uint8Array(8).fill(0xff))).toEqual({
      ok: false,
      error: "Negative length -1 at offset 0",
    });
  });

  it("should fail on invalid tags", () => {
    expect(decode(bool, new Uint8Array([2]))).toEqual({
      ok: false,
      error: "Invalid bool tag 2 at offset 0",
    });
    expect(decode(either(text, unit), new Uint8Array([7]))).toEqual({
      ok: false,
      error: "Invalid either tag 7 at offset 0",
    });
    expect(decode(maybe(int), new Uint8Array([3]))).toEqual({
      ok: false,
      error: "Invalid maybe tag 3 at offset 0",
    });
    expect(decode(enumeration(["a", "b"]), new Uint8Array([2]))).toEqual({
      ok: false,
      error: "Invalid enumeration tag 2 at offset 0",
    });
  });

  it("should fail on invalid UTF-8", () => {
    expect(decode(text, new Uint8Array([...ZERO7, 1, 0xff]))).toEqual({
      ok: false,
      error: "Invalid UTF-8 in text at offset 0",
    });
  });

  it("should fail on integers outside the safe range", () => {
    const max = new Uint8Array([0x7f, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff]);
    expect(decode(int, max)).toEqual({
      ok: false,
      error: "Integer 9223372036854775807 at offset 0 exceeds the safe range",
    });
  });

  it("should fail on trailing bytes", () => {
    expect(decode(bool, new Uint8Array([1, 0]))).toEqual({
      ok: false,
      error: "Trailing bytes: 1 left after offset 1",
    });
  });

  it("should bound list counts by the bytes left", () => {
    expect(decode(list(unit), encode(list(unit), []))).toEqual({ ok: true, value: [] });
    expect(decode(list(unit), encode(list(unit), [null, null]))).toEqual({
      ok: false,
      error: "Length 2 at offset 0 exceeds the 0 bytes left",
    });
  });

  it("should decode unit only from empty input", () => {
    expect(decode(unit, new Uint8Array())).toEqual({ ok: true, value: null });
    expect(decode(unit, new Uint8Array([0])).ok).toBe(false);
  });
});
