/**
 * @nstack/codec
 *
 * Deterministic binary encoding for RPC envelopes.
 */

export {
  bool,
  bytes,
  type Codec,
  codec,
  type DecodeResult,
  decode,
  type Either,
  either,
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
} from "./codecs.ts";
export { DecodeError, Reader } from "./reader.ts";
export { Writer } from "./writer.ts";
