/**
 * Binary codecs for the protocol value types.
 */

import { bool, type Codec, codec, enumeration, list, text } from "@nstack/codec";
import {
  type BuildResult,
  type ListType,
  ListTypeSchema,
  type LogsLine,
  type MethodEntry,
  type ProcessInfo,
  type ServerInfo,
} from "./types.ts";

export const listTypeCodec: Codec<ListType> = enumeration(ListTypeSchema.options);

export const processInfoCodec = codec<ProcessInfo>({
  write: (w, v) => {
    text.write(w, v.processId);
    text.write(w, v.workflow);
    bool.write(w, v.debug);
    text.write(w, v.startedAt);
  },
  read: (r) => ({
    processId: text.read(r),
    workflow: text.read(r),
    debug: bool.read(r),
    startedAt: text.read(r),
  }),
});

export const logsLineCodec = codec<LogsLine>({
  write: (w, v) => {
    text.write(w, v.timestamp);
    text.write(w, v.line);
  },
  read: (r) => ({ timestamp: text.read(r), line: text.read(r) }),
});

export const methodEntryCodec = codec<MethodEntry>({
  write: (w, v) => {
    text.write(w, v.name);
    text.write(w, v.signature);
  },
  read: (r) => ({ name: text.read(r), signature: text.read(r) }),
});

const moduleNames = list(text);
const processes = list(processInfoCodec);
const methods = list(methodEntryCodec);

export const serverInfoCodec = codec<ServerInfo>({
  write: (w, v) => {
    text.write(w, v.version);
    moduleNames.write(w, v.modules);
    processes.write(w, v.processes);
    methods.write(w, v.methods);
  },
  read: (r) => ({
    version: text.read(r),
    modules: moduleNames.read(r),
    processes: processes.read(r),
    methods: methods.read(r),
  }),
});

export const buildResultCodec = codec<BuildResult>({
  write: (w, v) => {
    text.write(w, v.module);
    list(text).write(w, v.messages);
  },
  read: (r) => ({ module: text.read(r), messages: list(text).read(r) }),
});
