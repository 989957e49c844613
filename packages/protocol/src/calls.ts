/**
 * Remote call descriptors.
 *
 * Each descriptor pairs a stable call name with the codecs of its argument
 * and return value. The name is the URL path of the call on the server and
 * must not change between interoperating client and server versions.
 */

import {
  bool,
  bytes,
  type Codec,
  list,
  maybe,
  pair,
  text,
  unit,
} from "@nstack/codec";
import {
  buildResultCodec,
  listTypeCodec,
  logsLineCodec,
  methodEntryCodec,
  processInfoCodec,
  serverInfoCodec,
} from "./codecs.ts";
import type {
  BuildResult,
  BuildTarball,
  DSLSource,
  ListType,
  LogsLine,
  MethodEntry,
  ModuleName,
  ProcessId,
  ProcessInfo,
  ServerInfo,
} from "./types.ts";

// ============================================================================
// Descriptor
// ============================================================================

export type ApiCall<A, B> = {
  readonly name: string;
  readonly args: Codec<A>;
  readonly returns: Codec<B>;
};

const CALL_NAME_REGEX = /^[A-Za-z][A-Za-z0-9]*$/;

export const defineCall = <A, B>(name: string, args: Codec<A>, returns: Codec<B>): ApiCall<A, B> => {
  if (!CALL_NAME_REGEX.test(name)) {
    throw new Error(`Invalid call name: ${name}`);
  }
  return Object.freeze({ name, args, returns });
};

// ============================================================================
// Processes
// ============================================================================

export const startCommand: ApiCall<[DSLSource, boolean], ProcessInfo> = defineCall(
  "StartCommand",
  pair(text, bool),
  processInfoCodec
);

export const stopCommand: ApiCall<ProcessId, null> = defineCall("StopCommand", text, unit);

export const logsCommand: ApiCall<ProcessId, LogsLine[]> = defineCall(
  "LogsCommand",
  text,
  list(logsLineCodec)
);

export const serverLogsCommand: ApiCall<null, LogsLine[]> = defineCall(
  "ServerLogsCommand",
  unit,
  list(logsLineCodec)
);

export const listProcessesCommand: ApiCall<null, ProcessInfo[]> = defineCall(
  "ListProcessesCommand",
  unit,
  list(processInfoCodec)
);

// ============================================================================
// Server state
// ============================================================================

export const infoCommand: ApiCall<boolean, ServerInfo> = defineCall(
  "InfoCommand",
  bool,
  serverInfoCodec
);

export const listCommand: ApiCall<[ListType | null, boolean], MethodEntry[]> = defineCall(
  "ListCommand",
  pair(maybe(listTypeCodec), bool),
  list(methodEntryCodec)
);

// ============================================================================
// Modules
// ============================================================================

export const listModulesCommand: ApiCall<boolean, ModuleName[]> = defineCall(
  "ListModulesCommand",
  bool,
  list(text)
);

/** Returns null when the module was deleted, otherwise the server's explanation */
export const deleteModuleCommand: ApiCall<ModuleName, string | null> = defineCall(
  "DeleteModuleCommand",
  text,
  maybe(text)
);

export const gcCommand: ApiCall<null, ModuleName[]> = defineCall(
  "GarbageCollectCommand",
  unit,
  list(text)
);

export const buildCommand: ApiCall<BuildTarball, BuildResult> = defineCall(
  "BuildCommand",
  bytes,
  buildResultCodec
);

export const buildWorkflowCommand: ApiCall<[DSLSource, ModuleName], ModuleName> = defineCall(
  "BuildWorkflowCommand",
  pair(text, text),
  text
);
