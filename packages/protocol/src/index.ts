/**
 * NStack Protocol - Call descriptors and value types for the server API
 *
 * @packageDocumentation
 */

// ============================================================================
// Value types
// ============================================================================

export type {
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
  ServerReturn,
} from "./types.ts";
export { ListTypeSchema } from "./types.ts";

// ============================================================================
// Codecs
// ============================================================================

export {
  buildResultCodec,
  listTypeCodec,
  logsLineCodec,
  methodEntryCodec,
  processInfoCodec,
  serverInfoCodec,
} from "./codecs.ts";

// ============================================================================
// Calls
// ============================================================================

export type { ApiCall } from "./calls.ts";
export {
  buildCommand,
  buildWorkflowCommand,
  defineCall,
  deleteModuleCommand,
  gcCommand,
  infoCommand,
  listCommand,
  listModulesCommand,
  listProcessesCommand,
  logsCommand,
  serverLogsCommand,
  startCommand,
  stopCommand,
} from "./calls.ts";

// ============================================================================
// Defaults
// ============================================================================

export { DEFAULT_API_PORT, DEFAULT_SERVER_HOST } from "./constants.ts";
