/**
 * Value types exchanged with the NStack server.
 */

import type { Either } from "@nstack/codec";
import { z } from "zod";

// ============================================================================
// Identifiers
// ============================================================================

/** Workflow DSL source text */
export type DSLSource = string;

/** Server-assigned process identifier */
export type ProcessId = string;

/** Fully-qualified module name, e.g. `Demo.Classify:0.0.1-SNAPSHOT` */
export type ModuleName = string;

/** Gzipped tarball of a container module's directory */
export type BuildTarball = Uint8Array;

// ============================================================================
// Enum Schemas
// ============================================================================

export const ListTypeSchema = z.enum([
  "sources",
  "sinks",
  "processors",
  "workflows",
  "functions",
  "types",
]);
export type ListType = z.infer<typeof ListTypeSchema>;

// ============================================================================
// Records
// ============================================================================

export type ProcessInfo = {
  processId: ProcessId;
  /** Workflow DSL the process was started from */
  workflow: DSLSource;
  debug: boolean;
  /** ISO-8601 start time, as reported by the server */
  startedAt: string;
};

export type LogsLine = {
  timestamp: string;
  line: string;
};

export type MethodEntry = {
  /** Qualified method name */
  name: string;
  /** Rendered type signature */
  signature: string;
};

export type ServerInfo = {
  version: string;
  modules: ModuleName[];
  processes: ProcessInfo[];
  methods: MethodEntry[];
};

export type BuildResult = {
  module: ModuleName;
  /** Build output worth showing to the user */
  messages: string[];
};

/**
 * Body of every 200 response: a server-side failure message or the
 * call's return value.
 */
export type ServerReturn<T> = Either<string, T>;
