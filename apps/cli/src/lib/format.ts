/**
 * Text formatters for call results.
 */

import type {
  BuildResult,
  LogsLine,
  MethodEntry,
  ModuleName,
  ProcessId,
  ProcessInfo,
  ServerInfo,
} from "@nstack/protocol";
import Table from "cli-table3";
import { formatRelativeTime } from "./output";

export function linesOr(items: string[], empty: string): string {
  return items.length === 0 ? empty : items.join("\n");
}

export function showStartMessage(info: ProcessInfo): string {
  const debug = info.debug ? " in debug mode" : "";
  return `Successfully started as process ${info.processId}${debug}`;
}

export function showStopMessage(processId: ProcessId): () => string {
  return () => `Process ${processId} stopped`;
}

export function catLogs(lines: LogsLine[]): string {
  return lines.map((l) => l.line).join("\n");
}

export function printMethods(methods: MethodEntry[]): string {
  return linesOr(
    methods.map((m) => `${m.name} :: ${m.signature}`),
    "No registered methods"
  );
}

export function showModules(modules: ModuleName[]): string {
  return linesOr(modules, "No registered images");
}

export function showDeleteMessage(message: string | null): string {
  return message ?? "Module deleted";
}

export function showRemoved(modules: ModuleName[]): string {
  return linesOr(modules, "Nothing removed");
}

export function showProcesses(processes: ProcessInfo[], now: number = Date.now()): string {
  if (processes.length === 0) {
    return "No running processes";
  }

  const table = new Table({
    head: ["ID", "WORKFLOW", "DEBUG", "STARTED"],
    style: { head: [], border: [] },
  });
  for (const p of processes) {
    table.push([p.processId, p.workflow, p.debug ? "yes" : "no", formatRelativeTime(p.startedAt, now)]);
  }
  return table.toString();
}

export function printInfo(info: ServerInfo): string {
  const lines = [`Server version: ${info.version}`, "", "Modules:"];
  lines.push(...(info.modules.length ? info.modules.map((m) => `  ${m}`) : ["  (none)"]));
  lines.push("", "Processes:");
  lines.push(
    ...(info.processes.length
      ? info.processes.map((p) => `  ${p.processId}  ${p.workflow}`)
      : ["  (none)"])
  );
  lines.push("", "Methods:");
  lines.push(
    ...(info.methods.length
      ? info.methods.map((m) => `  ${m.name} :: ${m.signature}`)
      : ["  (none)"])
  );
  return lines.join("\n");
}

export function showModuleBuild(result: BuildResult): string {
  return [`Module ${result.module} built successfully`, ...result.messages].join("\n");
}

export function showWorkflowBuild(module: ModuleName): string {
  return `Workflow module ${module} built successfully`;
}
