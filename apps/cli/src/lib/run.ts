/**
 * Command dispatch.
 *
 * Every command the CLI understands is one variant of CliCommand. Remote
 * commands hand (call, argument, formatter) to callServer; local ones
 * (build packaging, init, set-server) do their file work here.
 */

import { isSuccess, type Transport } from "@nstack/client";
import {
  buildCommand,
  buildWorkflowCommand,
  deleteModuleCommand,
  gcCommand,
  infoCommand,
  type ListType,
  listCommand,
  listModulesCommand,
  listProcessesCommand,
  logsCommand,
  serverLogsCommand,
  startCommand,
  stopCommand,
} from "@nstack/protocol";
import { packModule, resolveBuildTarget } from "./build";
import { getConfigPath, serverUrl, setServer } from "./config";
import { callServer } from "./dispatch";
import {
  catLogs,
  printInfo,
  printMethods,
  showDeleteMessage,
  showModuleBuild,
  showModules,
  showProcesses,
  showRemoved,
  showStartMessage,
  showStopMessage,
  showWorkflowBuild,
} from "./format";
import { initModule } from "./init";
import { formatSize, type OutputFormatter } from "./output";
import { addImport } from "./workflow";

export type CliCommand =
  | { kind: "start"; debug: boolean; workflow: string }
  | { kind: "notebook"; debug: boolean; dsl?: string }
  | { kind: "stop"; processId: string }
  | { kind: "logs"; processId: string }
  | { kind: "serverLogs" }
  | { kind: "info"; all: boolean }
  | { kind: "list"; listType: ListType | null; all: boolean }
  | { kind: "listModules"; all: boolean }
  | { kind: "deleteModule"; module: string }
  | { kind: "processes" }
  | { kind: "gc" }
  | { kind: "build" }
  | { kind: "init"; workflow: boolean; stack: string }
  | {
      kind: "setServer";
      hostname: string;
      port: string;
      userId: string;
      secretKey: string;
    };

export interface CommandContext {
  output: OutputFormatter;
  /** Created on first use, so local commands never read credentials */
  transport: () => Transport;
  cwd: string;
  settingsDir: string;
  readStdin: () => Promise<string>;
}

/**
 * Build whatever the build file in `dir` describes. Returns false on the
 * first failed call.
 */
async function runBuild(ctx: CommandContext, dir: string): Promise<boolean> {
  const target = resolveBuildTarget(dir);

  switch (target.kind) {
    case "project": {
      ctx.output.info("Building NStack Project. Please wait. This may take some time.");
      for (const moduleDir of target.modules) {
        if (!(await runBuild(ctx, moduleDir))) {
          return false;
        }
      }
      return true;
    }
    case "container": {
      ctx.output.info(
        `Building NStack Container module ${target.config.name}. Please wait. This may take some time.`
      );
      const tarball = await packModule(target.dir, target.config);
      ctx.output.debug(`Packaged ${target.dir} (${formatSize(tarball.length)})`);
      return isSuccess(await callServer(ctx, buildCommand, tarball, showModuleBuild));
    }
    case "workflow": {
      ctx.output.info(
        `Building NStack Workflow module ${target.name}. Please wait. This may take some time.`
      );
      return isSuccess(
        await callServer(ctx, buildWorkflowCommand, [target.source, target.name], showWorkflowBuild)
      );
    }
  }
}

/**
 * Run one command. Resolves to false when the command failed after
 * reporting its error.
 */
export async function runCommand(command: CliCommand, ctx: CommandContext): Promise<boolean> {
  switch (command.kind) {
    case "start":
      return isSuccess(
        await callServer(
          ctx,
          startCommand,
          [addImport(command.workflow), command.debug],
          showStartMessage
        )
      );
    case "notebook": {
      const dsl = command.dsl ?? (await ctx.readStdin());
      return isSuccess(await callServer(ctx, startCommand, [dsl, command.debug], showStartMessage));
    }
    case "stop":
      return isSuccess(
        await callServer(ctx, stopCommand, command.processId, showStopMessage(command.processId))
      );
    case "logs":
      return isSuccess(await callServer(ctx, logsCommand, command.processId, catLogs));
    case "serverLogs":
      return isSuccess(await callServer(ctx, serverLogsCommand, null, catLogs));
    case "info":
      return isSuccess(await callServer(ctx, infoCommand, command.all, printInfo));
    case "list":
      return isSuccess(
        await callServer(ctx, listCommand, [command.listType, command.all], printMethods)
      );
    case "listModules":
      return isSuccess(await callServer(ctx, listModulesCommand, command.all, showModules));
    case "deleteModule":
      return isSuccess(
        await callServer(ctx, deleteModuleCommand, command.module, showDeleteMessage)
      );
    case "processes":
      return isSuccess(
        await callServer(ctx, listProcessesCommand, null, (processes) => showProcesses(processes))
      );
    case "gc":
      return isSuccess(await callServer(ctx, gcCommand, null, showRemoved));
    case "build":
      return runBuild(ctx, ctx.cwd);
    case "init": {
      const file = initModule(ctx.cwd, { workflow: command.workflow, stack: command.stack });
      ctx.output.success(`Created ${file}`);
      return true;
    }
    case "setServer": {
      const saved = setServer(command, ctx.settingsDir);
      const url = serverUrl({
        hostname: saved.server?.hostname ?? command.hostname,
        port: saved.server?.port ?? Number(command.port),
      });
      ctx.output.success(`Server set to ${url}`);
      ctx.output.info(`Settings saved to ${getConfigPath(ctx.settingsDir)}`);
      return true;
    }
    default: {
      const unreachable: never = command;
      throw new Error(`Unhandled command: ${JSON.stringify(unreachable)}`);
    }
  }
}
