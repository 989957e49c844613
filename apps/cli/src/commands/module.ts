import type { Command } from "commander";
import { DEFAULT_STACK } from "../lib/init";
import { execute } from "../lib/execute";

export function registerModuleCommands(program: Command): void {
  program
    .command("init")
    .description("Create a module skeleton in the current directory")
    .option("-w, --workflow", "create a workflow module (module.nml)", false)
    .option("-s, --stack <stack>", "language stack of a container module", DEFAULT_STACK)
    .action(async (options: { workflow: boolean; stack: string }) => {
      await execute(program, { kind: "init", workflow: options.workflow, stack: options.stack });
    });

  program
    .command("build")
    .description("Build the module or project in the current directory")
    .action(async () => {
      await execute(program, { kind: "build" });
    });

  program
    .command("list-modules")
    .description("List registered modules")
    .option("-a, --all", "include modules of the base image", false)
    .action(async (options: { all: boolean }) => {
      await execute(program, { kind: "listModules", all: options.all });
    });

  program
    .command("delete")
    .description("Delete a registered module")
    .argument("<module>", "fully-qualified module name")
    .action(async (module: string) => {
      await execute(program, { kind: "deleteModule", module });
    });

  program
    .command("gc")
    .description("Remove modules no longer referenced")
    .action(async () => {
      await execute(program, { kind: "gc" });
    });
}
