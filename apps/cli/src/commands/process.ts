import type { Command } from "commander";
import { execute } from "../lib/execute";

export function registerProcessCommands(program: Command): void {
  // ========================================================================
  // Start
  // ========================================================================

  program
    .command("start")
    .description("Start a workflow as a new process")
    .argument("<workflow>", "fully-qualified workflow, e.g. Demo.Flows:0.0.1.main")
    .option("-d, --debug", "run the process in debug mode", false)
    .action(async (workflow: string, options: { debug: boolean }) => {
      await execute(program, { kind: "start", workflow, debug: options.debug });
    });

  program
    .command("notebook")
    .description("Start a process from workflow DSL, read from stdin when not given")
    .argument("[dsl]", "workflow DSL to run")
    .option("-d, --debug", "run the process in debug mode", false)
    .action(async (dsl: string | undefined, options: { debug: boolean }) => {
      await execute(program, { kind: "notebook", debug: options.debug, dsl });
    });

  // ========================================================================
  // Running Processes
  // ========================================================================

  program
    .command("stop")
    .description("Stop a running process")
    .argument("<process-id>", "process to stop")
    .action(async (processId: string) => {
      await execute(program, { kind: "stop", processId });
    });

  program
    .command("ps")
    .description("List running processes")
    .action(async () => {
      await execute(program, { kind: "processes" });
    });

  program
    .command("logs")
    .description("Show the logs of a process")
    .argument("<process-id>", "process whose logs to show")
    .action(async (processId: string) => {
      await execute(program, { kind: "logs", processId });
    });
}
