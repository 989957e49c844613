import { Command, CommanderError } from "commander";
import { registerModuleCommands } from "../commands/module";
import { registerProcessCommands } from "../commands/process";
import { registerServerCommands } from "../commands/server";
import { versionMessage } from "./version";

/** Where commander and main write; defaults to the process streams */
export interface ProgramOutput {
  writeOut: (text: string) => void;
  writeErr: (text: string) => void;
}

const processOutput: ProgramOutput = {
  writeOut: (text) => process.stdout.write(text),
  writeErr: (text) => process.stderr.write(text),
};

export function createProgram(output: ProgramOutput = processOutput): Command {
  const program = new Command();

  // Subcommands inherit output and exit settings when they are created
  program
    .configureOutput(output)
    .name("nstack")
    .description("CLI for the NStack server")
    .version(versionMessage(), "--version", "show the CLI version")
    .option("-f, --format <type>", "output format: text|json|yaml", "text")
    .option("-v, --verbose", "verbose output")
    .option("-q, --quiet", "quiet mode")
    .exitOverride();

  registerProcessCommands(program);
  registerModuleCommands(program);
  registerServerCommands(program);

  return program;
}

/**
 * Run the CLI on `argv` and resolve to the process exit status.
 */
export async function runCli(argv: string[], output: ProgramOutput = processOutput): Promise<number> {
  const program = createProgram(output);

  if (argv.length <= 2) {
    program.outputHelp({ error: true });
    return 1;
  }

  try {
    await program.parseAsync(argv);
    return Number(process.exitCode ?? 0);
  } catch (error: unknown) {
    // --help, --version and usage errors; commander has already printed them
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    output.writeErr(`Error: ${error instanceof Error ? error.message : String(error)}\n`);
    return 1;
  }
}
