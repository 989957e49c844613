import { text } from "node:stream/consumers";
import type { Command } from "commander";
import { getNStackDir, loadSettings } from "./config";
import { createFormatter } from "./output";
import { type CliCommand, runCommand } from "./run";
import { createSession, type Session } from "./session";

/**
 * Entry point shared by every command action: builds the formatter from the
 * global options, opens a session on first remote call, and turns a failed
 * call into a non-zero exit code. CliErrors propagate to main.
 */
export async function execute(program: Command, command: CliCommand): Promise<void> {
  const opts = program.opts();
  const formatter = createFormatter(opts);
  const settingsDir = getNStackDir();

  let session: Session | undefined;
  const getSession = (): Session => {
    session ??= createSession(loadSettings(settingsDir), formatter);
    return session;
  };

  try {
    const ok = await runCommand(command, {
      output: formatter,
      transport: () => getSession().transport,
      cwd: process.cwd(),
      settingsDir,
      readStdin: () => text(process.stdin),
    });
    if (!ok) {
      process.exitCode = 1;
    }
  } finally {
    await session?.close();
  }
}
