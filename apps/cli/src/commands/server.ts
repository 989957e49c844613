import { type ListType, ListTypeSchema } from "@nstack/protocol";
import { type Command, InvalidArgumentError } from "commander";
import { execute } from "../lib/execute";

function parseListType(value: string): ListType {
  const parsed = ListTypeSchema.safeParse(value);
  if (!parsed.success) {
    throw new InvalidArgumentError(`Use one of: ${ListTypeSchema.options.join(", ")}.`);
  }
  return parsed.data;
}

export function registerServerCommands(program: Command): void {
  program
    .command("info")
    .description("Show server version, modules, processes and methods")
    .option("-a, --all", "include entries of the base image", false)
    .action(async (options: { all: boolean }) => {
      await execute(program, { kind: "info", all: options.all });
    });

  program
    .command("list")
    .description("List registered methods, optionally of one kind")
    .argument("[type]", `one of: ${ListTypeSchema.options.join(", ")}`, parseListType)
    .option("-a, --all", "include methods of the base image", false)
    .action(async (listType: ListType | undefined, options: { all: boolean }) => {
      await execute(program, { kind: "list", listType: listType ?? null, all: options.all });
    });

  program
    .command("server-logs")
    .description("Show the server's own logs")
    .action(async () => {
      await execute(program, { kind: "serverLogs" });
    });

  // ========================================================================
  // Configuration
  // ========================================================================

  program
    .command("set-server")
    .description("Store the server address and credentials")
    .argument("<hostname>", "server host name")
    .argument("<port>", "server API port")
    .argument("<user-id>", "user identifier")
    .argument("<secret-key>", "secret key used to sign requests")
    .action(async (hostname: string, port: string, userId: string, secretKey: string) => {
      await execute(program, { kind: "setServer", hostname, port, userId, secretKey });
    });
}
