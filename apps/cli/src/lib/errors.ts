/**
 * Errors raised by local CLI work (settings, project files, arguments).
 * Remote call failures never throw; they arrive as Result values.
 */
export class CliError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliError";
  }
}
