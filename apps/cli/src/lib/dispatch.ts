import { formatResult, type Result } from "@nstack/client";
import type { ApiCall } from "@nstack/protocol";
import type { CommandContext } from "./run";

/**
 * Make one remote call and print its outcome. Success values go to stdout
 * through `formatter` (or as JSON/YAML); errors go to stderr.
 */
export async function callServer<A, B>(
  ctx: CommandContext,
  call: ApiCall<A, B>,
  arg: A,
  formatter: (value: B) => string
): Promise<Result<B>> {
  const result = await ctx.transport().call(call, arg);

  if (result.type === "success") {
    ctx.output.output(result.value, formatter);
  } else {
    ctx.output.error(formatResult(result, formatter));
  }
  return result;
}
