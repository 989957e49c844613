import type { DSLSource, ModuleName } from "@nstack/protocol";
import { CliError } from "./errors";

const MODULE_DECLARATION = /^\s*module\s+([A-Za-z][\w.]*(?::[\w.-]+)?)/m;

/**
 * Turn a fully-qualified workflow reference into a runnable DSL snippet:
 *
 *   Demo.Flows:0.0.1.main  →  import Demo.Flows:0.0.1 as M
 *                              M.main
 */
export function addImport(workflow: string): DSLSource {
  const parts = workflow.split(".");
  const module = parts.slice(0, -1).join(".");
  if (parts.length < 2 || module.length === 0) {
    throw new CliError(
      `Workflow "${workflow}" must be fully qualified, e.g. Demo.Flows:0.0.1.main`
    );
  }
  return `import ${module} as M\n${workflow.replace(module, "M")}`;
}

/**
 * Name of the module declared in a workflow source file.
 */
export function getDslName(source: DSLSource, file = "module.nml"): ModuleName {
  const match = MODULE_DECLARATION.exec(source);
  const name = match?.[1];
  if (!name) {
    throw new CliError(`No module declaration found in ${file}`);
  }
  return name;
}
