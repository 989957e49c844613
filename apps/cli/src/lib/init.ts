import * as fs from "node:fs";
import * as path from "node:path";
import YAML from "yaml";
import { BUILD_FILES, CONFIG_FILE, type ConfigFile, findBuildFile, WORKFLOW_FILE } from "./build";
import { CliError } from "./errors";

export const DEFAULT_STACK = "python";
const INITIAL_VERSION = "0.0.1-SNAPSHOT";

/**
 * Module name from a directory name: `my-classifier` → `MyClassifier`.
 */
export function moduleNameFromDir(dir: string): string {
  const capitalize = (part: string) => part.charAt(0).toUpperCase() + part.slice(1);
  const name = path
    .basename(path.resolve(dir))
    .split(/[^A-Za-z0-9]+/)
    .filter((part) => part.length > 0)
    .map(capitalize)
    .join("")
    .replace(/^[0-9]+/, "");
  return name ? capitalize(name) : "Module";
}

function workflowTemplate(name: string): string {
  return [
    `module ${name}:${INITIAL_VERSION}`,
    "",
    "// Compose registered sources, functions and sinks, e.g.",
    "// def main = Demo.Sources:0.0.1.numbers | Demo.Sinks:0.0.1.log",
    "",
  ].join("\n");
}

export interface InitOptions {
  workflow: boolean;
  stack: string;
}

/**
 * Write a module skeleton into `dir`. Returns the file written.
 */
export function initModule(dir: string, options: InitOptions): string {
  const existing = findBuildFile(dir);
  if (existing) {
    throw new CliError(
      `${existing} already exists in ${dir}; remove it before running init (build files: ${BUILD_FILES.join(", ")})`
    );
  }

  const name = moduleNameFromDir(dir);
  if (options.workflow) {
    const file = path.join(dir, WORKFLOW_FILE);
    fs.writeFileSync(file, workflowTemplate(name), "utf-8");
    return file;
  }

  const config: ConfigFile = { name: `${name}:${INITIAL_VERSION}`, stack: options.stack };
  const file = path.join(dir, CONFIG_FILE);
  fs.writeFileSync(file, YAML.stringify(config), "utf-8");
  return file;
}
