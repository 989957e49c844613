/**
 * Build file resolution and module packaging.
 *
 * A directory is built according to the first build file found:
 * - nstack-project.yaml: a list of module directories, built in order
 * - nstack.yaml: a container module, uploaded as a gzipped tarball
 * - module.nml: a workflow module, uploaded as source
 */

import * as fs from "node:fs";
import * as path from "node:path";
import type { DSLSource, ModuleName } from "@nstack/protocol";
import { create } from "tar";
import YAML from "yaml";
import { z } from "zod";
import { CliError } from "./errors";
import { getDslName } from "./workflow";

export const PROJECT_FILE = "nstack-project.yaml";
export const CONFIG_FILE = "nstack.yaml";
export const WORKFLOW_FILE = "module.nml";

export const BUILD_FILES = [PROJECT_FILE, CONFIG_FILE, WORKFLOW_FILE] as const;

/** Never packaged */
const EXCLUDED = new Set([".git", "node_modules"]);

// ============================================================================
// File Schemas
// ============================================================================

export const ProjectFileSchema = z.object({
  modules: z.array(z.string().min(1)).min(1),
});
export type ProjectFile = z.infer<typeof ProjectFileSchema>;

export const ConfigFileSchema = z.object({
  name: z.string().min(1),
  stack: z.string().min(1),
  /** Files to package besides nstack.yaml; defaults to the whole directory */
  files: z.array(z.string().min(1)).optional(),
});
export type ConfigFile = z.infer<typeof ConfigFileSchema>;

// ============================================================================
// Resolution
// ============================================================================

export type BuildTarget =
  | { kind: "project"; modules: string[] }
  | { kind: "container"; dir: string; config: ConfigFile }
  | { kind: "workflow"; name: ModuleName; source: DSLSource };

function readYamlFile<T>(file: string, schema: z.ZodType<T>): T {
  let raw: unknown;
  try {
    raw = YAML.parse(fs.readFileSync(file, "utf-8"));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new CliError(`Cannot read ${path.basename(file)}: ${reason}`);
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => (i.path.length ? `${i.path.join(".")}: ${i.message}` : i.message))
      .join("; ");
    throw new CliError(`Invalid ${path.basename(file)}: ${issues}`);
  }
  return parsed.data;
}

export function findBuildFile(dir: string): string | undefined {
  return BUILD_FILES.find((name) => fs.existsSync(path.join(dir, name)));
}

export function resolveBuildTarget(dir: string): BuildTarget {
  const projectPath = path.join(dir, PROJECT_FILE);
  if (fs.existsSync(projectPath)) {
    const project = readYamlFile(projectPath, ProjectFileSchema);
    return { kind: "project", modules: project.modules.map((m) => path.resolve(dir, m)) };
  }

  const configPath = path.join(dir, CONFIG_FILE);
  if (fs.existsSync(configPath)) {
    return { kind: "container", dir, config: readYamlFile(configPath, ConfigFileSchema) };
  }

  const workflowPath = path.join(dir, WORKFLOW_FILE);
  if (fs.existsSync(workflowPath)) {
    const source = fs.readFileSync(workflowPath, "utf-8");
    return { kind: "workflow", name: getDslName(source, WORKFLOW_FILE), source };
  }

  throw new CliError(`A valid nstack build file (${BUILD_FILES.join(", ")}) was not found`);
}

// ============================================================================
// Packaging
// ============================================================================

function packageEntries(dir: string, config: ConfigFile): string[] {
  if (config.files) {
    for (const file of config.files) {
      if (!fs.existsSync(path.join(dir, file))) {
        throw new CliError(`File listed in ${CONFIG_FILE} not found: ${file}`);
      }
    }
    return [CONFIG_FILE, ...config.files.filter((f) => f !== CONFIG_FILE)];
  }
  return fs
    .readdirSync(dir)
    .filter((name) => !EXCLUDED.has(name))
    .sort();
}

/**
 * Package a container module directory as a gzipped tarball.
 */
export async function packModule(dir: string, config: ConfigFile): Promise<Uint8Array> {
  const stream = create(
    {
      gzip: true,
      cwd: dir,
      portable: true,
      filter: (entry: string) => !entry.split(/[\\/]/).some((segment) => EXCLUDED.has(segment)),
    },
    packageEntries(dir, config)
  );

  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(chunk);
  }
  return new Uint8Array(Buffer.concat(chunks));
}
