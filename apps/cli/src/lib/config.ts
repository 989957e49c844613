import { randomUUID } from "node:crypto";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import type { Credentials } from "@nstack/client";
import { DEFAULT_API_PORT, DEFAULT_SERVER_HOST } from "@nstack/protocol";
import { z } from "zod";
import { CliError } from "./errors";

// ============================================================================
// Settings File
// ============================================================================

const PortSchema = z.number().int().min(1).max(65535);

export const SettingsFileSchema = z.object({
  server: z
    .object({
      hostname: z.string().min(1).optional(),
      port: PortSchema.optional(),
      /** Disables TLS certificate validation; see createHttpClient */
      allowSelfSignedCertificates: z.boolean().optional(),
    })
    .optional(),
  auth: z
    .object({
      userId: z.string().min(1),
      secretKey: z.string().min(1),
    })
    .optional(),
  installId: z.string().uuid().optional(),
});
export type SettingsFile = z.infer<typeof SettingsFileSchema>;

/**
 * Settings resolved once per process and passed explicitly to the session.
 */
export interface Settings {
  hostname: string;
  port: number;
  allowSelfSignedCertificates: boolean;
  credentials: Credentials;
}

// Servers are deployed with self-signed certificates until the CLI ships a
// root certificate of its own.
const DEFAULT_ALLOW_SELF_SIGNED = true;

// ============================================================================
// Paths
// ============================================================================

export function getNStackDir(env: NodeJS.ProcessEnv = process.env): string {
  return env.NSTACK_HOME || path.join(os.homedir(), ".nstack");
}

export function getConfigPath(dir: string = getNStackDir()): string {
  return path.join(dir, "config.json");
}

function ensureDir(dir: string): void {
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true, mode: 0o700 });
  }
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((i) => (i.path.length ? `${i.path.join(".")}: ${i.message}` : i.message))
    .join("; ");
}

// ============================================================================
// Load and Save
// ============================================================================

export function loadSettingsFile(dir: string = getNStackDir()): SettingsFile {
  const configPath = getConfigPath(dir);
  if (!fs.existsSync(configPath)) {
    return {};
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configPath, "utf-8"));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new CliError(`Cannot read settings from ${configPath}: ${reason}`);
  }

  const parsed = SettingsFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new CliError(`Invalid settings in ${configPath}: ${describeIssues(parsed.error)}`);
  }
  return parsed.data;
}

export function saveSettingsFile(file: SettingsFile, dir: string = getNStackDir()): void {
  ensureDir(dir);
  fs.writeFileSync(getConfigPath(dir), JSON.stringify(file, null, 2), {
    encoding: "utf-8",
    mode: 0o600,
  });
}

function parsePort(value: string, source: string): number {
  const port = PortSchema.safeParse(Number(value));
  if (!port.success) {
    throw new CliError(`Invalid port in ${source}: ${value}`);
  }
  return port.data;
}

/**
 * Resolve settings from the settings file, environment and defaults.
 */
export function loadSettings(
  dir: string = getNStackDir(),
  env: NodeJS.ProcessEnv = process.env
): Settings {
  const file = loadSettingsFile(dir);

  return {
    hostname: env.NSTACK_SERVER_HOST || file.server?.hostname || DEFAULT_SERVER_HOST,
    port: env.NSTACK_SERVER_PORT
      ? parsePort(env.NSTACK_SERVER_PORT, "NSTACK_SERVER_PORT")
      : (file.server?.port ?? DEFAULT_API_PORT),
    allowSelfSignedCertificates:
      file.server?.allowSelfSignedCertificates ?? DEFAULT_ALLOW_SELF_SIGNED,
    credentials: {
      auth: file.auth,
      installId: file.installId,
    },
  };
}

export function serverUrl(settings: Pick<Settings, "hostname" | "port">): string {
  return `https://${settings.hostname}:${settings.port}/`;
}

// ============================================================================
// set-server
// ============================================================================

export interface ServerSettingsInput {
  hostname: string;
  port: string;
  userId: string;
  secretKey: string;
}

/**
 * Store server address and credentials, keeping an existing install id
 * and creating one on first use.
 */
export function setServer(input: ServerSettingsInput, dir: string = getNStackDir()): SettingsFile {
  const file = loadSettingsFile(dir);
  const next: SettingsFile = {
    ...file,
    server: {
      ...file.server,
      hostname: input.hostname,
      port: parsePort(input.port, "port argument"),
    },
    auth: { userId: input.userId, secretKey: input.secretKey },
    installId: file.installId ?? randomUUID(),
  };

  // Anything saved here must load again
  const checked = SettingsFileSchema.safeParse(next);
  if (!checked.success) {
    throw new CliError(`Invalid server settings: ${describeIssues(checked.error)}`);
  }
  saveSettingsFile(checked.data, dir);
  return checked.data;
}
