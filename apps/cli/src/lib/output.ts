import chalk, { Chalk, type ChalkInstance } from "chalk";
import YAML from "yaml";
import { z } from "zod";
import { CliError } from "./errors";

export const OutputFormatSchema = z.enum(["text", "json", "yaml"]);
export type OutputFormat = z.infer<typeof OutputFormatSchema>;

/** Where output lines go; defaults to the console */
export interface OutputSink {
  out: (text: string) => void;
  err: (text: string) => void;
}

export interface OutputOptions {
  format: OutputFormat;
  quiet: boolean;
  verbose: boolean;
  /** Defaults to chalk's terminal detection */
  colors?: boolean;
  sink?: OutputSink;
}

const consoleSink: OutputSink = {
  out: (text) => console.log(text),
  err: (text) => console.error(text),
};

export class OutputFormatter {
  private readonly sink: OutputSink;
  private readonly chalk: ChalkInstance;

  constructor(private options: OutputOptions) {
    this.sink = options.sink ?? consoleSink;
    this.chalk = options.colors === false ? new Chalk({ level: 0 }) : chalk;
  }

  get format(): OutputFormat {
    return this.options.format;
  }

  // Output a call's return value
  output<T>(data: T, textFormatter: (data: T) => string): void {
    switch (this.options.format) {
      case "json":
        this.sink.out(JSON.stringify(data, null, 2));
        break;
      case "yaml":
        this.sink.out(YAML.stringify(data).trimEnd());
        break;
      default:
        if (this.options.quiet) {
          return;
        }
        this.sink.out(textFormatter(data));
    }
  }

  success(message: string): void {
    if (!this.options.quiet) {
      this.sink.out(`${this.chalk.green("✓")} ${message}`);
    }
  }

  error(message: string): void {
    this.sink.err(`${this.chalk.red("✗")} ${message}`);
  }

  // Shown even with --quiet
  warn(message: string): void {
    this.sink.err(`${this.chalk.yellow("⚠")} ${message}`);
  }

  info(message: string): void {
    if (!this.options.quiet) {
      this.sink.out(`${this.chalk.blue("ℹ")} ${message}`);
    }
  }

  // Only with --verbose
  debug(message: string): void {
    if (this.options.verbose) {
      this.sink.err(`${this.chalk.gray("⋯")} ${this.chalk.gray(message)}`);
    }
  }
}

// Helper to create formatter from command options
export function createFormatter(options: {
  format?: string;
  quiet?: boolean;
  verbose?: boolean;
}): OutputFormatter {
  const format = OutputFormatSchema.safeParse(options.format ?? "text");
  if (!format.success) {
    throw new CliError(
      `Unknown output format "${options.format}". Use one of: ${OutputFormatSchema.options.join(", ")}`
    );
  }
  return new OutputFormatter({
    format: format.data,
    quiet: options.quiet || false,
    verbose: options.verbose || false,
  });
}

// Format relative time
export function formatRelativeTime(date: Date | number | string, now: number = Date.now()): string {
  const timestamp = typeof date === "number" ? date : new Date(date).getTime();
  if (Number.isNaN(timestamp)) {
    return String(date);
  }
  const diff = now - timestamp;

  const seconds = Math.floor(diff / 1000);
  const minutes = Math.floor(seconds / 60);
  const hours = Math.floor(minutes / 60);
  const days = Math.floor(hours / 24);

  if (days > 30) {
    return new Date(timestamp).toISOString().slice(0, 10);
  }
  if (days > 0) return `${days}d ago`;
  if (hours > 0) return `${hours}h ago`;
  if (minutes > 0) return `${minutes}m ago`;
  return "just now";
}

// Format file size
export function formatSize(bytes: number): string {
  if (bytes === 0) return "0 B";
  const units = ["B", "KB", "MB", "GB", "TB"];
  const i = Math.min(Math.floor(Math.log(bytes) / Math.log(1024)), units.length - 1);
  const size = bytes / 1024 ** i;
  return `${size.toFixed(i === 0 ? 0 : 2)} ${units[i]}`;
}
