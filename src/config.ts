import { existsSync, readFileSync } from "node:fs";
import { z } from "zod";
import type { Duration } from "./ast.js";
import { parseDuration } from "./duration.js";
import { DatebookError } from "./error.js";

const durationLiteral = z.string().transform((value, ctx): Duration => {
  try {
    return parseDuration(value);
  } catch (err) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: err instanceof Error ? err.message : `invalid duration '${value}'`,
    });
    return z.NEVER;
  }
});

// Environment values are strings; only "true" enables the flag.
const envFlag = z
  .enum(["true", "false"])
  .transform((v) => v === "true");

export const ConfigSchema = z.object({
  // Read every undesignated time as 24h.
  use24hTime: z.boolean().default(false),
  // How far around today `list` reaches.
  queryWindow: durationLiteral.default("30d"),
  // Half-width of the window `now` reports current items in.
  well: durationLiteral.default("60s"),
  logLevel: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
});

export type Config = z.output<typeof ConfigSchema>;

const EnvSchema = z.object({
  DATEBOOK_USE_24H_TIME: envFlag.optional(),
  DATEBOOK_QUERY_WINDOW: z.string().optional(),
  DATEBOOK_WELL: z.string().optional(),
  DATEBOOK_LOG_LEVEL: z.string().optional(),
});

export interface LoadConfigOptions {
  /** JSON configuration file; a missing file means defaults. */
  path?: string;
  env?: Record<string, string | undefined>;
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}

function readFile(path: string): unknown {
  if (!existsSync(path)) return {};
  try {
    return JSON.parse(readFileSync(path, "utf-8"));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw DatebookError.config(`cannot read ${path}: ${reason}`);
  }
}

/** Load configuration from an optional JSON file, then environment overrides. */
export function loadConfig(options: LoadConfigOptions = {}): Config {
  const raw = options.path === undefined ? {} : readFile(options.path);
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    throw DatebookError.config("configuration must be a JSON object");
  }

  const env = EnvSchema.safeParse(options.env ?? {});
  if (!env.success) {
    throw DatebookError.config(`invalid environment: ${describeIssues(env.error)}`);
  }

  const merged: Record<string, unknown> = { ...raw };
  const overrides = env.data;
  if (overrides.DATEBOOK_USE_24H_TIME !== undefined) {
    merged.use24hTime = overrides.DATEBOOK_USE_24H_TIME;
  }
  if (overrides.DATEBOOK_QUERY_WINDOW !== undefined) {
    merged.queryWindow = overrides.DATEBOOK_QUERY_WINDOW;
  }
  if (overrides.DATEBOOK_WELL !== undefined) {
    merged.well = overrides.DATEBOOK_WELL;
  }
  if (overrides.DATEBOOK_LOG_LEVEL !== undefined) {
    merged.logLevel = overrides.DATEBOOK_LOG_LEVEL;
  }

  const parsed = ConfigSchema.safeParse(merged);
  if (!parsed.success) {
    throw DatebookError.config(`invalid configuration: ${describeIssues(parsed.error)}`);
  }
  return parsed.data;
}

export function defaultConfig(): Config {
  return ConfigSchema.parse({});
}
