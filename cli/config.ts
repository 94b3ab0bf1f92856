import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import { z } from "zod";
import { OVERFLOW_POLICIES } from "../shared/types.js";

const CONFIG_DIR = path.join(os.homedir(), ".config", "tlv-relay");
export const CONFIG_FILE = path.join(CONFIG_DIR, "config.json");

const port = z.number().int().min(1).max(65535);

export const RelayConfigSchema = z.object({
  host: z.string().min(1).default("127.0.0.1"),
  port: port.default(7690),
  httpPort: port.default(7691),
  httpPath: z.string().min(1).default("/"),
  maxEgressBytes: z.number().int().positive().default(16 * 1024 * 1024),
  overflowPolicy: z.enum(OVERFLOW_POLICIES).default("reject"),
  pollIntervalMs: z.number().int().positive().default(1000),
  connectTimeoutMs: z.number().int().positive().default(5000),
});

export type RelayConfig = z.infer<typeof RelayConfigSchema>;

export interface LoadConfigOptions {
  /** Config file to read; defaults to $TLV_RELAY_CONFIG or ~/.config/tlv-relay/config.json */
  file?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Resolve configuration. Priority:
 * 1. Environment (TLV_RELAY_HOST, TLV_RELAY_PORT, TLV_RELAY_HTTP_PORT, TLV_RELAY_HTTP_PATH)
 * 2. Config file, if present
 * 3. Schema defaults
 * Command-line flags are applied on top by each command.
 */
export function loadConfig(options: LoadConfigOptions = {}): RelayConfig {
  const env = options.env ?? process.env;
  const file = options.file ?? env.TLV_RELAY_CONFIG ?? CONFIG_FILE;

  const raw = { ...readConfigFile(file), ...envOverrides(env) };
  const result = RelayConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${issues}`);
  }
  return result.data;
}

function readConfigFile(file: string): Record<string, unknown> {
  let text: string;
  try {
    text = fs.readFileSync(file, "utf-8");
  } catch {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new Error(`Invalid JSON in ${file}: ${err instanceof Error ? err.message : String(err)}`);
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new Error(`Invalid configuration in ${file}: expected a JSON object`);
  }
  return Object.fromEntries(Object.entries(parsed));
}

function envOverrides(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  if (env.TLV_RELAY_HOST) out.host = env.TLV_RELAY_HOST;
  if (env.TLV_RELAY_PORT) out.port = Number(env.TLV_RELAY_PORT);
  if (env.TLV_RELAY_HTTP_PORT) out.httpPort = Number(env.TLV_RELAY_HTTP_PORT);
  if (env.TLV_RELAY_HTTP_PATH) out.httpPath = env.TLV_RELAY_HTTP_PATH;
  return out;
}

/** Parse a numeric command-line value, falling back to `fallback` when absent. */
export function intOption(value: string | undefined, fallback: number, name: string): number {
  if (value === undefined) return fallback;
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) {
    throw new Error(`Invalid ${name}: ${value}`);
  }
  return n;
}
