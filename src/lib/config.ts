// src/lib/config.ts
import * as path from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { constants } from "./constants.js";
import { InvalidConfigError } from "./errors.js";

// <package>/public, from both src/lib/ and dist/lib/
const __dirname = path.dirname(fileURLToPath(import.meta.url));
const DEFAULT_PUBLIC_DIR = path.resolve(__dirname, "../../public");

const ConfigSchema = z.object({
  port: z.coerce.number().int().min(1).max(65_535),
  host: z.string().min(1),
  toolBin: z.string().min(1),
  toolSubcommand: z.string().min(1),
  timeoutMs: z.coerce.number().int().positive(),
  maxBufferBytes: z.coerce.number().int().positive(),
  corsOrigins: z.array(z.string().min(1)).min(1),
  publicDir: z.string().min(1),
});

export type GatewayConfig = z.infer<typeof ConfigSchema>;

/** Unvalidated config values, as they arrive from env vars or CLI flags. */
export type ConfigInput = {
  [K in keyof GatewayConfig]?: GatewayConfig[K] extends number
    ? number | string
    : GatewayConfig[K];
};

type Env = Record<string, string | undefined>;

const ENV_KEYS: Record<Exclude<keyof GatewayConfig, "corsOrigins">, string> = {
  port: "MUP1_GATEWAY_PORT",
  host: "MUP1_GATEWAY_HOST",
  toolBin: "MUP1_GATEWAY_TOOL",
  toolSubcommand: "MUP1_GATEWAY_SUBCOMMAND",
  timeoutMs: "MUP1_GATEWAY_TIMEOUT_MS",
  maxBufferBytes: "MUP1_GATEWAY_MAX_BUFFER",
  publicDir: "MUP1_GATEWAY_PUBLIC_DIR",
};

const CORS_ENV_KEY = "MUP1_GATEWAY_CORS_ORIGINS";

export const DEFAULT_CONFIG: GatewayConfig = {
  port: constants.DEFAULT_PORT,
  host: constants.DEFAULT_HOST,
  toolBin: constants.TOOL_BIN,
  toolSubcommand: constants.TOOL_SUBCOMMAND,
  timeoutMs: constants.TOOL_TIMEOUT,
  maxBufferBytes: constants.TOOL_MAX_BUFFER,
  corsOrigins: ["*"],
  publicDir: DEFAULT_PUBLIC_DIR,
};

function splitList(value: string): string[] {
  return value.split(",").map((s) => s.trim()).filter(Boolean);
}

function fromEnv(env: Env): ConfigInput {
  const input: ConfigInput = {};
  for (const [key, envKey] of Object.entries(ENV_KEYS)) {
    const value = env[envKey];
    if (value !== undefined && value !== "") {
      Object.assign(input, { [key]: value });
    }
  }
  const cors = env[CORS_ENV_KEY];
  if (cors !== undefined && cors !== "") input.corsOrigins = splitList(cors);
  return input;
}

function definedOnly(input: ConfigInput): ConfigInput {
  const out: ConfigInput = {};
  for (const [key, value] of Object.entries(input)) {
    if (value !== undefined) Object.assign(out, { [key]: value });
  }
  return out;
}

/**
 * Resolve the gateway configuration.
 * Precedence, lowest first: defaults, environment, explicit overrides.
 */
export function loadConfig(
  env: Env = process.env,
  overrides: ConfigInput = {},
): GatewayConfig {
  const result = ConfigSchema.safeParse({
    ...DEFAULT_CONFIG,
    ...fromEnv(env),
    ...definedOnly(overrides),
  });
  if (!result.success) {
    throw new InvalidConfigError(
      result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
    );
  }
  return result.data;
}
