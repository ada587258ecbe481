/**
 * Application configuration
 *
 * Values come from the environment (a local .env file is loaded by the
 * logger module) and are checked against a TypeBox schema once at startup.
 */

import "dotenv/config";

import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

// ============================================================================
// Schema
// ============================================================================

export const AppConfigSchema = Type.Object({
  inventory: Type.Object({
    url: Type.String({ minLength: 1 }),
    timeoutSeconds: Type.Number({ exclusiveMinimum: 0 }),
    tlsVerify: Type.Boolean(),
  }),
  sync: Type.Object({
    intervalSeconds: Type.Number({ exclusiveMinimum: 0 }),
  }),
  dns: Type.Object({
    server: Type.String({ minLength: 1 }),
    timeoutSeconds: Type.Number({ exclusiveMinimum: 0 }),
    resolutionTemplate: Type.String({ minLength: 1 }),
    concurrency: Type.Integer({ minimum: 1 }),
  }),
  clusters: Type.Object({
    defaultDomain: Type.String({ minLength: 1 }),
    namePrefix: Type.String(),
    consoleUrlTemplate: Type.String({ minLength: 1 }),
  }),
  cache: Type.Object({
    file: Type.String({ minLength: 1 }),
  }),
  server: Type.Object({
    host: Type.String({ minLength: 1 }),
    port: Type.Integer({ minimum: 0, maximum: 65535 }),
  }),
});

export type AppConfig = Static<typeof AppConfigSchema>;

export const DEFAULT_CONSOLE_URL_TEMPLATE =
  "https://console-openshift-console.apps.{cluster_name}.{domain_name}";

export const DEFAULT_DNS_RESOLUTION_TEMPLATE =
  "api.{cluster_name}.{domain_name}";

// ============================================================================
// Errors
// ============================================================================

export class ConfigError extends Error {
  code = "CONFIG_ERROR" as const;
  issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

// ============================================================================
// Env Parsing
// ============================================================================

type Env = Record<string, string | undefined>;

function readString(env: Env, key: string, fallback: string): string {
  const value = env[key]?.trim();
  return value === undefined || value === "" ? fallback : value;
}

// Unparseable values are passed through as NaN so the schema reports them
function readNumber(env: Env, key: string, fallback: number): number {
  const value = env[key]?.trim();
  if (value === undefined || value === "") return fallback;
  return Number(value);
}

function readBoolean(
  env: Env,
  key: string,
  fallback: boolean
): boolean | string {
  const value = env[key]?.trim().toLowerCase();
  if (value === undefined || value === "") return fallback;
  if (["true", "1", "yes", "on"].includes(value)) return true;
  if (["false", "0", "no", "off"].includes(value)) return false;
  return value;
}

/**
 * Build and validate the configuration from environment variables.
 * Throws ConfigError listing every invalid setting.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const raw = {
    inventory: {
      url: readString(env, "INVENTORY_URL", "http://0.0.0.0:9000/api").replace(
        /\/+$/,
        ""
      ),
      timeoutSeconds: readNumber(env, "INVENTORY_TIMEOUT_SECONDS", 10),
      tlsVerify: readBoolean(env, "INVENTORY_TLS_VERIFY", true),
    },
    sync: {
      intervalSeconds: readNumber(env, "SYNC_INTERVAL_SECONDS", 300),
    },
    dns: {
      server: readString(env, "DNS_SERVER", "8.8.8.8"),
      timeoutSeconds: readNumber(env, "DNS_TIMEOUT_SECONDS", 2),
      resolutionTemplate: readString(
        env,
        "DNS_RESOLUTION_TEMPLATE",
        DEFAULT_DNS_RESOLUTION_TEMPLATE
      ),
      concurrency: readNumber(env, "DNS_CONCURRENCY", 10),
    },
    clusters: {
      defaultDomain: readString(env, "DEFAULT_DOMAIN", "example.com"),
      namePrefix: readString(env, "CLUSTER_NAME_PREFIX", "ocp4-").toLowerCase(),
      consoleUrlTemplate: readString(
        env,
        "CONSOLE_URL_TEMPLATE",
        DEFAULT_CONSOLE_URL_TEMPLATE
      ),
    },
    cache: {
      file: readString(env, "CACHE_FILE", "data/inventory-cache.json"),
    },
    server: {
      host: readString(env, "HOST", "0.0.0.0"),
      port: readNumber(env, "PORT", 3000),
    },
  };

  if (!Value.Check(AppConfigSchema, raw)) {
    const issues = [...Value.Errors(AppConfigSchema, raw)].map(
      (error) => `${error.path}: ${error.message}`
    );
    throw new ConfigError(issues);
  }

  return raw;
}
