import { resolve, dirname } from "node:path";
import { fileURLToPath } from "node:url";

/** Supported deployment environments. */
export type Environment = "development" | "staging" | "production";

export type LogLevel = "debug" | "info" | "warn" | "error";

/** Shape of audit configuration. */
export interface AuditConfig {
  /** Current environment. */
  env: Environment;
  /** Minimum level written by the structured logger. */
  logLevel: LogLevel;
  /** Number of nodes of one stage allowed to run at the same time. */
  workerPoolSize: number;
  /** Number of generator calls allowed in flight across all nodes. */
  maxConcurrentCalls: number;
  /** Per-node timeout; a node still running after this is marked failed. */
  nodeTimeoutMs: number;
  /** Deadline for a whole run; remaining stages are abandoned when it passes. */
  runTimeoutMs: number;
  /** Attempts the structured extraction adapter makes per opinion. */
  maxAttempts: number;
  /** First backoff delay after a rate-limited generator call. */
  baseBackoffMs: number;
  /** Base URL of the chat-completions style generator endpoint. */
  generatorBaseUrl: string;
  /** API key for the generator endpoint. */
  generatorApiKey?: string;
  /** Path of the rubric document. */
  rubricPath: string;
  /** Directory where reports are written. */
  outputDir: string;
}

/** Root of the checkout; bundled data files are resolved against it. */
export const REPO_ROOT = resolve(dirname(fileURLToPath(import.meta.url)), "..", "..", "..");

const SHARED_DEFAULTS = {
  workerPoolSize: 4,
  maxConcurrentCalls: 4,
  nodeTimeoutMs: 120_000,
  runTimeoutMs: 900_000,
  maxAttempts: 3,
  baseBackoffMs: 1_000,
  generatorBaseUrl: "https://api.openai.com/v1",
  rubricPath: resolve(REPO_ROOT, "rubric", "rubric.json"),
  outputDir: "audit",
};

const DEFAULTS: Record<Environment, AuditConfig> = {
  development: {
    ...SHARED_DEFAULTS,
    env: "development",
    logLevel: "debug",
  },
  staging: {
    ...SHARED_DEFAULTS,
    env: "staging",
    logLevel: "info",
  },
  production: {
    ...SHARED_DEFAULTS,
    env: "production",
    logLevel: "warn",
    workerPoolSize: 8,
  },
};

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

function isEnvironment(value: string): value is Environment {
  return value === "development" || value === "staging" || value === "production";
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function positiveInt(raw: string | undefined): number | undefined {
  if (!raw) return undefined;
  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed <= 0) return undefined;
  return parsed;
}

/**
 * Load configuration for the given (or detected) environment.
 *
 * Resolution order:
 *  1. Explicit `overrides` argument.
 *  2. Environment variables (`LOG_LEVEL`, `AUDIT_*`, `GENERATOR_BASE_URL`,
 *     `OPENAI_API_KEY`, `RUBRIC_PATH`, `OUTPUT_DIR`).
 *  3. Defaults of the environment named by `NODE_ENV`, falling back to
 *     `"development"`.
 */
export function loadConfig(overrides: Partial<AuditConfig> = {}, source: NodeJS.ProcessEnv = process.env): AuditConfig {
  const envRaw = overrides.env ?? source.NODE_ENV ?? "development";
  const env: Environment = isEnvironment(envRaw) ? envRaw : "development";

  const base: AuditConfig = { ...DEFAULTS[env] };

  if (source.LOG_LEVEL && isLogLevel(source.LOG_LEVEL)) {
    base.logLevel = source.LOG_LEVEL;
  }
  base.workerPoolSize = positiveInt(source.AUDIT_WORKER_POOL_SIZE) ?? base.workerPoolSize;
  base.maxConcurrentCalls = positiveInt(source.AUDIT_MAX_CONCURRENT_CALLS) ?? base.maxConcurrentCalls;
  base.nodeTimeoutMs = positiveInt(source.AUDIT_NODE_TIMEOUT_MS) ?? base.nodeTimeoutMs;
  base.runTimeoutMs = positiveInt(source.AUDIT_RUN_TIMEOUT_MS) ?? base.runTimeoutMs;
  base.maxAttempts = positiveInt(source.AUDIT_MAX_ATTEMPTS) ?? base.maxAttempts;
  base.baseBackoffMs = positiveInt(source.AUDIT_BASE_BACKOFF_MS) ?? base.baseBackoffMs;
  if (source.GENERATOR_BASE_URL) {
    base.generatorBaseUrl = source.GENERATOR_BASE_URL;
  }
  if (source.OPENAI_API_KEY) {
    base.generatorApiKey = source.OPENAI_API_KEY;
  }
  if (source.RUBRIC_PATH) {
    base.rubricPath = source.RUBRIC_PATH;
  }
  if (source.OUTPUT_DIR) {
    base.outputDir = source.OUTPUT_DIR;
  }

  return Object.freeze({ ...base, ...overrides, env });
}
