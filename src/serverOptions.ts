import { randomUUID } from "node:crypto";
import process from "node:process";

import { readEnum, readInt, readOptionalString, type EnvSource } from "./config/env.js";
import { LOG_LEVELS, type LogLevel } from "./logger.js";
import { DEFAULT_SANDBOX_LIMITS, type SandboxLimits } from "./sandbox/executionSandbox.js";

/** HTTP exposure; ignored when `enabled` is false. */
export interface HttpRuntimeOptions {
  enabled: boolean;
  port: number;
  host: string;
  /** Absolute endpoint path serving MCP calls. */
  path: string;
}

export interface ServerOptions {
  enableStdio: boolean;
  http: HttpRuntimeOptions;
  /** Print the helper summary and exit. */
  info: boolean;
  serversFile: string | null;
  logFile: string | null;
  logLevel: LogLevel;
  defaultTimeoutSeconds: number;
  maxTimeoutSeconds: number;
  limits: SandboxLimits;
}

type Mutable<T> = { -readonly [K in keyof T]: T[K] };

/** Hard ceiling on the per-execution timeout, whatever the configuration says. */
export const ABSOLUTE_MAX_TIMEOUT_SECONDS = 3_600;

const FLAG_WITH_VALUE = new Set([
  "--http-port",
  "--http-host",
  "--http-path",
  "--servers-file",
  "--log-file",
  "--log-level",
  "--default-timeout",
  "--max-timeout",
  "--max-code-bytes",
  "--max-output-bytes",
  "--max-tool-calls",
  "--max-concurrency",
]);

function parsePositiveInteger(value: string, flag: string): number {
  const num = Number(value);
  if (!Number.isFinite(num) || !Number.isInteger(num) || num <= 0) {
    throw new Error(`Value ${value} for ${flag} must be a positive integer.`);
  }
  return num;
}

function parseNonEmpty(value: string, flag: string): string {
  const cleaned = value.trim();
  if (!cleaned.length) {
    throw new Error(`Value for ${flag} cannot be empty.`);
  }
  return cleaned;
}

function normalizeHttpPath(raw: string): string {
  const cleaned = parseNonEmpty(raw, "--http-path");
  return cleaned.startsWith("/") ? cleaned : `/${cleaned}`;
}

function parseLogLevel(value: string): LogLevel {
  const normalised = value.trim().toLowerCase();
  const level = LOG_LEVELS.find((candidate) => candidate === normalised);
  if (!level) {
    throw new Error(`Value ${value} for --log-level must be one of ${LOG_LEVELS.join(", ")}.`);
  }
  return level;
}

/** Defaults read from `SANDBOX_*` environment variables. */
export function defaultServerOptions(env: EnvSource = process.env): ServerOptions {
  return {
    enableStdio: true,
    http: { enabled: false, port: 4000, host: "127.0.0.1", path: "/mcp" },
    info: false,
    serversFile: readOptionalString("SANDBOX_SERVERS_FILE", env) ?? null,
    logFile: readOptionalString("SANDBOX_LOG_FILE", env) ?? null,
    logLevel: readEnum("SANDBOX_LOG_LEVEL", LOG_LEVELS, "info", env),
    defaultTimeoutSeconds: readInt("SANDBOX_DEFAULT_TIMEOUT_SECONDS", 30, { min: 1 }, env),
    maxTimeoutSeconds: readInt("SANDBOX_MAX_TIMEOUT_SECONDS", 300, { min: 1, max: ABSOLUTE_MAX_TIMEOUT_SECONDS }, env),
    limits: {
      maxCodeBytes: readInt("SANDBOX_MAX_CODE_BYTES", DEFAULT_SANDBOX_LIMITS.maxCodeBytes, { min: 1 }, env),
      maxOutputBytes: readInt("SANDBOX_MAX_OUTPUT_BYTES", DEFAULT_SANDBOX_LIMITS.maxOutputBytes, { min: 1 }, env),
      maxToolCalls: readInt("SANDBOX_MAX_TOOL_CALLS", DEFAULT_SANDBOX_LIMITS.maxToolCalls, { min: 1 }, env),
      maxConcurrency: readInt("SANDBOX_MAX_CONCURRENCY", DEFAULT_SANDBOX_LIMITS.maxConcurrency, { min: 1 }, env),
    },
  };
}

/**
 * Parses CLI arguments (`process.argv.slice(2)`) over the environment
 * defaults. Flags take `--flag=value` or `--flag value`; unknown flags are
 * ignored and malformed values throw.
 */
export function parseServerOptions(argv: readonly string[], env: EnvSource = process.env): ServerOptions {
  const options = defaultServerOptions(env);
  const limits: Mutable<SandboxLimits> = { ...options.limits };

  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index];
    if (arg === undefined || !arg.startsWith("--")) {
      continue;
    }

    const [flag = arg, inlineValue] = arg.split("=", 2);
    let value = inlineValue;

    if (FLAG_WITH_VALUE.has(flag) && (value === undefined || value === "")) {
      const next = argv[index + 1];
      if (next === undefined || next.startsWith("--")) {
        throw new Error(`Flag ${flag} requires a value.`);
      }
      value = next;
      index += 1;
    }

    switch (flag) {
      case "--no-stdio":
        options.enableStdio = false;
        break;
      case "--info":
        options.info = true;
        break;
      case "--http":
        options.http.enabled = true;
        break;
      case "--http-port":
        options.http.port = parsePositiveInteger(value ?? "", flag);
        options.http.enabled = true;
        break;
      case "--http-host":
        options.http.host = parseNonEmpty(value ?? "", flag);
        options.http.enabled = true;
        break;
      case "--http-path":
        options.http.path = normalizeHttpPath(value ?? "");
        options.http.enabled = true;
        break;
      case "--servers-file":
        options.serversFile = parseNonEmpty(value ?? "", flag);
        break;
      case "--log-file":
        options.logFile = parseNonEmpty(value ?? "", flag);
        break;
      case "--log-level":
        options.logLevel = parseLogLevel(value ?? "");
        break;
      case "--default-timeout":
        options.defaultTimeoutSeconds = parsePositiveInteger(value ?? "", flag);
        break;
      case "--max-timeout":
        options.maxTimeoutSeconds = parsePositiveInteger(value ?? "", flag);
        break;
      case "--max-code-bytes":
        limits.maxCodeBytes = parsePositiveInteger(value ?? "", flag);
        break;
      case "--max-output-bytes":
        limits.maxOutputBytes = parsePositiveInteger(value ?? "", flag);
        break;
      case "--max-tool-calls":
        limits.maxToolCalls = parsePositiveInteger(value ?? "", flag);
        break;
      case "--max-concurrency":
        limits.maxConcurrency = parsePositiveInteger(value ?? "", flag);
        break;
      default:
        break;
    }
  }

  if (options.maxTimeoutSeconds > ABSOLUTE_MAX_TIMEOUT_SECONDS) {
    throw new Error(`--max-timeout cannot exceed ${ABSOLUTE_MAX_TIMEOUT_SECONDS} seconds.`);
  }
  if (options.defaultTimeoutSeconds > options.maxTimeoutSeconds) {
    throw new Error(
      `Default timeout (${options.defaultTimeoutSeconds}s) cannot exceed the maximum timeout (${options.maxTimeoutSeconds}s).`,
    );
  }
  if (!options.enableStdio && !options.http.enabled && !options.info) {
    throw new Error("--no-stdio requires the HTTP transport (--http-port, --http-host or --http-path).");
  }

  return { ...options, limits };
}

/** Identifier for Streamable HTTP sessions. */
export function createHttpSessionId(): string {
  return randomUUID();
}
