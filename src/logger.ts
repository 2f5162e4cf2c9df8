import { Buffer } from "node:buffer";
import { appendFile, mkdir, rename, rm, stat } from "node:fs/promises";
import { dirname } from "node:path";
import process from "node:process";

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const LEVEL_RANK: Readonly<Record<LogLevel, number>> = { debug: 0, info: 1, warn: 2, error: 3 };

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  payload?: unknown;
}

/** Minimal writable surface used by the logger; `process.stderr` satisfies it. */
export interface LogSink {
  write(chunk: string): unknown;
}

export interface LoggerOptions {
  /** Mirror every line into this file as well. */
  readonly logFile?: string | null;
  /** Entries below this level are dropped. Defaults to `info`. */
  readonly level?: LogLevel;
  /** Defaults to stderr: stdout carries the MCP stdio transport. */
  readonly sink?: LogSink;
  readonly maxFileSizeBytes?: number;
  /** Files kept on rotation, the active one included. */
  readonly maxFileCount?: number;
  /** Extra substrings or patterns scrubbed from string values. */
  readonly redactSecrets?: ReadonlyArray<string | RegExp>;
  /** Overrides the toggle read from `SANDBOX_LOG_REDACT`. */
  readonly redactionEnabled?: boolean;
  /** Receives a copy of every emitted entry. */
  readonly onEntry?: (entry: LogEntry) => void;
}

/** Environment variable holding the redaction directives. */
export const LOG_REDACT_ENV = "SANDBOX_LOG_REDACT";

const REDACTED = "[REDACTED]";
const ENABLE_DIRECTIVES = new Set(["on", "true", "yes", "1", "enable", "enabled"]);
const DISABLE_DIRECTIVES = new Set(["off", "false", "no", "0", "disable", "disabled"]);
const SENSITIVE_KEYS = new Set([
  "authorization",
  "proxy-authorization",
  "x-api-key",
  "api-key",
  "api_key",
  "token",
  "access_token",
  "refresh_token",
  "password",
  "cookie",
  "set-cookie",
]);

export interface RedactionDirectives {
  enabled: boolean;
  tokens: string[];
}

/**
 * Parses `SANDBOX_LOG_REDACT`, a comma separated list mixing on/off toggles
 * and literal substrings to scrub (`"on,secret-"`). Substrings without a
 * toggle turn redaction on.
 */
export function parseRedactionDirectives(raw: string | undefined): RedactionDirectives {
  const directives = (raw ?? "")
    .split(",")
    .map((directive) => directive.trim())
    .filter((directive) => directive.length > 0);

  let toggle: boolean | undefined;
  const tokens = new Set<string>();
  for (const directive of directives) {
    const lowered = directive.toLowerCase();
    if (DISABLE_DIRECTIVES.has(lowered)) {
      toggle = false;
    } else if (ENABLE_DIRECTIVES.has(lowered)) {
      toggle = true;
    } else {
      tokens.add(directive);
    }
  }
  return { enabled: toggle ?? tokens.size > 0, tokens: [...tokens] };
}

/** Scrubs sensitive keys and configured substrings from log payloads. */
class PayloadRedactor {
  constructor(
    private readonly patterns: ReadonlyArray<string | RegExp>,
    private readonly enabled: boolean,
  ) {}

  apply(value: unknown): unknown {
    return this.enabled ? this.scrub(value) : value;
  }

  private scrub(value: unknown): unknown {
    if (typeof value === "string") {
      return this.scrubText(value);
    }
    if (Array.isArray(value)) {
      return value.map((item) => this.scrub(item));
    }
    if (value && typeof value === "object") {
      return Object.fromEntries(
        Object.entries(value).map(([key, item]) => [key, SENSITIVE_KEYS.has(key.toLowerCase()) ? REDACTED : this.scrub(item)]),
      );
    }
    return value;
  }

  private scrubText(text: string): string {
    return this.patterns.reduce<string>((current, pattern) => {
      if (typeof pattern === "string") {
        return pattern.length > 0 ? current.split(pattern).join(REDACTED) : current;
      }
      return current.replace(pattern, REDACTED);
    }, text);
  }
}

/**
 * Appends lines to a file through a serial queue, rotating `file → file.1 →
 * file.2 …` before a write would push it past the size limit.
 */
class RotatingLogFile {
  private queue: Promise<void> = Promise.resolve();
  private directoryReady = false;

  constructor(
    private readonly path: string,
    private readonly maxBytes: number,
    private readonly maxFiles: number,
  ) {}

  append(line: string): void {
    this.queue = this.queue.then(() => this.write(line));
  }

  async drain(): Promise<void> {
    await this.queue;
  }

  private async write(line: string): Promise<void> {
    try {
      if (!this.directoryReady) {
        await mkdir(dirname(this.path), { recursive: true });
        this.directoryReady = true;
      }
      await this.rotateBefore(Buffer.byteLength(line, "utf8"));
      await appendFile(this.path, line, "utf8");
    } catch (error) {
      // The next write retries the directory creation.
      this.directoryReady = false;
      process.stderr.write(
        `${JSON.stringify({
          timestamp: new Date().toISOString(),
          level: "error",
          message: "log_file_write_failed",
          payload: { message: error instanceof Error ? error.message : String(error) },
        })}\n`,
      );
    }
  }

  private async rotateBefore(incomingBytes: number): Promise<void> {
    const size = await fileSize(this.path);
    if (size === null || size + incomingBytes <= this.maxBytes) {
      return;
    }
    if (this.maxFiles === 1) {
      await rm(this.path, { force: true });
      return;
    }
    await rm(`${this.path}.${this.maxFiles - 1}`, { force: true });
    for (let generation = this.maxFiles - 2; generation >= 1; generation -= 1) {
      await moveIfPresent(`${this.path}.${generation}`, `${this.path}.${generation + 1}`);
    }
    await moveIfPresent(this.path, `${this.path}.1`);
  }
}

/**
 * Emits one JSON object per line on the sink and, when configured, mirrors
 * the same lines into a rotating file.
 */
export class StructuredLogger {
  private readonly threshold: number;
  private readonly sink: LogSink;
  private readonly redactor: PayloadRedactor;
  private readonly file: RotatingLogFile | null;
  private readonly onEntry: ((entry: LogEntry) => void) | undefined;

  constructor(options: LoggerOptions = {}) {
    const directives = parseRedactionDirectives(process.env[LOG_REDACT_ENV]);
    this.threshold = LEVEL_RANK[options.level ?? "info"];
    this.sink = options.sink ?? process.stderr;
    this.redactor = new PayloadRedactor(
      [...new Set<string | RegExp>([...directives.tokens, ...(options.redactSecrets ?? [])])],
      options.redactionEnabled ?? directives.enabled,
    );
    this.file = options.logFile
      ? new RotatingLogFile(
          options.logFile,
          options.maxFileSizeBytes ?? 5 * 1024 * 1024,
          Math.max(1, options.maxFileCount ?? 5),
        )
      : null;
    this.onEntry = options.onEntry;
  }

  debug(message: string, payload?: unknown): void {
    this.emit("debug", message, payload);
  }

  info(message: string, payload?: unknown): void {
    this.emit("info", message, payload);
  }

  warn(message: string, payload?: unknown): void {
    this.emit("warn", message, payload);
  }

  error(message: string, payload?: unknown): void {
    this.emit("error", message, payload);
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LEVEL_RANK[level] >= this.threshold;
  }

  /** Resolves once every mirrored line reached the file. */
  async flush(): Promise<void> {
    await this.file?.drain();
  }

  private emit(level: LogLevel, message: string, payload: unknown): void {
    if (!this.isLevelEnabled(level)) {
      return;
    }
    const entry: LogEntry = { timestamp: new Date().toISOString(), level, message };
    if (payload !== undefined) {
      entry.payload = this.redactor.apply(payload);
    }
    const line = `${JSON.stringify(entry)}\n`;
    this.sink.write(line);
    this.onEntry?.(structuredClone(entry));
    this.file?.append(line);
  }
}

async function fileSize(path: string): Promise<number | null> {
  try {
    return (await stat(path)).size;
  } catch (error) {
    if (isMissingFile(error)) {
      return null;
    }
    throw error;
  }
}

async function moveIfPresent(source: string, target: string): Promise<void> {
  try {
    await rename(source, target);
  } catch (error) {
    if (!isMissingFile(error)) {
      throw error;
    }
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
