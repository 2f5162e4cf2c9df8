import { Buffer } from "node:buffer";
import { performance } from "node:perf_hooks";
import { Worker } from "node:worker_threads";

import type { StructuredLogger } from "../logger.js";
import {
  CollaboratorError,
  ExecutionFaultError,
  ExecutionTimeoutError,
  LimitExceededError,
  SandboxError,
  ToolValidationError,
  normaliseThrown,
  toToolFailure,
  type SourceLocation,
} from "../runtime/errors.js";
import {
  BOOTSTRAP_SOURCE,
  PUMP_GLOBAL,
  RUNTIME_FILENAME,
  USER_CODE_FILENAME,
  wrapUserCode,
} from "./bootstrap.js";
import { ConcurrencyGate } from "./concurrencyGate.js";
import { HelperHost, isHelperOp, type HelperServices } from "./helperHost.js";
import {
  SANDBOX_WORKER_SOURCE,
  sandboxWorkerMessageSchema,
  type SandboxSettlement,
  type SandboxWorkerData,
} from "./sandboxWorker.js";

export type ExecutionStatus = "completed" | "timed_out" | "faulted";

/** Life cycle of one run: `idle → running → completed | timed_out | faulted`. */
export type SandboxRunState = "idle" | "running" | ExecutionStatus;

export interface ExecutionRequest {
  readonly code: string;
  readonly timeoutMs: number;
}

export interface ExecutionResult {
  readonly status: ExecutionStatus;
  /** Everything captured before termination. */
  readonly output: string;
  /** JSON value returned by the submission; `null` unless completed. */
  readonly result: unknown;
  /** Set exactly when the run did not complete. */
  readonly error: SandboxError | null;
  /** Measured from the start of the run; queueing time is not included. */
  readonly elapsedMs: number;
  /** True when the run stopped early, so `output` may be incomplete. */
  readonly partialOutput: boolean;
  readonly outputTruncated: boolean;
  readonly toolCalls: number;
}

export interface SandboxLimits {
  readonly maxCodeBytes: number;
  readonly maxOutputBytes: number;
  readonly maxToolCalls: number;
  readonly maxConcurrency: number;
}

export const DEFAULT_SANDBOX_LIMITS: SandboxLimits = {
  maxCodeBytes: 64 * 1024,
  maxOutputBytes: 256 * 1024,
  maxToolCalls: 64,
  maxConcurrency: 4,
};

const OUTPUT_TRUNCATED_MARKER = "[output truncated]\n";
const OUTPUT_PREFIX: Readonly<Record<string, string>> = { warn: "[warn] ", error: "[error] " };
const FAULT_LOCATION_PATTERN = /\bsandbox\.js:(\d+)(?::(\d+))?/;

interface FaultReport {
  readonly name: string;
  readonly message: string;
  readonly stack: string;
}

/** Starts the worker of a run; tests substitute their own. */
export type SandboxWorkerFactory = (source: string, workerData: SandboxWorkerData) => Worker;

export const createSandboxWorker: SandboxWorkerFactory = (source, workerData) =>
  new Worker(source, { eval: true, workerData, execArgv: [], stdout: true, stderr: true });

interface SandboxRunOptions {
  readonly services: HelperServices;
  readonly limits: SandboxLimits;
  readonly logger: StructuredLogger;
  readonly workerFactory?: SandboxWorkerFactory;
}

/**
 * One execution inside a fresh `node:vm` context owned by its own worker
 * thread, so a busy submission never holds up the host event loop or other
 * runs. The worker slices the work with the vm `timeout`; the host keeps the
 * authoritative deadline and terminates the worker when it passes. Helper
 * calls arrive as messages and are answered with JSON settlements. A run
 * cannot be reused.
 */
export class SandboxRun {
  private state: SandboxRunState = "idle";
  private worker: Worker | null = null;
  private readonly abortController = new AbortController();
  private readonly helpers: HelperHost;
  private readonly outputChunks: string[] = [];
  private outputBytes = 0;
  private outputTruncated = false;
  private startedAt = 0;
  private timeoutMs = 0;
  private userLineCount = 0;
  private timer: NodeJS.Timeout | null = null;
  private resolveOutcome: ((result: ExecutionResult) => void) | null = null;

  constructor(private readonly options: SandboxRunOptions) {
    this.helpers = new HelperHost(options.services, options.limits.maxToolCalls, this.abortController.signal);
  }

  get currentState(): SandboxRunState {
    return this.state;
  }

  execute(request: ExecutionRequest): Promise<ExecutionResult> {
    if (this.state !== "idle") {
      return Promise.reject(new Error(`sandbox run already ${this.state}; create a new run per execution`));
    }
    this.state = "running";
    return new Promise<ExecutionResult>((resolve) => {
      this.resolveOutcome = resolve;
      this.start(request);
    });
  }

  private start(request: ExecutionRequest): void {
    this.startedAt = performance.now();
    this.timeoutMs = request.timeoutMs;
    this.userLineCount = request.code.split("\n").length;
    this.armDeadline(request.timeoutMs);

    const workerData: SandboxWorkerData = {
      code: wrapUserCode(request.code),
      bootstrap: BOOTSTRAP_SOURCE,
      deadline: Date.now() + Math.ceil(request.timeoutMs),
      userFilename: USER_CODE_FILENAME,
      runtimeFilename: RUNTIME_FILENAME,
      pumpGlobal: PUMP_GLOBAL,
    };
    let worker: Worker;
    try {
      worker = (this.options.workerFactory ?? createSandboxWorker)(SANDBOX_WORKER_SOURCE, workerData);
    } catch (error) {
      this.failWorker("sandbox_worker_start_failed", error);
      return;
    }
    this.worker = worker;
    worker.on("message", (message: unknown) => this.handleMessage(message));
    worker.once("error", (error) => this.failWorker("sandbox_worker_failed", error));
    worker.once("exit", (exitCode) => {
      if (this.state === "running") {
        this.failWorker("sandbox_worker_exited", new Error(`sandbox worker exited with code ${exitCode}`));
      }
    });
  }

  /** Re-arms itself until the measured time reaches the budget. */
  private armDeadline(delayMs: number): void {
    if (this.timer) {
      clearTimeout(this.timer);
    }
    this.timer = setTimeout(() => this.checkDeadline(), Math.max(1, Math.ceil(delayMs)));
  }

  private checkDeadline(): void {
    if (this.state !== "running") {
      return;
    }
    const remaining = this.timeoutMs - (performance.now() - this.startedAt);
    if (remaining > 0) {
      this.armDeadline(remaining);
      return;
    }
    this.finish("timed_out", null, new ExecutionTimeoutError(this.timeoutMs));
  }

  private handleMessage(message: unknown): void {
    const parsed = sandboxWorkerMessageSchema.safeParse(message);
    if (!parsed.success || this.state !== "running") {
      return;
    }
    const { op, payload } = parsed.data;
    let args: unknown;
    try {
      args = JSON.parse(payload);
    } catch (error) {
      this.options.logger.error("sandbox_bridge_failed", {
        op,
        message: error instanceof Error ? error.message : String(error),
      });
      return;
    }
    switch (op) {
      case "output":
        this.appendOutput(args);
        return;
      case "request":
        this.startRequest(args);
        return;
      case "complete":
        this.finish("completed", args, null);
        return;
      case "fault":
        this.finishFault(toFaultReport(args));
        return;
      case "timeout":
        // The worker cannot run further slices; the host deadline settles the outcome.
        this.checkDeadline();
        return;
      case "bootstrap_failed":
        this.options.logger.error("sandbox_bootstrap_failed", {
          message: isRecord(args) && typeof args.message === "string" ? args.message : null,
        });
        this.finishFault({ name: "Error", message: "sandbox runtime failed to initialise", stack: "" });
        return;
      default:
        this.options.logger.warn("sandbox_bridge_unknown_op", { op });
    }
  }

  private startRequest(envelope: unknown): void {
    if (!isRecord(envelope) || typeof envelope.id !== "number") {
      return;
    }
    const id = envelope.id;
    const op = typeof envelope.op === "string" ? envelope.op : "";
    if (!isHelperOp(op)) {
      this.settle(id, toToolFailure(new ToolValidationError(`unknown helper operation "${op}"`)));
      return;
    }
    this.helpers.call(op, envelope.args ?? null).then(
      (value) => this.settle(id, value),
      (error: unknown) => this.settle(id, toToolFailure(normaliseThrown(error, `${op} failed`))),
    );
  }

  private settle(id: number, value: unknown): void {
    if (this.state !== "running" || this.worker === null) {
      return;
    }
    const settlement: SandboxSettlement = { id, value: encodeForContext(value) };
    this.worker.postMessage(settlement);
  }

  private appendOutput(args: unknown): void {
    if (this.outputTruncated || !isRecord(args)) {
      return;
    }
    const text = typeof args.text === "string" ? args.text : "";
    const level = typeof args.level === "string" ? args.level : "log";
    const line = `${OUTPUT_PREFIX[level] ?? ""}${text}\n`;
    const bytes = Buffer.byteLength(line, "utf8");
    if (this.outputBytes + bytes > this.options.limits.maxOutputBytes) {
      this.outputTruncated = true;
      this.options.logger.warn("output_truncated", { max_output_bytes: this.options.limits.maxOutputBytes });
      return;
    }
    this.outputBytes += bytes;
    this.outputChunks.push(line);
  }

  private failWorker(event: string, error: unknown): void {
    if (this.state !== "running") {
      return;
    }
    const message = error instanceof Error ? error.message : String(error);
    this.options.logger.error(event, { message });
    this.finishFault({ name: "Error", message: `sandbox worker failed: ${message}`, stack: "" });
  }

  private finishFault(report: FaultReport): void {
    const location = parseFaultLocation(report.stack, this.userLineCount);
    this.finish("faulted", null, new ExecutionFaultError(report.name, report.message, location));
  }

  private finish(status: ExecutionStatus, result: unknown, error: SandboxError | null): void {
    if (this.state !== "running") {
      return;
    }
    this.state = status;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    // Outstanding tool calls are abandoned; collaborators observe the abort.
    this.abortController.abort();

    const output = this.outputChunks.join("") + (this.outputTruncated ? OUTPUT_TRUNCATED_MARKER : "");
    const outcome: ExecutionResult = {
      status,
      output,
      result: status === "completed" ? (result ?? null) : null,
      error,
      elapsedMs: performance.now() - this.startedAt,
      partialOutput: status !== "completed",
      outputTruncated: this.outputTruncated,
      toolCalls: this.helpers.toolCallCount,
    };
    const resolve = this.resolveOutcome;
    this.resolveOutcome = null;
    this.stopWorker().then(
      () => resolve?.(outcome),
      (stopError: unknown) => {
        this.options.logger.warn("sandbox_worker_terminate_failed", {
          message: stopError instanceof Error ? stopError.message : String(stopError),
        });
        resolve?.(outcome);
      },
    );
  }

  /** Resolves once the worker is gone, so a released concurrency slot is really free. */
  private async stopWorker(): Promise<void> {
    const worker = this.worker;
    this.worker = null;
    if (worker === null) {
      return;
    }
    worker.removeAllListeners("message");
    await worker.terminate();
  }
}

export interface ExecutionSandboxOptions {
  readonly services: HelperServices;
  readonly logger: StructuredLogger;
  readonly limits?: Partial<SandboxLimits>;
  readonly workerFactory?: SandboxWorkerFactory;
}

/**
 * Entry point for executions: applies the code-size limit, queues requests
 * beyond the concurrency limit in FIFO order and logs every outcome.
 */
export class ExecutionSandbox {
  readonly limits: SandboxLimits;
  private readonly gate: ConcurrencyGate;

  constructor(private readonly options: ExecutionSandboxOptions) {
    this.limits = { ...DEFAULT_SANDBOX_LIMITS, ...options.limits };
    this.gate = new ConcurrencyGate(this.limits.maxConcurrency);
  }

  async execute(request: ExecutionRequest): Promise<ExecutionResult> {
    if (!Number.isFinite(request.timeoutMs) || request.timeoutMs <= 0) {
      throw new RangeError(`timeout must be a positive number of milliseconds (received ${request.timeoutMs})`);
    }
    const codeBytes = Buffer.byteLength(request.code, "utf8");
    if (codeBytes > this.limits.maxCodeBytes) {
      this.options.logger.warn("execution_rejected", { code_bytes: codeBytes, max_code_bytes: this.limits.maxCodeBytes });
      return rejectedResult(
        new LimitExceededError(`code is ${codeBytes} bytes, above the ${this.limits.maxCodeBytes} byte limit`, {
          hint: "split the work across several executions",
          details: { code_bytes: codeBytes, max_code_bytes: this.limits.maxCodeBytes },
        }),
      );
    }

    if (this.gate.running >= this.limits.maxConcurrency) {
      this.options.logger.debug("execution_queued", { queued: this.gate.queued + 1 });
    }
    const queuedAt = performance.now();
    return this.gate.run(async () => {
      const queuedMs = Math.round(performance.now() - queuedAt);
      const run = new SandboxRun({
        services: this.options.services,
        limits: this.limits,
        logger: this.options.logger,
        ...(this.options.workerFactory ? { workerFactory: this.options.workerFactory } : {}),
      });
      this.options.logger.debug("execution_started", {
        code_bytes: codeBytes,
        timeout_ms: request.timeoutMs,
        queued_ms: queuedMs,
      });
      const result = await run.execute(request);
      const payload = {
        status: result.status,
        elapsed_ms: Math.round(result.elapsedMs),
        queued_ms: queuedMs,
        tool_calls: result.toolCalls,
        output_bytes: Buffer.byteLength(result.output, "utf8"),
        ...(result.error ? { code: result.error.code, message: result.error.message } : {}),
      };
      if (result.status === "completed") {
        this.options.logger.info("execution_completed", payload);
      } else if (result.status === "timed_out") {
        this.options.logger.warn("execution_timed_out", payload);
      } else {
        this.options.logger.warn("execution_faulted", payload);
      }
      return result;
    });
  }
}

function rejectedResult(error: SandboxError): ExecutionResult {
  return {
    status: "faulted",
    output: "",
    result: null,
    error,
    elapsedMs: 0,
    partialOutput: true,
    outputTruncated: false,
    toolCalls: 0,
  };
}

function isRecord(value: unknown): value is Readonly<Record<string, unknown>> {
  return !!value && typeof value === "object" && !Array.isArray(value);
}

function toFaultReport(value: unknown): FaultReport {
  if (!isRecord(value)) {
    return { name: "Error", message: "", stack: "" };
  }
  return {
    name: typeof value.name === "string" ? value.name : "Error",
    message: typeof value.message === "string" ? value.message : "",
    stack: typeof value.stack === "string" ? value.stack : "",
  };
}

/** Finds the first `sandbox.js:line[:column]` frame; lines past the submission are clamped. */
export function parseFaultLocation(stack: string, userLineCount: number): SourceLocation | null {
  const match = FAULT_LOCATION_PATTERN.exec(stack);
  if (!match) {
    return null;
  }
  const line = Number.parseInt(match[1] ?? "", 10);
  if (!Number.isFinite(line)) {
    return null;
  }
  const column = match[2] !== undefined ? Number.parseInt(match[2], 10) : null;
  if (line > userLineCount) {
    return { line: userLineCount, column: null };
  }
  return { line: Math.max(1, line), column };
}

/** JSON for the context side of the bridge; unserialisable values become failures. */
function encodeForContext(value: unknown): string {
  try {
    const encoded = JSON.stringify(value ?? null);
    return encoded === undefined ? "null" : encoded;
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return JSON.stringify(toToolFailure(new CollaboratorError(`result could not be serialised: ${reason}`)));
  }
}
