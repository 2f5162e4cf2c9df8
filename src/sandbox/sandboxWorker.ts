import { z } from "zod";

/** Data handed to every sandbox worker when it starts. */
export interface SandboxWorkerData {
  /** Submission already wrapped by `wrapUserCode`. */
  readonly code: string;
  readonly bootstrap: string;
  /** Epoch milliseconds after which no slice may run. */
  readonly deadline: number;
  readonly userFilename: string;
  readonly runtimeFilename: string;
  readonly pumpGlobal: string;
}

/**
 * Worker → host message. `op` is a bridge operation called by the context
 * (`output`, `request`, `complete`, `fault`) or one raised by the worker
 * itself (`timeout`, `bootstrap_failed`). `payload` is always JSON text.
 */
export const sandboxWorkerMessageSchema = z.object({ op: z.string(), payload: z.string() });

export type SandboxWorkerMessage = z.infer<typeof sandboxWorkerMessageSchema>;

/** Host → worker message delivering the JSON result of a helper request. */
export interface SandboxSettlement {
  readonly id: number;
  readonly value: string;
}

/**
 * Body of the worker thread that owns the `node:vm` context of one run. It
 * is evaluated from source (`eval: true`) so the same code loads from the
 * TypeScript sources and from the build. Helper requests are forwarded to
 * the host and their results delivered back through the pump; `drain` is
 * answered locally so no bridge call ever waits on the host.
 */
export const SANDBOX_WORKER_SOURCE = String.raw`"use strict";
const { parentPort, workerData } = require("node:worker_threads");
const vm = require("node:vm");

const settlements = [];
let context = null;
let finished = false;

function post(op, payload) {
  parentPort.postMessage({ op: op, payload: payload });
}

function describeHostError(error) {
  if (error instanceof Error) {
    return { name: error.name, message: error.message, stack: error.stack || "" };
  }
  return { name: "Error", message: "uncaught exception outside the submitted function", stack: "" };
}

function isScriptTimeout(error) {
  return error instanceof Error && error.code === "ERR_SCRIPT_EXECUTION_TIMEOUT";
}

function runSlice(script) {
  if (finished || context === null) {
    return;
  }
  const remaining = workerData.deadline - Date.now();
  if (remaining <= 0) {
    finished = true;
    post("timeout", "null");
    return;
  }
  try {
    script.runInContext(context, { timeout: Math.max(1, Math.ceil(remaining)), displayErrors: false });
  } catch (error) {
    if (finished) {
      return;
    }
    finished = true;
    if (isScriptTimeout(error) || workerData.deadline - Date.now() <= 0) {
      post("timeout", "null");
    } else {
      post("fault", JSON.stringify(describeHostError(error)));
    }
  }
}

function hostCall(op, payload) {
  if (op === "drain") {
    const batch = settlements.splice(0, settlements.length);
    return "[" + batch.map((entry) => "[" + entry.id + "," + entry.value + "]").join(",") + "]";
  }
  if (finished || typeof op !== "string") {
    return "null";
  }
  if (op === "complete" || op === "fault") {
    finished = true;
  }
  post(op, typeof payload === "string" ? payload : "null");
  return "null";
}

const pumpScript = new vm.Script(workerData.pumpGlobal + "();", { filename: workerData.runtimeFilename });

parentPort.on("message", (message) => {
  if (finished || !message || typeof message.id !== "number" || typeof message.value !== "string") {
    return;
  }
  settlements.push({ id: message.id, value: message.value });
  runSlice(pumpScript);
});

let userScript = null;
try {
  userScript = new vm.Script(workerData.code, { filename: workerData.userFilename, lineOffset: -1 });
} catch (error) {
  finished = true;
  post("fault", JSON.stringify(describeHostError(error)));
}

if (userScript !== null) {
  context = vm.createContext(Object.create(null), {
    name: "sandbox",
    codeGeneration: { strings: false, wasm: false },
    microtaskMode: "afterEvaluate",
  });
  try {
    const bootstrapScript = new vm.Script(workerData.bootstrap, { filename: workerData.runtimeFilename });
    const install = bootstrapScript.runInContext(context, {
      timeout: Math.max(1, Math.ceil(workerData.deadline - Date.now())),
    });
    if (typeof install !== "function") {
      throw new Error("sandbox runtime did not initialise");
    }
    install(hostCall);
  } catch (error) {
    finished = true;
    post("bootstrap_failed", JSON.stringify({ message: error instanceof Error ? error.message : "non-error value thrown" }));
  }
  runSlice(userScript);
}
`;
