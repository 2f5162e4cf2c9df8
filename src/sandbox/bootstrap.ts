/** File name reported in stack traces of submitted code. */
export const USER_CODE_FILENAME = "sandbox.js";

/** File name of the in-context runtime, kept apart so faults are not attributed to it. */
export const RUNTIME_FILENAME = "sandbox-runtime.js";

/** Global the host evaluates to deliver settled helper results. */
export const PUMP_GLOBAL = "__sandbox_pump__";

/** Global the wrapped submission calls to report completion. */
export const RUN_GLOBAL = "__sandbox_run__";

/**
 * Runtime evaluated inside every fresh context before the submission. It
 * evaluates to a function taking the host bridge `hostCall(op, json) → json`
 * and installs the helper surface. Only strings cross the bridge: arguments
 * are JSON-encoded in the context and results are decoded there.
 *
 * Every crossing goes through `bridge`. Anything thrown on the host side of
 * the call (a stack overflow raised on entry, for instance) belongs to the
 * host realm, so it is dropped unread and replaced by a context error.
 */
export const BOOTSTRAP_SOURCE = String.raw`(function (hostCall) {
  "use strict";
  const parse = JSON.parse;
  const stringify = JSON.stringify;
  const apply = Reflect.apply;
  const promiseThen = Promise.prototype.then;
  const defineProperty = Object.defineProperty;
  const freeze = Object.freeze;
  const toText = String;
  const ContextError = Error;
  const pending = new Map();
  let nextRequestId = 1;

  function install(name, value) {
    defineProperty(globalThis, name, { value: value, writable: false, configurable: false, enumerable: false });
  }

  for (const name of ["WebAssembly", "SharedArrayBuffer", "Atomics"]) {
    Reflect.deleteProperty(globalThis, name);
    if (typeof globalThis[name] !== "undefined") {
      install(name, undefined);
    }
  }
  defineProperty(Error, "prepareStackTrace", { value: undefined, writable: false, configurable: false });

  function safeText(value) {
    try {
      return toText(value);
    } catch (error) {
      return "[unprintable value]";
    }
  }

  function encode(value) {
    try {
      const encoded = stringify(value === undefined ? null : value);
      return encoded === undefined ? "null" : encoded;
    } catch (error) {
      return undefined;
    }
  }

  function bridge(op, payload) {
    let reply;
    try {
      reply = hostCall(op, payload);
    } catch {
      throw new ContextError("sandbox bridge call failed");
    }
    return typeof reply === "string" ? reply : "null";
  }

  function request(op, payload) {
    const id = nextRequestId++;
    const encoded = encode({ id: id, op: op, args: payload });
    if (encoded === undefined) {
      return Promise.resolve({ success: false, code: "E-VALIDATION", error: "arguments must be JSON-serialisable" });
    }
    return new Promise(function (resolve) {
      pending.set(id, resolve);
      bridge("request", encoded);
    });
  }

  function formatValue(value) {
    if (typeof value === "string") return value;
    if (value === undefined) return "undefined";
    if (typeof value === "function") return "[Function " + (value.name || "anonymous") + "]";
    if (typeof value === "bigint") return safeText(value) + "n";
    if (typeof value === "symbol") return safeText(value);
    if (value instanceof Error) return safeText(value.name) + ": " + safeText(value.message);
    const encoded = encode(value);
    return encoded === undefined ? safeText(value) : encoded;
  }

  function emit(level, values) {
    const parts = [];
    for (let index = 0; index < values.length; index += 1) {
      parts.push(formatValue(values[index]));
    }
    bridge("output", stringify({ level: level, text: parts.join(" ") }));
  }

  function describeError(error) {
    if (error === null || (typeof error !== "object" && typeof error !== "function")) {
      return { name: "Error", message: "Uncaught " + formatValue(error), stack: "" };
    }
    let name = "Error";
    let message = "";
    let stack = "";
    try {
      name = safeText(error.name ?? "Error");
      message = safeText(error.message ?? "");
      stack = safeText(error.stack ?? "");
    } catch (inner) {
      message = message || "error details could not be read";
    }
    return { name: name, message: message, stack: stack };
  }

  install("${PUMP_GLOBAL}", function () {
    const batch = parse(bridge("drain", "null"));
    for (let index = 0; index < batch.length; index += 1) {
      const resolve = pending.get(batch[index][0]);
      if (resolve !== undefined) {
        pending.delete(batch[index][0]);
        resolve(batch[index][1]);
      }
    }
  });

  install("${RUN_GLOBAL}", function (body) {
    apply(promiseThen, body(), [
      function (value) {
        bridge("complete", encode(value) ?? stringify(formatValue(value)));
      },
      function (error) {
        bridge("fault", stringify(describeError(error)));
      },
    ]);
  });

  install("list_servers", function list_servers() {
    return request("list_servers", null);
  });
  install("get_tool_names", function get_tool_names(server) {
    return request("get_tool_names", { server: server });
  });
  install("describe", function describe(server, tool, detail) {
    return request("describe", {
      server: server,
      tool: tool === undefined ? null : tool,
      detail: detail === undefined ? "summary" : detail,
    });
  });
  install("search", function search(query, limit) {
    return request("search", { query: query, limit: limit === undefined ? null : limit });
  });
  install("create_proxy", function create_proxy(server, tool) {
    // Binding only; the host resolves the names on every call.
    const serverName = safeText(server);
    const toolName = safeText(tool);
    const proxy = function (args) {
      return request("call_proxy", { server: serverName, tool: toolName, args: args === undefined ? null : args });
    };
    defineProperty(proxy, "name", { value: serverName + "." + toolName });
    proxy.server = server;
    proxy.tool = tool;
    return freeze(proxy);
  });
  install("capability_summary", function capability_summary() {
    return request("capability_summary", null);
  });
  install("print", function print() {
    emit("log", arguments);
  });
  install("console", freeze({
    log: function log() { emit("log", arguments); },
    info: function info() { emit("info", arguments); },
    debug: function debug() { emit("debug", arguments); },
    warn: function warn() { emit("warn", arguments); },
    error: function error() { emit("error", arguments); },
  }));
})`;

/**
 * Wraps a submission as the body of an async arrow function. The header sits
 * on its own line and the script is compiled with `lineOffset: -1`, so line
 * numbers in stack traces match the submitted text.
 */
export function wrapUserCode(code: string): string {
  return (
    `${RUN_GLOBAL}(async () => {\n` +
    `${code}\n` +
    `;if (typeof main === "function") { return await main(); }\n` +
    `});`
  );
}
