import { type CloseableReadable, JSocket, type JSocketMethod, type JSocketMethods, type Writeable } from "../../jsocket.ts";

export interface BaseJsonRpcProviderOptions {
  /** Defaults to the process stdin. */
  reader?: CloseableReadable;

  /** Defaults to the process stdout. */
  writer?: Writeable;

  /** Defaults to {@link debugLoggingEnabled}. */
  debugLogging?: boolean;
}

/**
 * True when Terraform was started with `TF_LOG=debug`.
 */
export function debugLoggingEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
  return env.TF_LOG?.toLowerCase() === "debug";
}

/**
 * Base class for all JSON-RPC provider implementations driven by the Terraform bridge.
 * Handles the JSON-RPC communication layer over stdin/stdout and provides common functionality
 * like health checks and graceful shutdown.
 */
export class BaseJsonRpcProvider {
  readonly socket: JSocket;

  /**
   * Creates a new BaseJsonRpcProvider instance and starts serving requests.
   * @param providerMethods - The provider's method implementations, keyed by JSON-RPC method name.
   * @param options - Streams and logging overrides, mostly useful for tests.
   */
  constructor(providerMethods: JSocketMethods, options: BaseJsonRpcProviderOptions = {}) {
    console.error("This is a JSON-RPC 2.0 server for the terraform infoblox bridge provider.");

    const reader = options.reader ?? {
      readable: process.stdin,
      close: () => process.stdin.destroy(),
    };
    const writer = options.writer ?? { writable: process.stdout };
    const debugLogging = options.debugLogging ?? debugLoggingEnabled();

    this.socket = new JSocket(
      reader,
      writer,
      wrapMethods({
        ...providerMethods,
        health() {
          return { ok: true };
        },
        shutdown: () => {
          console.error("Shutting down gracefully...");
          // close() waits for in-flight handlers, this one included, so it must not be awaited here
          this.socket.close().catch((e) => console.error("shutdown failed", e));
          return { ok: true };
        },
      }),
      { debugLogging },
    );
  }
}

function wrapMethod(fn: JSocketMethod): JSocketMethod {
  return async (params) => {
    try {
      return await fn(params);
    } catch (e) {
      console.error("uncaught error", e);
      throw e;
    }
  };
}

function wrapMethods(methods: JSocketMethods): JSocketMethods {
  return Object.fromEntries(
    Object.entries(methods).map(([name, fn]) => [name, wrapMethod(fn)]),
  );
}
