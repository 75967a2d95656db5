import { createInterface, type Interface } from "node:readline";
import type { Readable, Writable } from "node:stream";
import {
  isJSONRPCRequest,
  isJSONRPCRequests,
  isJSONRPCResponse,
  isJSONRPCResponses,
  JSONRPCClient,
  JSONRPCErrorCode,
  JSONRPCServer,
  JSONRPCServerAndClient,
} from "json-rpc-2.0";

/**
 * Represents a readable stream that can be explicitly closed.
 *
 * This interface wraps a Node.js readable with a close method, allowing for
 * graceful shutdown of the stream when it's no longer needed. It's commonly
 * used with stdin or other input sources that need explicit cleanup.
 *
 * @example
 * ```ts
 * const reader: CloseableReadable = {
 *   readable: process.stdin,
 *   close: () => process.stdin.destroy()
 * };
 * ```
 */
export interface CloseableReadable {
  /**
   * The underlying readable stream of newline-delimited JSON.
   */
  readable: Readable;

  /**
   * Closes the readable stream and releases any associated resources.
   */
  close(): void;
}

/**
 * Represents a writable stream for sending newline-delimited JSON, typically stdout.
 */
export interface Writeable {
  writable: Writable;
}

export interface JSocketOptions {
  /**
   * If enabled, verbose logs will be output on STDERR.
   */
  debugLogging: boolean;
}

/** Params of an incoming call. Positional (array) params are not used by the bridge and arrive as undefined. */
export type JSocketParams = Record<string, unknown> | undefined;

export type JSocketMethod = (params: JSocketParams) => unknown;

export type JSocketMethods = Record<string, JSocketMethod>;

function isParams(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isJSONRPCMessage(message: unknown): boolean {
  return isJSONRPCRequest(message) || isJSONRPCRequests(message) ||
    isJSONRPCResponse(message) || isJSONRPCResponses(message);
}

/** The id of a malformed message, when it carries a usable one. */
function messageId(message: unknown): string | number | null {
  if (!isParams(message)) return null;
  const { id } = message;
  return typeof id === "string" || typeof id === "number" ? id : null;
}

/**
 * A JSON-RPC 2.0 endpoint over stdio-like streams.
 *
 * Messages are exchanged as newline-delimited JSON. Requests from the remote party are
 * routed to the supplied methods and their responses written back on the writer. Every
 * line is handled as its own job so a slow method never blocks the ones behind it.
 *
 * @example
 * ```ts
 * const socket = new JSocket(
 *   { readable: process.stdin, close: () => process.stdin.destroy() },
 *   { writable: process.stdout },
 *   {
 *     greet(params) {
 *       return { message: `Hello, ${params?.name}!` };
 *     },
 *   },
 *   { debugLogging: true },
 * );
 *
 * // later
 * await socket.close();
 * ```
 */
export class JSocket {
  /**
   * Routes requests to the methods and sends responses through the client's transport.
   */
  readonly rpc: JSONRPCServerAndClient;

  readonly #reader: CloseableReadable;

  readonly #writer: Writable;

  readonly #lines: Interface;

  /**
   * Handlers still running, awaited on close.
   *
   * @internal
   */
  readonly #jobs = new Set<Promise<void>>();

  readonly #closed: Promise<void>;

  constructor(
    reader: CloseableReadable,
    writer: Writeable,
    methods: JSocketMethods,
    readonly options?: JSocketOptions,
  ) {
    this.#reader = reader;
    this.#writer = writer.writable;

    const server = new JSONRPCServer();
    for (const [name, method] of Object.entries(methods)) {
      server.addMethod(name, (params: unknown) => method(isParams(params) ? params : undefined));
    }

    this.rpc = new JSONRPCServerAndClient(
      server,
      new JSONRPCClient((payload: unknown) => this.Tx(JSON.stringify(payload))),
    );

    this.#lines = createInterface({ input: reader.readable, crlfDelay: Infinity });
    this.#closed = new Promise((resolve) => this.#lines.once("close", resolve));
    this.#lines.on("line", (line) => {
      const job = this.#handle(line);
      this.#jobs.add(job);
      job.then(() => this.#jobs.delete(job));
    });
  }

  /**
   * Low-level transmit, call me to put a message on the wire.
   *
   * ```ts
   * await socket.Tx(`{ "foo": "bar" }`);
   * ```
   */
  Tx(line: string): Promise<void> {
    return new Promise((resolve, reject) => {
      this.#writer.write(`${line}\n`, (error) => {
        if (error) {
          reject(error);
          return;
        }
        this.#log(`Tx: ${line}`);
        resolve();
      });
    });
  }

  /**
   * Logs the message to STDERR if debugLogging is enabled.
   * STDERR is used for logging because STDOUT carries the JSON-RPC traffic.
   *
   * @internal
   */
  #log(msg: string) {
    if (this.options?.debugLogging) {
      console.error(msg);
    }
  }

  async #handle(line: string): Promise<void> {
    if (line.trim() === "") return;
    this.#log(`Rx: ${line}`);

    try {
      let message: unknown;
      try {
        message = JSON.parse(line);
      } catch (error) {
        this.#log(`Error processing request: ${error}`);
        await this.Tx(JSON.stringify({
          jsonrpc: "2.0",
          id: null,
          error: {
            code: JSONRPCErrorCode.ParseError,
            message: "Parse error",
            data: String(error),
          },
        }));
        return;
      }

      if (!isJSONRPCMessage(message)) {
        this.#log(`Invalid request: ${line}`);
        await this.Tx(JSON.stringify({
          jsonrpc: "2.0",
          id: messageId(message),
          error: {
            code: JSONRPCErrorCode.InvalidRequest,
            message: "Invalid Request",
          },
        }));
        return;
      }

      await this.rpc.receiveAndSend(message);
    } catch (error) {
      console.error("failed to handle message", error);
    }
  }

  /**
   * Stops reading new messages and waits for all pending handlers to complete.
   */
  async close(): Promise<void> {
    this.#lines.close();
    this.#reader.close();
    await this.#closed;
    await Promise.all(this.#jobs);
    this.rpc.rejectAllPendingRequests("socket closed");
  }
}
