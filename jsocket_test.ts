import { createInterface } from "node:readline";
import { PassThrough } from "node:stream";
import { afterEach, describe, expect, it, vi } from "vitest";
import { JSocket, type JSocketMethods, type JSocketOptions } from "./jsocket.ts";

function connect(methods: JSocketMethods, options?: JSocketOptions) {
  const input = new PassThrough();
  const output = new PassThrough();
  const socket = new JSocket({ readable: input, close: () => input.end() }, { writable: output }, methods, options);
  const lines = createInterface({ input: output })[Symbol.asyncIterator]();

  return {
    socket,
    send(line: string) {
      input.write(`${line}\n`);
    },
    async receive(): Promise<unknown> {
      const { value } = await lines.next();
      return JSON.parse(value);
    },
  };
}

describe("JSocket", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("routes a request to its method and writes the response", async () => {
    const conn = connect({
      add: (params) => Number(params?.a) + Number(params?.b),
    });

    conn.send(JSON.stringify({ jsonrpc: "2.0", id: 1, method: "add", params: { a: 2, b: 3 } }));

    expect(await conn.receive()).toEqual({ jsonrpc: "2.0", id: 1, result: 5 });
    await conn.socket.close();
  });

  it("awaits async methods", async () => {
    const conn = connect({
      async echo(params) {
        await new Promise((resolve) => setTimeout(resolve, 5));
        return params;
      },
    });

    conn.send(JSON.stringify({ jsonrpc: "2.0", id: "a", method: "echo", params: { hello: "world" } }));

    expect(await conn.receive()).toEqual({ jsonrpc: "2.0", id: "a", result: { hello: "world" } });
    await conn.socket.close();
  });

  it("ignores blank lines", async () => {
    const conn = connect({ ping: () => "pong" });

    conn.send("");
    conn.send("   ");
    conn.send(JSON.stringify({ jsonrpc: "2.0", id: 7, method: "ping" }));

    expect(await conn.receive()).toEqual({ jsonrpc: "2.0", id: 7, result: "pong" });
    await conn.socket.close();
  });

  it("answers unparseable lines with a parse error", async () => {
    const conn = connect({});

    conn.send("{not json");

    expect(await conn.receive()).toMatchObject({ jsonrpc: "2.0", id: null, error: { code: -32700, message: "Parse error" } });
    await conn.socket.close();
  });

  it("answers JSON that is not a JSON-RPC message with invalid request", async () => {
    const conn = connect({ ping: () => "pong" });

    conn.send(JSON.stringify({ jsonrpc: "2.0", id: 9 }));
    expect(await conn.receive()).toEqual({
      jsonrpc: "2.0",
      id: 9,
      error: { code: -32600, message: "Invalid Request" },
    });

    conn.send(JSON.stringify({ jsonrpc: "2.0", id: 10, method: "ping" }));
    expect(await conn.receive()).toEqual({ jsonrpc: "2.0", id: 10, result: "pong" });
    await conn.socket.close();
  });

  it("uses a null id when an invalid message has none", async () => {
    const conn = connect({});

    conn.send("[1, 2]");

    expect(await conn.receive()).toEqual({
      jsonrpc: "2.0",
      id: null,
      error: { code: -32600, message: "Invalid Request" },
    });
    await conn.socket.close();
  });

  it("answers unknown methods with method not found", async () => {
    const conn = connect({});

    conn.send(JSON.stringify({ jsonrpc: "2.0", id: 2, method: "nope" }));

    expect(await conn.receive()).toMatchObject({ jsonrpc: "2.0", id: 2, error: { code: -32601 } });
    await conn.socket.close();
  });

  it("returns thrown errors as error responses", async () => {
    const conn = connect({
      fail() {
        throw new Error("boom");
      },
    });

    conn.send(JSON.stringify({ jsonrpc: "2.0", id: 3, method: "fail" }));

    expect(await conn.receive()).toMatchObject({ jsonrpc: "2.0", id: 3, error: { message: "boom" } });
    await conn.socket.close();
  });

  it("logs traffic to stderr when debug logging is on", async () => {
    const log = vi.spyOn(console, "error").mockImplementation(() => {});
    const conn = connect({ ping: () => "pong" }, { debugLogging: true });

    const line = JSON.stringify({ jsonrpc: "2.0", id: 1, method: "ping" });
    conn.send(line);
    await conn.receive();
    await conn.socket.close();

    expect(log).toHaveBeenCalledWith(`Rx: ${line}`);
    expect(log).toHaveBeenCalledWith(expect.stringMatching(/^Tx: .*"result":"pong"/));
  });
});
