import * as net from "node:net";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { LOOPBACK } from "./app";
import { listenTcpEcho, type TcpEchoListener } from "./tcp-echo";

/**
 * Send `chunks` one after another, half-close, and collect everything that
 * comes back before the server closes its side.
 */
function exchange(port: number, chunks: Buffer[]): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const received: Buffer[] = [];
    const socket = net.connect(port, LOOPBACK, () => {
      for (const chunk of chunks) {
        socket.write(chunk);
      }
      socket.end();
    });
    socket.on("data", (data) => {
      received.push(data);
    });
    socket.on("error", reject);
    socket.on("close", () => resolve(Buffer.concat(received)));
  });
}

describe("tcp echo", () => {
  let listener: TcpEchoListener;

  beforeEach(async () => {
    listener = await listenTcpEcho();
  });

  afterEach(async () => {
    await listener.close();
  });

  test("binds an ephemeral loopback port", () => {
    const address = listener.server.address();

    expect(listener.port).toBeGreaterThan(0);
    expect(address).toEqual({ address: LOOPBACK, family: "IPv4", port: listener.port });
  });

  test("echoes a single message", async () => {
    const echoed = await exchange(listener.port, [Buffer.from("PING\n")]);

    expect(echoed.toString()).toBe("PING\n");
  });

  test("echoes several chunks in order", async () => {
    const chunks = [Buffer.from("one "), Buffer.from("two "), Buffer.from("three")];

    const echoed = await exchange(listener.port, chunks);

    expect(echoed.toString()).toBe("one two three");
  });

  test("echoes binary data larger than a single read", async () => {
    const payload = Buffer.alloc(256 * 1024);
    for (let i = 0; i < payload.length; i++) {
      payload[i] = i % 251;
    }

    const echoed = await exchange(listener.port, [payload]);

    expect(echoed.length).toBe(payload.length);
    expect(echoed.equals(payload)).toBe(true);
  });

  test("serves concurrent connections independently", async () => {
    const [first, second] = await Promise.all([
      exchange(listener.port, [Buffer.from("alpha")]),
      exchange(listener.port, [Buffer.from("beta")]),
    ]);

    expect(first.toString()).toBe("alpha");
    expect(second.toString()).toBe("beta");
  });

  test("closes cleanly when the peer sends nothing", async () => {
    const echoed = await exchange(listener.port, []);

    expect(echoed.length).toBe(0);
  });
});
