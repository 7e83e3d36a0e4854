/**
 * TCP Echo Fixture
 *
 * Writes back whatever each connection sends until the peer closes.
 */

import * as net from "node:net";
import { logger } from "../lib/logger";
import { boundPort, LOOPBACK } from "./app";

export const TCP_ECHO_DECLARED_PORT = 7;

export function handleEchoConnection(socket: net.Socket): void {
  const peer = `${socket.remoteAddress}:${socket.remotePort}`;
  logger.debug({ peer }, "TCP connection opened");

  socket.on("data", (data) => {
    socket.write(data);
  });

  // allowHalfOpen keeps our side writable until the echoes are flushed
  socket.on("end", () => {
    socket.end();
  });

  socket.on("error", (error) => {
    logger.warn({ peer, error }, "TCP connection failed");
    socket.destroy();
  });

  socket.on("close", () => {
    logger.debug({ peer }, "TCP connection closed");
  });
}

export function createTcpEchoServer(): net.Server {
  return net.createServer({ allowHalfOpen: true }, handleEchoConnection);
}

export interface TcpEchoListener {
  server: net.Server;
  port: number;
  close(): Promise<void>;
}

/**
 * Bind the echo server to an ephemeral loopback port.
 */
export function listenTcpEcho(host = LOOPBACK): Promise<TcpEchoListener> {
  const server = createTcpEchoServer();

  return new Promise((resolve, reject) => {
    server.once("error", reject);
    server.listen(0, host, () => {
      server.off("error", reject);
      resolve({
        server,
        port: boundPort(server.address()),
        close: () =>
          new Promise<void>((resolveClose, rejectClose) => {
            server.close((error) => (error ? rejectClose(error) : resolveClose()));
          }),
      });
    });
  });
}
