import type { AddressInfo } from "node:net";
import Fastify, { type FastifyError } from "fastify";
import { logger } from "../lib/logger";

export const LOOPBACK = "127.0.0.1";

/**
 * Fastify instance shared by the HTTP fixtures.
 *
 * Bodies are never capped and the project logger is reused, so request logs
 * land on stderr next to everything else.
 */
export function createFixtureApp() {
  const app = Fastify({
    loggerInstance: logger,
    bodyLimit: Number.MAX_SAFE_INTEGER,
  });

  app.setErrorHandler<FastifyError>((error, request, reply) => {
    const statusCode = error.statusCode ?? 500;

    if (statusCode < 500) {
      return reply.code(statusCode).type("text/plain").send(error.message);
    }

    logger.error({ error, url: request.url, method: request.method }, "Unhandled error");

    return reply.code(500).type("text/plain").send("Internal Server Error");
  });

  return app;
}

export type FixtureApp = ReturnType<typeof createFixtureApp>;

export function boundPort(address: AddressInfo | string | null): number {
  if (address === null || typeof address === "string") {
    throw new Error(`Listener is not bound to a TCP port: ${String(address)}`);
  }
  return address.port;
}

/**
 * Bind to an OS-assigned port and return it.
 */
export async function listenOnEphemeralPort(app: FixtureApp, host = LOOPBACK): Promise<number> {
  await app.listen({ port: 0, host });
  return boundPort(app.server.address());
}
