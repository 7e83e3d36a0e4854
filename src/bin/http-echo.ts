/**
 * HTTP echo fixture entry point
 *
 * Usage:
 *   tsx src/bin/http-echo.ts
 */

import { logger } from "../lib/logger";
import { announceReady, announceStarting } from "../services/announce";
import { listenOnEphemeralPort } from "../services/app";
import { createHttpEchoApp, HTTP_ECHO_DECLARED_PORT } from "../services/http-echo";

async function main() {
  announceStarting("Starting http server...");

  const app = createHttpEchoApp();
  const port = await listenOnEphemeralPort(app);

  announceReady(HTTP_ECHO_DECLARED_PORT, port);
}

main().catch((error) => {
  logger.error(error, "HTTP echo fixture failed to start");
  process.exit(1);
});
