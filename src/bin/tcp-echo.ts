/**
 * TCP echo fixture entry point
 *
 * Usage:
 *   tsx src/bin/tcp-echo.ts
 */

import { logger } from "../lib/logger";
import { announceReady, announceStarting } from "../services/announce";
import { LOOPBACK } from "../services/app";
import { listenTcpEcho, TCP_ECHO_DECLARED_PORT } from "../services/tcp-echo";

async function main() {
  announceStarting(`Listening on ${LOOPBACK}...`);

  const listener = await listenTcpEcho(LOOPBACK);

  // Stop accepting and release the port; open connections die with the process
  process.on("SIGINT", () => {
    logger.info("Closing TCP echo listener");
    listener.server.close();
    process.exit(0);
  });

  announceReady(TCP_ECHO_DECLARED_PORT, listener.port);
}

main().catch((error) => {
  logger.error(error, "TCP echo fixture failed to start");
  process.exit(1);
});
