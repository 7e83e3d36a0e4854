/**
 * HTTP canned-response fixture entry point
 *
 * Usage:
 *   HTTP_RESPONSES_FILE=responses.txt tsx src/bin/http-responses.ts
 */

import { config } from "../lib/config";
import { logger } from "../lib/logger";
import { announceReady, announceStarting } from "../services/announce";
import { listenOnEphemeralPort } from "../services/app";
import {
  createHttpResponsesApp,
  HTTP_RESPONSES_DECLARED_PORT,
} from "../services/http-responses";

async function main() {
  announceStarting("Starting http server...");

  const app = createHttpResponsesApp({ responsesFile: config.responsesFile });
  const port = await listenOnEphemeralPort(app);
  logger.info({ port, responsesFile: config.responsesFile }, "Serving canned responses");

  announceReady(HTTP_RESPONSES_DECLARED_PORT, port);
}

main().catch((error) => {
  logger.error(error, "HTTP canned-response fixture failed to start");
  process.exit(1);
});
