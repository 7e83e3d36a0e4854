/**
 * HTTP Canned-Response Fixture
 *
 * Serves GET requests from a `<path> <body>` file that is re-read on every
 * request, so tests can rewrite it between calls.
 */

import { config } from "../lib/config";
import { createFixtureApp } from "./app";
import { findResponse, loadResponseTable } from "./response-table";

export const HTTP_RESPONSES_DECLARED_PORT = 80;

export interface HttpResponsesOptions {
  responsesFile?: string;
}

/**
 * Path component of a request target, query string dropped.
 */
export function requestPath(url: string): string {
  const queryStart = url.indexOf("?");
  return queryStart === -1 ? url : url.slice(0, queryStart);
}

export function createHttpResponsesApp(options: HttpResponsesOptions = {}) {
  const responsesFile = options.responsesFile ?? config.responsesFile;
  const app = createFixtureApp();

  app.get("/*", async (request, reply) => {
    const path = requestPath(request.url);
    const table = await loadResponseTable(responsesFile);
    const body = findResponse(table, path);

    if (body === undefined) {
      return reply.code(404).type("text/plain").send("Not Found");
    }

    return reply.code(200).type("text/plain").send(body);
  });

  return app;
}
