/**
 * HTTP Echo Fixture
 *
 * Answers every POST with the request body, byte for byte.
 */

import { createFixtureApp } from "./app";

export const HTTP_ECHO_DECLARED_PORT = 80;

export function createHttpEchoApp() {
  const app = createFixtureApp();

  // Every content type is opaque bytes here
  app.removeAllContentTypeParsers();
  app.addContentTypeParser("*", { parseAs: "buffer" }, (_request, body, done) => {
    done(null, body);
  });

  app.post<{ Body: Buffer | undefined }>("/*", async (request, reply) => {
    return reply
      .code(200)
      .type("text/plain")
      .send(request.body ?? Buffer.alloc(0));
  });

  return app;
}
