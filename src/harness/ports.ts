const MALFORMED_PAIR =
  "malformed service port pair - PORT values should be in the form PORT=(80,8080)";
const NOT_A_NUMBER = "port number was not a number";

const MAX_PORT = 65535;

function parsePort(raw: string): number {
  const value = raw.trim();
  if (!/^\d+$/.test(value)) {
    throw new Error(NOT_A_NUMBER);
  }
  const port = Number.parseInt(value, 10);
  if (port > MAX_PORT) {
    throw new Error(NOT_A_NUMBER);
  }
  return port;
}

/**
 * Collect every `PORT=(<declared>,<actual>)` line from a service's stdout.
 *
 * Other `KEY=value` lines and plain text are ignored; a PORT line in any
 * other shape is an error.
 */
export function parsePortPairs(output: string): Map<number, number> {
  const ports = new Map<number, number>();

  for (const line of output.split("\n")) {
    const trimmed = line.trim();
    const equals = trimmed.indexOf("=");
    if (equals === -1) {
      continue;
    }

    const key = trimmed.slice(0, equals).trim();
    if (key !== "PORT") {
      continue;
    }

    const value = trimmed.slice(equals + 1).trim();
    const comma = value.indexOf(",");
    if (comma === -1) {
      throw new Error(MALFORMED_PAIR);
    }

    const declared = value.slice(0, comma).trim();
    const actual = value.slice(comma + 1).trim();
    if (!declared.startsWith("(") || !actual.endsWith(")")) {
      throw new Error(MALFORMED_PAIR);
    }

    ports.set(parsePort(declared.slice(1)), parsePort(actual.slice(0, -1)));
  }

  return ports;
}
