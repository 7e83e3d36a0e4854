/**
 * Startup protocol shared by every fixture service.
 *
 * A harness reads the service's stdout line by line: first a startup line,
 * then `PORT=(<declared>,<actual>)`, then `READY` once the listener accepts
 * connections.
 */

export interface LineWriter {
  write(chunk: string): boolean;
}

export const READY_MARKER = "READY";

export function formatPortLine(declaredPort: number, actualPort: number): string {
  return `PORT=(${declaredPort},${actualPort})`;
}

export function announceStarting(message: string, out: LineWriter = process.stdout): void {
  out.write(`${message}\n`);
}

/**
 * Call only after the listener is bound.
 */
export function announceReady(
  declaredPort: number,
  actualPort: number,
  out: LineWriter = process.stdout,
): void {
  out.write(`${formatPortLine(declaredPort, actualPort)}\n${READY_MARKER}\n`);
}
