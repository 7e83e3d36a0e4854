/**
 * Fixture Service Launcher
 *
 * Spawns a fixture under `node --import tsx`, waits for its READY marker and
 * reads the port pairs it printed.
 */

import { spawn } from "node:child_process";
import { join } from "node:path";
import type { Readable } from "node:stream";
import { fileURLToPath } from "node:url";
import { READY_MARKER } from "../services/announce";
import { ServiceError } from "./errors";
import { OutputBuffer } from "./output-buffer";
import { parsePortPairs } from "./ports";

export const SERVICE_NAMES = ["http-echo", "http-responses", "tcp-echo"] as const;

export type ServiceName = (typeof SERVICE_NAMES)[number];

export const DEFAULT_READY_TIMEOUT_MS = 10_000;

/**
 * The parts of a child process the launcher relies on
 */
export interface ServiceChild {
  readonly stdout: Readable | null;
  readonly exitCode: number | null;
  readonly signalCode: NodeJS.Signals | null;
  kill(signal?: NodeJS.Signals): boolean;
  on(event: "error", listener: (error: Error) => void): unknown;
  on(event: "exit", listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown;
}

/**
 * Spawner type for dependency injection
 */
export type ServiceSpawner = (
  command: string,
  args: string[],
  env: NodeJS.ProcessEnv,
) => ServiceChild;

function defaultSpawner(command: string, args: string[], env: NodeJS.ProcessEnv): ServiceChild {
  return spawn(command, args, { stdio: ["ignore", "pipe", "inherit"], env });
}

export function isServiceName(name: string): name is ServiceName {
  return SERVICE_NAMES.some((known) => known === name);
}

export class ServiceProcess {
  private readonly stdout: OutputBuffer;
  private readonly exited: Promise<number | null>;
  private portPairs: Map<number, number> | null = null;
  private failure: Error | null = null;

  constructor(
    readonly name: string,
    private readonly child: ServiceChild,
  ) {
    // A failed spawn or kill is reported through error(), never thrown at the emitter
    child.on("error", (error) => {
      this.failure = error;
    });
    this.exited = new Promise((resolve) => {
      child.on("exit", (code) => resolve(code));
    });

    if (!child.stdout) {
      throw new ServiceError(name, "child process has no stdout");
    }
    this.stdout = new OutputBuffer(child.stdout);
  }

  async awaitReady(timeoutMs = DEFAULT_READY_TIMEOUT_MS): Promise<void> {
    try {
      await this.stdout.waitFor(READY_MARKER, timeoutMs);
    } catch (error) {
      throw new ServiceError(this.name, "never became ready", { cause: error });
    }
  }

  /**
   * Everything the service has printed to stdout so far.
   */
  output(): string {
    return this.stdout.text();
  }

  /**
   * Port pairs printed so far. Parsed once, on the first call.
   */
  ports(): Map<number, number> {
    if (this.portPairs === null) {
      try {
        this.portPairs = parsePortPairs(this.stdout.text());
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        throw new ServiceError(this.name, message, { cause: error });
      }
    }
    return this.portPairs;
  }

  getPort(declaredPort: number): number {
    const port = this.ports().get(declaredPort);
    if (port === undefined) {
      throw new ServiceError(this.name, `no port mapped for declared port ${declaredPort}`);
    }
    return port;
  }

  /**
   * Throw if the process failed or has already exited.
   */
  error(): void {
    if (this.failure !== null) {
      throw new ServiceError(this.name, `process failed: ${this.failure.message}`, {
        cause: this.failure,
      });
    }
    if (this.child.exitCode !== null || this.child.signalCode !== null) {
      throw new ServiceError(this.name, "process exited early");
    }
  }

  stop(signal: NodeJS.Signals = "SIGINT"): void {
    this.child.kill(signal);
  }

  /**
   * Resolve with the exit code (null when a signal ended the process).
   */
  async waitForExit(timeoutMs = DEFAULT_READY_TIMEOUT_MS): Promise<number | null> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(() => {
        reject(new ServiceError(this.name, `did not exit within ${timeoutMs}ms`));
      }, timeoutMs);
    });

    try {
      return await Promise.race([this.exited, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }
}

export interface StartServiceOptions {
  spawner?: ServiceSpawner;
  binDir?: string;
  env?: NodeJS.ProcessEnv;
}

export function startService(name: string, options: StartServiceOptions = {}): ServiceProcess {
  if (!isServiceName(name)) {
    throw new ServiceError(name, `unknown service; expected one of ${SERVICE_NAMES.join(", ")}`);
  }

  const spawner = options.spawner ?? defaultSpawner;
  const binDir = options.binDir ?? fileURLToPath(new URL("../bin/", import.meta.url));
  const env = { ...process.env, ...options.env };
  const child = spawner(process.execPath, ["--import", "tsx", join(binDir, `${name}.ts`)], env);

  return new ServiceProcess(name, child);
}
