/**
 * Raised when a fixture service cannot be launched or queried.
 */
export class ServiceError extends Error {
  constructor(
    public readonly service: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`${service}: ${message}`, options);
    this.name = "ServiceError";
  }
}
