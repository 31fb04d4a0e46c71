export type ServiceErrorKind = "startup" | "runtime"

// Base for the two failure classes the process can end with. Startup errors
// happen before any listener serves; runtime errors happen after.
export class ServiceError extends Error {
  constructor(
    readonly kind: ServiceErrorKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options)
    this.name = kind === "startup" ? "StartupError" : "RuntimeError"
  }
}

export class StartupError extends ServiceError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("startup", message, options)
  }
}

export class RuntimeError extends ServiceError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("runtime", message, options)
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
