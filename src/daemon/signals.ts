import consola from "consola"

import type { ShutdownBroadcaster } from "./shutdown"

export type ShutdownSignalName = "SIGINT" | "SIGTERM"

// The part of `process` the forwarder needs; tests pass an EventEmitter.
export interface ProcessSignals {
  on: (signal: ShutdownSignalName, handler: () => void) => unknown
  removeListener: (signal: ShutdownSignalName, handler: () => void) => unknown
}

export interface SignalForwarderOptions {
  signals?: ProcessSignals
  // Called when a second signal arrives while shutdown is already under way
  onForce?: (signal: ShutdownSignalName) => void
}

const SHUTDOWN_SIGNALS: ReadonlyArray<ShutdownSignalName> = [
  "SIGINT",
  "SIGTERM",
]

const log = consola.withTag("signals")

// Maps SIGINT and SIGTERM onto the shutdown broadcaster. Returns a function
// that removes the handlers again.
export function forwardSignals(
  shutdown: ShutdownBroadcaster,
  opts: SignalForwarderOptions = {},
): () => void {
  const signals = opts.signals ?? process
  const handlers = SHUTDOWN_SIGNALS.map((signal) => {
    const handler = () => {
      if (shutdown.fire(signal)) {
        log.info(`Signal received: ${signal}, shutting down`)
        return
      }
      log.warn(
        `Second signal received during shutdown (${signal}): forcing termination`,
      )
      opts.onForce?.(signal)
    }
    signals.on(signal, handler)
    return { signal, handler }
  })

  return () => {
    for (const { signal, handler } of handlers) {
      signals.removeListener(signal, handler)
    }
  }
}
