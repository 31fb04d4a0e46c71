import consola from "consola"
import type { Hono } from "hono"
import { Server as HttpServer } from "node:http"
import { serve } from "srvx"
import invariant from "tiny-invariant"

import { delay } from "~/lib/delay"
import { RuntimeError, StartupError, describeError } from "~/lib/errors"

export const DEFAULT_DRAIN_TIMEOUT_MS = 10000

export interface ListenerOptions {
  name: string
  hostname: string
  port: number
  app: Hono
  // How long in-flight requests may take to finish once shutdown begins
  drainTimeoutMs?: number
}

export interface BoundListener {
  readonly name: string
  readonly hostname: string
  readonly port: number
  // Serves until `shutdown` resolves, then drains and returns
  serve: (shutdown: Promise<unknown>) => Promise<void>
  // Closes a listener that never got to serve (startup rollback)
  close: () => Promise<void>
}

const log = consola.withTag("listener")

function startServer(opts: ListenerOptions) {
  try {
    return serve({
      fetch: (request) => opts.app.fetch(request),
      hostname: opts.hostname,
      port: opts.port,
      // Listening is logged through consola below
      silent: true,
    })
  } catch (err) {
    throw new StartupError(
      `Unable to bind ${opts.name} listener: ${describeError(err)}`,
      { cause: err },
    )
  }
}

// Binds the socket right away so that a port conflict surfaces as a startup
// error before anything else is started.
export async function bindListener(
  opts: ListenerOptions,
): Promise<BoundListener> {
  const drainTimeoutMs = opts.drainTimeoutMs ?? DEFAULT_DRAIN_TIMEOUT_MS
  const handle = startServer(opts)
  const nodeServer = handle.node?.server
  invariant(
    nodeServer instanceof HttpServer,
    "srvx did not create a Node HTTP server",
  )

  await new Promise<void>((resolve, reject) => {
    if (nodeServer.listening) {
      resolve()
      return
    }
    const onError = (err: Error) => {
      nodeServer.off("listening", onListening)
      reject(
        new StartupError(
          `Unable to bind ${opts.name} listener on ${opts.hostname}:${opts.port}: ${describeError(err)}`,
          { cause: err },
        ),
      )
    }
    const onListening = () => {
      nodeServer.off("error", onError)
      resolve()
    }
    nodeServer.once("error", onError)
    nodeServer.once("listening", onListening)
  })

  const address = nodeServer.address()
  const port =
    typeof address === "object" && address !== null ? address.port : opts.port
  log.info(`${opts.name} endpoint listening on ${opts.hostname}:${port}`)

  const drain = async () => {
    const closing = handle.close()
    const timer = new AbortController()
    const drained = await Promise.race([
      closing.then(() => true),
      delay(drainTimeoutMs, timer.signal).then(() => false),
    ])
    timer.abort()

    if (!drained) {
      log.warn(
        `${opts.name} listener did not drain within ${drainTimeoutMs}ms; closing remaining connections`,
      )
      nodeServer.closeAllConnections()
      await closing
    }
  }

  const closeAfterFailure = async () => {
    if (!nodeServer.listening) return
    try {
      await handle.close(true)
      log.info(`${opts.name} listener closed after failure`)
    } catch (err) {
      log.warn(`Unable to close ${opts.name} listener:`, describeError(err))
    }
  }

  return {
    name: opts.name,
    hostname: opts.hostname,
    port,
    async serve(shutdown) {
      const failure = new Promise<never>((_, reject) => {
        nodeServer.once("error", (err) => {
          reject(
            new RuntimeError(
              `${opts.name} endpoint service error: ${describeError(err)}`,
              { cause: err },
            ),
          )
        })
      })

      try {
        await Promise.race([shutdown, failure])
      } catch (error) {
        // A failed listener must not keep answering requests
        await closeAfterFailure()
        throw error
      }

      log.info(`${opts.name} listener draining`)
      await drain()
      log.info(`${opts.name} listener stopped`)
    },
    close: () => handle.close(true),
  }
}
