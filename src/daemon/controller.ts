import consola from "consola"

import { AddressCell } from "~/lib/address-cell"
import type { ServiceConfig } from "~/lib/config"
import { RuntimeError, ServiceError, describeError } from "~/lib/errors"
import {
  childProcessLauncher,
  createHelperQuery,
  onionAddressCommand,
  proxyCommand,
  type HelperLauncher,
  type HelperQuery,
} from "~/lib/helper"
import { createOnionApp, createPublicApp } from "~/server"

import { discoverOnionAddress, type DiscoveryOptions } from "./discovery"
import { bindListener, type BoundListener } from "./listener"
import { ShutdownBroadcaster } from "./shutdown"
import {
  forwardSignals,
  type ProcessSignals,
  type ShutdownSignalName,
} from "./signals"
import { ProcessSupervisor, type SupervisorOptions } from "./supervisor"
import type { LifecycleState, SupervisorOutcome } from "./types"

export interface ControllerOptions {
  config: ServiceConfig
  // The onion endpoint is only meant to be reached through arti
  onionHostname?: string
  publicHostname?: string
  launcher?: HelperLauncher
  query?: HelperQuery
  signals?: ProcessSignals
  onForce?: (signal: ShutdownSignalName) => void
  supervisor?: Pick<SupervisorOptions, "maxAttempts" | "backoffMs">
  discovery?: Pick<
    DiscoveryOptions,
    "initialDelayMs" | "retryIntervalMs" | "timeoutMs"
  >
  drainTimeoutMs?: number
}

type Completion = { ok: true } | { ok: false; error: ServiceError }

const log = consola.withTag("controller")

function asServiceError(err: unknown, context: string): ServiceError {
  if (err instanceof ServiceError) return err
  return new RuntimeError(`${context}: ${describeError(err)}`, { cause: err })
}

// Lifecycle owner: binds both listeners, keeps arti supervised, runs address
// discovery in the background and turns the combined outcome of the
// listeners and the supervisor into a single success or failure.
export class ServiceController {
  readonly cell = new AddressCell()
  readonly shutdown = new ShutdownBroadcaster()
  private state: LifecycleState = "init"
  private listeners: Array<BoundListener> = []
  private supervisor: ProcessSupervisor | null = null
  private completion: Promise<Completion> | null = null

  constructor(private readonly opts: ControllerOptions) {}

  getState(): LifecycleState {
    return this.state
  }

  getListeners(): ReadonlyArray<BoundListener> {
    return this.listeners
  }

  getSupervisor(): ProcessSupervisor | null {
    return this.supervisor
  }

  // Binds both listeners and starts every background activity. Bind failures
  // reject with a StartupError and leave nothing running.
  async start(): Promise<void> {
    if (this.state !== "init") {
      throw new Error(`Cannot start from state ${this.state}`)
    }

    this.state = "starting"
    const { config } = this.opts

    try {
      this.listeners = await this.bindListeners()
    } catch (error) {
      this.state = "failed"
      throw error
    }

    void discoverOnionAddress({
      ...this.opts.discovery,
      query: this.opts.query ?? createHelperQuery(onionAddressCommand(config)),
      cell: this.cell,
    }).catch((err: unknown) => {
      log.error("Onion address discovery crashed:", err)
    })

    const disposeSignals = forwardSignals(this.shutdown, {
      signals: this.opts.signals,
      onForce: this.opts.onForce,
    })

    const supervisor = new ProcessSupervisor({
      ...this.opts.supervisor,
      launcher: this.opts.launcher ?? childProcessLauncher,
      command: proxyCommand(config),
      shutdown: this.shutdown,
    })
    this.supervisor = supervisor
    // Settled right away so a crash is never reported as unhandled while the
    // listeners are still serving
    const supervision = Promise.allSettled([supervisor.run()]).then(
      ([result]) => result,
    )

    this.state = "ready"
    void this.shutdown.subscribe().then((reason) => {
      if (this.state === "ready") this.state = "draining"
      log.info("Begin graceful shutdown:", reason)
    })

    this.completion = this.serve(supervision).then((completion) => {
      disposeSignals()
      this.state = completion.ok ? "stopped" : "failed"
      return completion
    })
  }

  // Resolves once both listeners and the supervisor have finished. Rejects
  // with the error that decides the exit status.
  async wait(): Promise<void> {
    if (!this.completion) {
      throw new Error("Service has not been started")
    }

    const completion = await this.completion
    if (!completion.ok) throw completion.error
  }

  async run(): Promise<void> {
    await this.start()
    await this.wait()
  }

  private async bindListeners(): Promise<Array<BoundListener>> {
    const { config, drainTimeoutMs } = this.opts
    const appContext = { cell: this.cell, shutdown: this.shutdown }
    const listenerOptions = [
      {
        name: "onion",
        hostname: this.opts.onionHostname ?? "127.0.0.1",
        port: config.onionPort,
        app: createOnionApp(appContext),
        drainTimeoutMs,
      },
      {
        name: "public",
        hostname: this.opts.publicHostname ?? "0.0.0.0",
        port: config.publicPort,
        app: createPublicApp(appContext),
        drainTimeoutMs,
      },
    ]

    const bound: Array<BoundListener> = []
    try {
      for (const options of listenerOptions) {
        bound.push(await bindListener(options))
      }
    } catch (error) {
      await Promise.allSettled(bound.map((listener) => listener.close()))
      throw error
    }
    return bound
  }

  // A failing listener requests shutdown so the other listener drains and
  // arti gets reaped; the supervisor is still awaited before the listener
  // error is reported.
  private async serve(
    supervision: Promise<PromiseSettledResult<SupervisorOutcome>>,
  ): Promise<Completion> {
    const served = await Promise.allSettled(
      this.listeners.map(async (listener) => {
        try {
          await listener.serve(this.shutdown.subscribe())
        } catch (error) {
          this.shutdown.fire(`${listener.name} listener failed`)
          throw error
        }
      }),
    )

    const supervised = await supervision

    for (const result of served) {
      if (result.status === "rejected") {
        const error = asServiceError(result.reason, "Listener failed")
        log.error(error.message)
        return { ok: false, error }
      }
    }

    if (supervised.status === "rejected") {
      return {
        ok: false,
        error: asServiceError(
          supervised.reason,
          "Unable to join helper supervisor",
        ),
      }
    }

    if (supervised.value === "failed") {
      return {
        ok: false,
        error: new RuntimeError("Helper process restart budget exhausted"),
      }
    }

    log.info("Shutdown complete")
    return { ok: true }
  }
}
