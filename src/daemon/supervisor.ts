import consola from "consola"

import { delay } from "~/lib/delay"
import { describeError } from "~/lib/errors"
import type {
  ExitStatus,
  HelperCommand,
  HelperLauncher,
  HelperProcess,
} from "~/lib/helper"

import type { ShutdownBroadcaster } from "./shutdown"
import type { SupervisorOutcome, SupervisorState } from "./types"

export const MAX_HELPER_ATTEMPTS = 5
export const HELPER_BACKOFF_MS = 3000
export const HELPER_REAP_TIMEOUT_MS = 5000

export interface SupervisorOptions {
  launcher: HelperLauncher
  command: HelperCommand
  shutdown: ShutdownBroadcaster
  maxAttempts?: number
  backoffMs?: number
  // Upper bound on waiting for a helper whose kill signal was not delivered
  reapTimeoutMs?: number
}

type RunningEvent =
  | { kind: "exited"; status: ExitStatus }
  | { kind: "shutdown" }

const log = consola.withTag("supervisor")

function formatStatus(status: ExitStatus): string {
  return status.signal ? `signal ${status.signal}` : `exit code ${status.code}`
}

// Keeps the arti proxy alive. Every exit is unexpected, including a clean one,
// and is followed by a relaunch after a fixed backoff. Once the attempt budget
// is spent the supervisor fails and requests shutdown of the whole service.
export class ProcessSupervisor {
  private state: SupervisorState = "idle"
  private attempts = 0
  private readonly maxAttempts: number
  private readonly backoffMs: number
  private readonly reapTimeoutMs: number

  constructor(private readonly opts: SupervisorOptions) {
    this.maxAttempts = opts.maxAttempts ?? MAX_HELPER_ATTEMPTS
    this.backoffMs = opts.backoffMs ?? HELPER_BACKOFF_MS
    this.reapTimeoutMs = opts.reapTimeoutMs ?? HELPER_REAP_TIMEOUT_MS
  }

  getState(): SupervisorState {
    return this.state
  }

  getAttempts(): number {
    return this.attempts
  }

  async run(): Promise<SupervisorOutcome> {
    if (this.state !== "idle") {
      throw new Error(`Cannot start supervisor from state ${this.state}`)
    }

    const { launcher, command, shutdown } = this.opts

    for (;;) {
      if (shutdown.fired) return this.stopped()

      this.state = "launching"
      if (this.attempts >= this.maxAttempts) {
        this.state = "failed"
        log.error(
          `Helper failed ${this.attempts} times, giving up and shutting down`,
        )
        shutdown.fire("helper restart budget exhausted")
        return "failed"
      }

      let child: HelperProcess
      try {
        child = await launcher.launch(command)
      } catch (err) {
        log.warn(
          `Failed to launch ${command.file} (attempt ${this.attempts + 1}/${this.maxAttempts}): ${describeError(err)}`,
        )
        if (!(await this.backoff())) return this.stopped()
        continue
      }

      this.state = "running"
      log.info(`Helper started (pid ${child.pid ?? "unknown"})`)

      const exited = child.wait()
      const event = await Promise.race([
        exited.then((status): RunningEvent => ({ kind: "exited", status })),
        shutdown.subscribe().then((): RunningEvent => ({ kind: "shutdown" })),
      ])

      if (event.kind === "shutdown") {
        this.state = "shutting-down"
        if (child.kill()) {
          const status = await exited
          log.info(`Helper terminated (${formatStatus(status)})`)
          return this.stopped()
        }

        log.warn(
          `Unable to kill helper (pid ${child.pid ?? "unknown"}), waiting up to ${this.reapTimeoutMs}ms for it to exit`,
        )
        const timer = new AbortController()
        const status = await Promise.race([
          exited,
          delay(this.reapTimeoutMs, timer.signal).then(() => undefined),
        ])
        timer.abort()
        if (status) {
          log.info(`Helper exited (${formatStatus(status)})`)
        } else {
          log.error(`Helper (pid ${child.pid ?? "unknown"}) was left running`)
        }
        return this.stopped()
      }

      this.state = "exited"
      log.warn(
        `Helper exited (${formatStatus(event.status)}), restarting in ${this.backoffMs}ms`,
      )
      if (!(await this.backoff())) return this.stopped()
    }
  }

  // Waits the backoff and spends one attempt. Returns false when shutdown was
  // requested during the wait.
  private async backoff(): Promise<boolean> {
    const completed = await delay(this.backoffMs, this.opts.shutdown.signal)
    this.attempts += 1
    return completed
  }

  private stopped(): SupervisorOutcome {
    this.state = "stopped"
    return "stopped"
  }
}
