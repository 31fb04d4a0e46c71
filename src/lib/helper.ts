import consola from "consola"
import { execFile, spawn, type ChildProcess } from "node:child_process"
import { createInterface } from "node:readline"

import type { ServiceConfig } from "./config"

// Narrow capability around the arti binary so the supervisor and discovery
// task can be driven by fake processes in tests.

export interface HelperCommand {
  file: string
  args: Array<string>
}

export interface ExitStatus {
  code: number | null
  signal: NodeJS.Signals | null
}

export interface HelperProcess {
  readonly pid: number | undefined
  // Resolves once the process has exited and been reaped
  wait: () => Promise<ExitStatus>
  // Forcible termination, no grace period. Returns false when the signal
  // could not be delivered (EPERM, ESRCH...).
  kill: () => boolean
}

export interface HelperLauncher {
  // Rejects when the process could not be started at all (ENOENT, EACCES...)
  launch: (command: HelperCommand) => Promise<HelperProcess>
}

export interface QueryResult {
  exitCode: number | null
  stdout: string
}

export type HelperQuery = () => Promise<QueryResult>

type HelperPaths = Pick<ServiceConfig, "artiBinary" | "configPath">

export function proxyCommand(config: HelperPaths): HelperCommand {
  return { file: config.artiBinary, args: ["proxy", "-c", config.configPath] }
}

export function onionAddressCommand(
  config: HelperPaths & Pick<ServiceConfig, "nickname">,
): HelperCommand {
  return {
    file: config.artiBinary,
    args: [
      "-c",
      config.configPath,
      "hss",
      "--nickname",
      config.nickname,
      "onion-address",
    ],
  }
}

const output = consola.withTag("arti")

function forwardOutput(child: ChildProcess) {
  for (const stream of [child.stdout, child.stderr]) {
    if (!stream) continue
    const lines = createInterface({ input: stream })
    lines.on("line", (line) => output.debug(line))
  }
}

export const childProcessLauncher: HelperLauncher = {
  launch(command) {
    return new Promise((resolve, reject) => {
      const child = spawn(command.file, command.args, {
        stdio: ["ignore", "pipe", "pipe"],
      })

      const exited = new Promise<ExitStatus>((resolveExit) => {
        child.once("exit", (code, signal) => resolveExit({ code, signal }))
      })

      child.once("error", reject)
      child.once("spawn", () => {
        child.off("error", reject)
        // After a successful spawn the only errors left are failed kill()
        // calls, which kill() also reports through its return value
        child.on("error", (err) => output.warn("Helper process error:", err))
        forwardOutput(child)

        resolve({
          pid: child.pid,
          wait: () => exited,
          kill: () => {
            if (child.exitCode !== null || child.signalCode !== null) {
              return true
            }
            return child.kill("SIGKILL")
          },
        })
      })
    })
  },
}

// Runs the one-shot address query. A non-zero exit resolves with its code;
// only a failure to run the command at all rejects.
export function createHelperQuery(command: HelperCommand): HelperQuery {
  return () =>
    new Promise((resolve, reject) => {
      execFile(command.file, command.args, (error, stdout) => {
        if (error === null) {
          resolve({ exitCode: 0, stdout })
          return
        }
        if (typeof error.code === "number") {
          resolve({ exitCode: error.code, stdout })
          return
        }
        reject(error)
      })
    })
}
