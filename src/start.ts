import { defineCommand } from "citty"
import consola from "consola"

import { ServiceController } from "./daemon/controller"
import { loadConfig } from "./lib/config"
import { ServiceError } from "./lib/errors"

interface RunServiceOptions {
  configPath?: string
  artiBinary?: string
  nickname?: string
  verbose: boolean
}

// Exit status for the whole process: 0 after a clean shutdown, 1 for any
// startup or runtime error.
export async function runService(options: RunServiceOptions): Promise<number> {
  if (options.verbose) {
    consola.level = 5
    consola.info("Verbose logging enabled")
  }

  try {
    // PORT is parsed before anything is bound
    const config = loadConfig(process.env, options)
    const controller = new ServiceController({
      config,
      onForce: () => process.exit(2),
    })
    await controller.run()
    return 0
  } catch (error) {
    if (error instanceof ServiceError) {
      consola.error(`${error.name}: ${error.message}`)
    } else {
      consola.error("Service failed:", error)
    }
    return 1
  }
}

export const sharedArgs = {
  config: {
    alias: "c",
    type: "string",
    description: "Path to the arti configuration file",
  },
  arti: {
    type: "string",
    description: "Path to the arti binary",
  },
  nickname: {
    alias: "n",
    type: "string",
    description: "Nickname of the onion service in the arti configuration",
  },
  verbose: {
    alias: "v",
    type: "boolean",
    default: false,
    description: "Enable verbose logging",
  },
} as const

export const start = defineCommand({
  meta: {
    name: "serve",
    description: "Serve the site on the onion and public endpoints",
  },
  args: sharedArgs,
  async run({ args }) {
    const code = await runService({
      configPath: args.config,
      artiBinary: args.arti,
      nickname: args.nickname,
      verbose: args.verbose,
    })
    // Background timers (address discovery) must not keep the process alive
    process.exit(code)
  },
})
