import { defineCommand } from "citty"
import consola from "consola"

import { loadConfig } from "./lib/config"
import { describeError } from "./lib/errors"
import {
  createHelperQuery,
  onionAddressCommand,
  type HelperQuery,
} from "./lib/helper"
import { findOnionAddress } from "./lib/onion-address"
import { sharedArgs } from "./start"

// Asks arti once for the onion address. Returns undefined when arti fails or
// does not print one.
export async function queryOnionAddress(
  query: HelperQuery,
): Promise<string | undefined> {
  try {
    const result = await query()
    if (result.exitCode !== 0) {
      consola.warn(`arti exited with code ${result.exitCode}`)
      return undefined
    }
    return findOnionAddress(result.stdout)
  } catch (err) {
    consola.warn("Unable to run arti:", describeError(err))
    return undefined
  }
}

export const address = defineCommand({
  meta: {
    name: "address",
    description: "Print the onion address of the running service",
  },
  args: sharedArgs,
  async run({ args }) {
    if (args.verbose) consola.level = 5

    const config = loadConfig(process.env, {
      configPath: args.config,
      artiBinary: args.arti,
      nickname: args.nickname,
    })
    const onion = await queryOnionAddress(
      createHelperQuery(onionAddressCommand(config)),
    )
    if (onion === undefined) {
      consola.error("Onion address is not known yet")
      process.exitCode = 1
      return
    }
    consola.log(onion)
  },
})
