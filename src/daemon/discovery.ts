import consola from "consola"

import type { AddressCell } from "~/lib/address-cell"
import { delay } from "~/lib/delay"
import { describeError } from "~/lib/errors"
import type { HelperQuery } from "~/lib/helper"
import { findOnionAddress } from "~/lib/onion-address"

import type { DiscoveryResult } from "./types"

export const DISCOVERY_INITIAL_DELAY_MS = 2000
export const DISCOVERY_RETRY_INTERVAL_MS = 5000
export const DISCOVERY_TIMEOUT_MS = 30000

export interface DiscoveryOptions {
  query: HelperQuery
  cell: AddressCell
  initialDelayMs?: number
  retryIntervalMs?: number
  timeoutMs?: number
}

const log = consola.withTag("discovery")

// Polls `arti hss onion-address` until it prints a v3 onion address, then
// publishes it into the cell. The deadline is only checked between attempts,
// so a query still running when it passes is allowed to finish and count.
export async function discoverOnionAddress(
  opts: DiscoveryOptions,
): Promise<DiscoveryResult> {
  const timeoutMs = opts.timeoutMs ?? DISCOVERY_TIMEOUT_MS
  const retryIntervalMs = opts.retryIntervalMs ?? DISCOVERY_RETRY_INTERVAL_MS
  const deadline = Date.now() + timeoutMs

  await delay(opts.initialDelayMs ?? DISCOVERY_INITIAL_DELAY_MS)

  for (;;) {
    try {
      const result = await opts.query()
      if (result.exitCode === 0) {
        const address = findOnionAddress(result.stdout)
        if (address !== undefined) {
          opts.cell.set(address)
          log.success(`Onion address: http://${address}/`)
          return "found"
        }
        log.debug("Address query returned no onion address yet")
      } else {
        log.debug(`Address query exited with code ${result.exitCode}`)
      }
    } catch (err) {
      log.debug("Address query failed:", describeError(err))
    }

    if (Date.now() > deadline) {
      log.warn(
        `No onion address discovered within ${timeoutMs}ms, giving up`,
      )
      return "timed-out"
    }

    await delay(retryIntervalMs)
  }
}
