const ONION_ADDRESS = /^[a-z2-7]{56}\.onion$/

export function isOnionAddress(value: string): boolean {
  return ONION_ADDRESS.test(value)
}

/**
 * Returns the first line of `output` that, once trimmed, is a complete v3
 * onion address. Lines that only contain an address among other text are
 * skipped.
 */
export function findOnionAddress(output: string): string | undefined {
  for (const line of output.split("\n")) {
    const trimmed = line.trim()
    if (isOnionAddress(trimmed)) return trimmed
  }
  return undefined
}
