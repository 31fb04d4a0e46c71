// Holds the onion address once discovery has found it. Written by the
// discovery task, read by request handlers of both listeners. Every call runs
// to completion on the event loop, so reads never observe a partial write.
export class AddressCell {
  private value: string | undefined

  get(): string | undefined {
    return this.value
  }

  isKnown(): boolean {
    return this.value !== undefined
  }

  // Returns true only for the write that moved the cell from unset to set.
  // Once set the value never changes.
  set(address: string): boolean {
    if (this.value !== undefined) return false
    this.value = address
    return true
  }
}
