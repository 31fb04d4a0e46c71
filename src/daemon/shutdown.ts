// One-shot shutdown notification shared by the signal forwarder, the helper
// supervisor and both listeners. fire() is idempotent; subscribe() resolves
// exactly once, immediately when shutdown has already been requested.
export class ShutdownBroadcaster {
  private readonly controller = new AbortController()
  private readonly fired$: Promise<string>
  private readonly resolveFired: (reason: string) => void
  private firedReason: string | undefined

  constructor() {
    let resolveFired: (reason: string) => void = () => {}
    this.fired$ = new Promise((resolve) => {
      resolveFired = resolve
    })
    this.resolveFired = resolveFired
  }

  get fired(): boolean {
    return this.firedReason !== undefined
  }

  get reason(): string | undefined {
    return this.firedReason
  }

  // Aborts when shutdown is requested
  get signal(): AbortSignal {
    return this.controller.signal
  }

  // Returns false when shutdown had already been requested
  fire(reason: string): boolean {
    if (this.firedReason !== undefined) return false
    this.firedReason = reason
    this.resolveFired(reason)
    this.controller.abort(reason)
    return true
  }

  subscribe(): Promise<string> {
    return this.fired$
  }
}
