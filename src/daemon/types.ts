export type LifecycleState =
  | "init"
  | "starting"
  | "ready"
  | "draining"
  | "stopped"
  | "failed"

export type SupervisorState =
  | "idle"
  | "launching"
  | "running"
  | "exited"
  | "shutting-down"
  | "stopped"
  | "failed"

export type SupervisorOutcome = "stopped" | "failed"

export type DiscoveryResult = "found" | "timed-out"
