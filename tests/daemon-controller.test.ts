import { Hono } from "hono"
import { EventEmitter } from "node:events"
import type { Server } from "node:http"
import { afterEach, describe, test, expect, vi } from "vitest"

import {
  ServiceController,
  type ControllerOptions,
} from "../src/daemon/controller"
import { bindListener, type BoundListener } from "../src/daemon/listener"
import { RuntimeError, StartupError } from "../src/lib/errors"
import type { HelperLauncher, HelperProcess } from "../src/lib/helper"

import { ONION_ADDRESS, createFakeHelper, queryOutput } from "./fakes"

const servers = vi.hoisted(() => new Array<Server>())

vi.mock("srvx", async (importOriginal) => {
  const actual = await importOriginal<typeof import("srvx")>()
  const http = await import("node:http")
  return {
    ...actual,
    serve: (options: Parameters<typeof actual.serve>[0]) => {
      const handle = actual.serve(options)
      if (handle.node?.server instanceof http.Server) {
        servers.push(handle.node.server)
      }
      return handle
    },
  }
})

const config = {
  publicPort: 0,
  onionPort: 0,
  configPath: "/etc/arti/test.toml",
  artiBinary: "arti",
  nickname: "demo",
}

const occupied: Array<BoundListener> = []

afterEach(async () => {
  await Promise.allSettled(occupied.splice(0).map((l) => l.close()))
})

function setup(overrides: Partial<ControllerOptions> = {}) {
  const signals = new EventEmitter()
  const helpers: Array<ReturnType<typeof createFakeHelper>> = []
  const launch = vi.fn(async (): Promise<HelperProcess> => {
    const helper = createFakeHelper()
    helpers.push(helper)
    return helper
  })
  const launcher: HelperLauncher = { launch }
  const query = vi.fn(async () => queryOutput(`${ONION_ADDRESS}\n`))

  const controller = new ServiceController({
    config,
    publicHostname: "127.0.0.1",
    launcher,
    query,
    signals,
    supervisor: { backoffMs: 1 },
    discovery: { initialDelayMs: 0, retryIntervalMs: 5, timeoutMs: 100 },
    drainTimeoutMs: 500,
    ...overrides,
  })
  return { controller, signals, launch, helpers, query }
}

function urlOf(controller: ServiceController, name: string, path = "/") {
  const listener = controller.getListeners().find((l) => l.name === name)
  if (!listener) throw new Error(`no ${name} listener`)
  return `http://127.0.0.1:${listener.port}${path}`
}

describe("ServiceController", () => {
  test("serves both endpoints and stops cleanly on SIGTERM", async () => {
    const { controller, signals, launch, helpers } = setup()

    await controller.start()
    expect(controller.getState()).toBe("ready")
    expect(controller.getListeners().map((l) => l.name)).toEqual([
      "onion",
      "public",
    ])
    await vi.waitFor(() => expect(launch).toHaveBeenCalledTimes(1))

    const onion = await fetch(urlOf(controller, "onion"))
    expect(await onion.text()).toContain("connected via the Tor network")

    await vi.waitFor(() => expect(controller.cell.get()).toBe(ONION_ADDRESS))
    const pub = await fetch(urlOf(controller, "public"))
    expect(await pub.text()).toContain(`href="http://${ONION_ADDRESS}/"`)

    signals.emit("SIGTERM")
    await controller.wait()

    expect(controller.getState()).toBe("stopped")
    expect(controller.getSupervisor()?.getState()).toBe("stopped")
    expect(helpers[0]?.killed).toBe(true)
    expect(signals.listenerCount("SIGTERM")).toBe(0)
  })

  test("exits cleanly on a signal before any request", async () => {
    const { controller, signals, launch } = setup()

    await controller.start()
    await vi.waitFor(() => expect(launch).toHaveBeenCalledTimes(1))
    const publicUrl = urlOf(controller, "public")

    signals.emit("SIGINT")
    await expect(controller.wait()).resolves.toBeUndefined()
    await expect(fetch(publicUrl)).rejects.toThrow()
  })

  test("fails when the helper restart budget is exhausted", async () => {
    const { controller, launch } = setup({
      launcher: {
        launch: async () => {
          throw new Error("spawn arti ENOENT")
        },
      },
    })

    await controller.start()
    const outcome = controller.wait()

    await expect(outcome).rejects.toBeInstanceOf(RuntimeError)
    await expect(outcome).rejects.toThrow(
      "Helper process restart budget exhausted",
    )
    expect(controller.getState()).toBe("failed")
    expect(controller.shutdown.reason).toBe("helper restart budget exhausted")
    expect(launch).not.toHaveBeenCalled()
  })

  test("a failing listener shuts the whole service down", async () => {
    const { controller, launch, helpers } = setup()

    const created = servers.length
    await controller.start()
    const [onionServer, publicServer] = servers.slice(created)
    if (!onionServer || !publicServer) throw new Error("servers not created")
    await vi.waitFor(() => expect(launch).toHaveBeenCalledTimes(1))

    publicServer.emit("error", new Error("boom"))
    const outcome = controller.wait()

    await expect(outcome).rejects.toBeInstanceOf(RuntimeError)
    await expect(outcome).rejects.toThrow("public endpoint service error: boom")
    expect(controller.shutdown.reason).toBe("public listener failed")
    expect(helpers[0]?.killed).toBe(true)
    expect(controller.getSupervisor()?.getState()).toBe("stopped")
    expect(controller.getState()).toBe("failed")
    expect(onionServer.listening).toBe(false)
    expect(publicServer.listening).toBe(false)
  })

  test("rejects with a startup error when a port is taken", async () => {
    const app = new Hono()
    const taken = await bindListener({
      name: "blocker",
      hostname: "127.0.0.1",
      port: 0,
      app,
    })
    occupied.push(taken)

    const { controller, launch, query } = setup({
      config: { ...config, publicPort: taken.port },
    })

    await expect(controller.start()).rejects.toBeInstanceOf(StartupError)
    expect(controller.getState()).toBe("failed")
    expect(launch).not.toHaveBeenCalled()
    expect(query).not.toHaveBeenCalled()
    await expect(controller.wait()).rejects.toThrow(
      "Service has not been started",
    )
  })

  test("a second signal asks for forced termination", async () => {
    const onForce = vi.fn()
    const { controller, signals } = setup({ onForce })

    await controller.start()
    signals.emit("SIGTERM")
    signals.emit("SIGINT")

    expect(onForce).toHaveBeenCalledWith("SIGINT")
    await controller.wait()
  })

  test("cannot be started twice", async () => {
    const { controller, signals } = setup()

    await controller.start()
    await expect(controller.start()).rejects.toThrow(
      "Cannot start from state ready",
    )

    signals.emit("SIGTERM")
    await controller.wait()
  })
})
