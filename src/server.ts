import consola from "consola"
import { Hono } from "hono"
import { logger } from "hono/logger"

import type { ShutdownBroadcaster } from "./daemon/shutdown"
import type { AddressCell } from "./lib/address-cell"

export interface AppContext {
  cell: AddressCell
  shutdown: ShutdownBroadcaster
}

const ONION_PAGE =
  "<h1>Hello!</h1><p>You are connected via the Tor network (onion service).</p>"

export function publicPage(onionAddress: string | undefined): string {
  const onion = onionAddress
    ? `<p>This site is also available as an onion service at <a href="http://${onionAddress}/">${onionAddress}</a>.</p>`
    : "<p>The onion address of this site is not known yet.</p>"
  return `<h1>Hello!</h1><p>You are connected via the public endpoint. If you reached this through the Tor network, your connection is indirect; otherwise, you're connected directly.</p>${onion}`
}

function createApp({ cell, shutdown }: AppContext): Hono {
  const app = new Hono()

  app.use(logger((message, ...rest) => consola.info(message, ...rest)))

  // Registered ahead of the readiness guard so it keeps answering while
  // the listeners drain
  app.get("/health", (c) =>
    c.json({
      status: shutdown.fired ? "draining" : "ok",
      onionAddress: cell.get() ?? null,
    }),
  )

  // Once shutdown has begun, refuse new work so in-flight requests can drain
  app.use(async (c, next) => {
    if (shutdown.fired) {
      return c.text("Service is shutting down", 503)
    }
    await next()
  })

  return app
}

export function createOnionApp(ctx: AppContext): Hono {
  const app = createApp(ctx)
  app.get("/", (c) => c.html(ONION_PAGE))
  return app
}

export function createPublicApp(ctx: AppContext): Hono {
  const app = createApp(ctx)
  app.get("/", (c) => c.html(publicPage(ctx.cell.get())))
  return app
}
