import { describe, test, expect } from "vitest"

import {
  childProcessLauncher,
  createHelperQuery,
  onionAddressCommand,
  proxyCommand,
} from "../src/lib/helper"

const paths = {
  artiBinary: "/opt/arti/bin/arti",
  configPath: "/etc/arti/onionservice.toml",
  nickname: "demo",
}

const missing = { file: "/nonexistent/onion-gateway-test/arti", args: [] }

describe("helper commands", () => {
  test("runs the proxy with the configuration file", () => {
    expect(proxyCommand(paths)).toEqual({
      file: "/opt/arti/bin/arti",
      args: ["proxy", "-c", "/etc/arti/onionservice.toml"],
    })
  })

  test("asks the named onion service for its address", () => {
    expect(onionAddressCommand(paths)).toEqual({
      file: "/opt/arti/bin/arti",
      args: [
        "-c",
        "/etc/arti/onionservice.toml",
        "hss",
        "--nickname",
        "demo",
        "onion-address",
      ],
    })
  })
})

describe("missing helper binary", () => {
  test("launch rejects instead of producing a process", async () => {
    await expect(childProcessLauncher.launch(missing)).rejects.toMatchObject({
      code: "ENOENT",
    })
  })

  test("query rejects when the command cannot be run", async () => {
    await expect(createHelperQuery(missing)()).rejects.toMatchObject({
      code: "ENOENT",
    })
  })
})
