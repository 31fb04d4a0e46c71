import consola from "consola"
import { afterEach, test, expect, vi } from "vitest"

import { runService } from "../src/start"

afterEach(() => {
  vi.unstubAllEnvs()
  vi.restoreAllMocks()
})

test("runService fails at startup when PORT is not a number", async () => {
  vi.stubEnv("PORT", "notanumber")
  const error = vi.spyOn(consola, "error").mockImplementation(() => {})

  await expect(runService({ verbose: false })).resolves.toBe(1)
  expect(error).toHaveBeenCalledWith(
    'StartupError: Unable to parse PORT as a port number: "notanumber"',
  )
})
