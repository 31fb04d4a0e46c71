import { StartupError } from "./errors"

export const DEFAULT_PUBLIC_PORT = 8080
export const DEFAULT_ONION_PORT = 3000
export const DEFAULT_CONFIG_PATH = "/etc/arti/onionservice.toml"
export const DEFAULT_ARTI_BINARY = "./arti"
export const DEFAULT_NICKNAME = "demo"

export interface ServiceConfig {
  publicPort: number
  onionPort: number
  configPath: string
  artiBinary: string
  nickname: string
}

export interface ConfigOverrides {
  configPath?: string
  artiBinary?: string
  nickname?: string
}

const PORT_PATTERN = /^\+?\d+$/

// Absent or blank falls back to the default; anything else must be a valid
// port number, otherwise startup fails instead of silently using the default.
export function parsePort(
  name: string,
  raw: string | undefined,
  fallback: number,
): number {
  if (raw === undefined || raw.trim() === "") return fallback

  if (!PORT_PATTERN.test(raw)) {
    throw new StartupError(`Unable to parse ${name} as a port number: "${raw}"`)
  }

  const port = Number.parseInt(raw, 10)
  if (port > 65535) {
    throw new StartupError(`${name} is out of range (0-65535): "${raw}"`)
  }
  return port
}

export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: ConfigOverrides = {},
): ServiceConfig {
  return {
    publicPort: parsePort("PORT", env.PORT, DEFAULT_PUBLIC_PORT),
    onionPort: parsePort("ONION_PORT", env.ONION_PORT, DEFAULT_ONION_PORT),
    configPath: overrides.configPath ?? DEFAULT_CONFIG_PATH,
    artiBinary: overrides.artiBinary ?? DEFAULT_ARTI_BINARY,
    nickname: overrides.nickname ?? DEFAULT_NICKNAME,
  }
}
