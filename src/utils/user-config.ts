import { existsSync, readFileSync } from "fs"
import { homedir } from "os"
import { join } from "path"

/**
 * Defaults for CLI options, read from the user's config file
 */
export interface UserConfig {
  mapFile?: string
  outputDir?: string
  logLevel?: string
}

const CONFIG_KEYS = ["mapFile", "outputDir", "logLevel"] as const

export function getUserConfigPath(): string {
  const configHome = process.env.XDG_CONFIG_HOME || join(homedir(), ".config")
  return join(configHome, "vc0-csv", "config.json")
}

function normalizeString(value: unknown): string | undefined {
  if (typeof value === "string" && value.trim().length > 0) {
    return value.trim()
  }
  return undefined
}

export function loadUserConfig(): UserConfig {
  const configPath = getUserConfigPath()

  if (!existsSync(configPath)) {
    return {}
  }

  let parsed: unknown
  try {
    parsed = JSON.parse(readFileSync(configPath, "utf-8"))
  } catch {
    // Unreadable or malformed config falls back to built-in defaults
    return {}
  }

  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    return {}
  }

  const config: UserConfig = {}
  for (const key of CONFIG_KEYS) {
    const value = normalizeString(Reflect.get(parsed, key))
    if (value !== undefined) {
      config[key] = value
    }
  }
  return config
}
