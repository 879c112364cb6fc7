import { isAbsolute, resolve } from 'node:path'
import type { PackageDescriptor } from './descriptor.js'
import { ConfigError } from './errors.js'
import { LOG_LEVELS, type LogLevel } from './log.js'
import {
  detectTargetPlatform,
  isTargetPlatform,
  SUPPORTED_TARGET_PLATFORMS,
  type TargetPlatform,
} from './platform.js'
import { isRenamePolicy, RENAME_POLICIES, type RenamePolicy } from './rename.js'

export type Env = Record<string, string | undefined>

export type NormalizeConfig = {
  descriptor: PackageDescriptor
  prefix: string
  workDir: string
  renamePolicy: RenamePolicy
  keepNames: string[]
  logLevel: LogLevel
}

/** Values given on the command line; each one wins over its environment variable. */
export type ConfigOverrides = {
  name?: string
  version?: string
  platform?: string
  prefix?: string
  workDir?: string
  renamePolicy?: string
  keepNames?: string[]
  logLevel?: LogLevel
}

function pick(override: string | undefined, ...values: (string | undefined)[]): string | undefined {
  for (const value of [override, ...values]) {
    if (value !== undefined && value.trim() !== '') return value.trim()
  }
  return undefined
}

export function splitList(value: string | undefined): string[] {
  if (!value) return []
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item !== '')
}

function resolvePath(path: string, cwd: string): string {
  return isAbsolute(path) ? path : resolve(cwd, path)
}

/**
 * Reads the build environment the packaging tool sets up (`PKG_NAME`,
 * `PKG_VERSION`, `target_platform`, `PREFIX`, `SRC_DIR`) plus the
 * `BINSTAGE_*` settings.
 */
export function loadConfig(
  env: Env = process.env,
  overrides: ConfigOverrides = {},
  cwd: string = process.cwd(),
): NormalizeConfig {
  const missing: string[] = []

  const name = pick(overrides.name, env['PKG_NAME'])
  if (!name) missing.push('PKG_NAME (--name)')

  const version = pick(overrides.version, env['PKG_VERSION'])
  if (!version) missing.push('PKG_VERSION (--version)')

  const prefix = pick(overrides.prefix, env['PREFIX'])
  if (!prefix) missing.push('PREFIX (--prefix)')

  if (!name || !version || !prefix) {
    throw new ConfigError(`Missing required setting(s): ${missing.join(', ')}`)
  }

  const platformValue = pick(overrides.platform, env['target_platform'], env['TARGET_PLATFORM'])
  let targetPlatform: TargetPlatform
  if (platformValue === undefined) {
    try {
      targetPlatform = detectTargetPlatform()
    } catch (error) {
      throw new ConfigError(error instanceof Error ? error.message : String(error))
    }
  } else if (isTargetPlatform(platformValue)) {
    targetPlatform = platformValue
  } else {
    throw new ConfigError(
      `Unsupported target platform: ${platformValue}. ` +
        `Supported platforms: ${SUPPORTED_TARGET_PLATFORMS.join(', ')}`,
    )
  }

  const policyValue = pick(overrides.renamePolicy, env['BINSTAGE_RENAME_POLICY']) ?? 'first-separator'
  if (!isRenamePolicy(policyValue)) {
    throw new ConfigError(
      `Unknown rename policy: ${policyValue}. Expected one of ${RENAME_POLICIES.join(', ')}`,
    )
  }

  const levelValue = overrides.logLevel ?? pick(undefined, env['BINSTAGE_LOG_LEVEL']) ?? 'info'
  const logLevel = LOG_LEVELS.find((level) => level === levelValue)
  if (!logLevel) {
    throw new ConfigError(
      `Unknown log level: ${levelValue}. Expected one of ${LOG_LEVELS.join(', ')}`,
    )
  }

  const workDir = pick(overrides.workDir, env['SRC_DIR']) ?? cwd

  return {
    descriptor: { name, version, targetPlatform },
    prefix: resolvePath(prefix, cwd),
    workDir: resolvePath(workDir, cwd),
    renamePolicy: policyValue,
    keepNames: [...splitList(env['BINSTAGE_KEEP_NAMES']), ...(overrides.keepNames ?? [])],
    logLevel,
  }
}
