import { appendFile, mkdir, readdir, readFile } from 'node:fs/promises'
import { join } from 'node:path'
import type { PackageDescriptor } from './descriptor.js'
import { ConfigError, NormalizeError } from './errors.js'
import { silentLogger, type Logger } from './log.js'
import { normalizePrefix, type NormalizeOptions, type NormalizeResult } from './normalize.js'
import { isTargetPlatform, type TargetPlatform } from './platform.js'
import type { RenamePolicy } from './rename.js'

export const DESCRIPTOR_FILE = 'binstage.json'
export const PREFIX_DIR = 'prefix'
export const DEFAULT_BATCH_LIMIT = 100

/** One package directory under `<root>/<platform>/`. */
export type BatchUnit = {
  platform: TargetPlatform
  packageDir: string
  label: string
}

export type BatchFailure = {
  label: string
  code: string
  message: string
}

export type BatchReport = {
  total: number
  succeeded: string[]
  failed: BatchFailure[]
  // Units never started, because of fail-fast or the limit
  pending: string[]
  aborted: boolean
}

export type BatchOptions = {
  failFast?: boolean
  concurrency?: number
  limit?: number
  renamePolicy?: RenamePolicy
  keepNames?: readonly string[]
  logger?: Logger
  normalize?: (options: NormalizeOptions) => Promise<NormalizeResult>
}

async function subdirectories(dir: string): Promise<string[]> {
  const dirents = await readdir(dir, { withFileTypes: true })
  return dirents
    .filter((d) => d.isDirectory())
    .map((d) => d.name)
    .sort()
}

/**
 * Finds `<root>/<platform>/<package>/` directories holding a
 * `binstage.json` descriptor. Directories named after no known platform,
 * and package directories without a descriptor, are skipped.
 */
export async function discoverUnits(
  root: string,
  options: { logger?: Logger } = {},
): Promise<BatchUnit[]> {
  const { logger = silentLogger } = options
  const units: BatchUnit[] = []

  for (const platform of await subdirectories(root)) {
    if (!isTargetPlatform(platform)) {
      logger.debug(`Skipping ${platform}/: not a target platform`)
      continue
    }

    const platformDir = join(root, platform)
    for (const packageName of await subdirectories(platformDir)) {
      const packageDir = join(platformDir, packageName)
      const entries = await readdir(packageDir)
      if (!entries.includes(DESCRIPTOR_FILE)) {
        logger.warn(`${platform}/${packageName}: no ${DESCRIPTOR_FILE} found, skipping`)
        continue
      }
      units.push({ platform, packageDir, label: `${platform}/${packageName}` })
    }
  }

  return units
}

export async function readDescriptor(unit: BatchUnit): Promise<PackageDescriptor> {
  const path = join(unit.packageDir, DESCRIPTOR_FILE)
  let parsed: unknown
  try {
    parsed = JSON.parse(await readFile(path, 'utf-8'))
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error)
    throw new ConfigError(`Cannot read ${path}: ${reason}`)
  }

  if (typeof parsed !== 'object' || parsed === null) {
    throw new ConfigError(`${path} must contain a JSON object`)
  }
  const name: unknown = Reflect.get(parsed, 'name')
  const version: unknown = Reflect.get(parsed, 'version')
  if (typeof name !== 'string' || name === '' || typeof version !== 'string' || version === '') {
    throw new ConfigError(`${path} must define non-empty "name" and "version" strings`)
  }

  return { name, version, targetPlatform: unit.platform }
}

function toFailure(label: string, error: unknown): BatchFailure {
  const message = error instanceof Error ? error.message : String(error)
  return {
    label,
    code: error instanceof NormalizeError ? error.code : 'UNEXPECTED',
    // Multi-line diagnostics (directory listings) stay in the log
    message: message.split('\n')[0] ?? message,
  }
}

/**
 * Normalizes every unit into its own `<packageDir>/prefix`. Units run in
 * groups of `concurrency`; with `failFast` no new group starts after a
 * failure.
 */
export async function runBatch(
  units: readonly BatchUnit[],
  options: BatchOptions = {},
): Promise<BatchReport> {
  const {
    failFast = false,
    concurrency = 1,
    limit = DEFAULT_BATCH_LIMIT,
    renamePolicy,
    keepNames,
    logger = silentLogger,
    normalize = normalizePrefix,
  } = options

  const report: BatchReport = {
    total: units.length,
    succeeded: [],
    failed: [],
    pending: [],
    aborted: false,
  }

  const selected = units.slice(0, Math.max(0, limit))
  report.pending.push(...units.slice(selected.length).map((u) => u.label))
  if (selected.length < units.length) {
    logger.warn(
      `${selected.length} packages will be processed, leaving ${units.length - selected.length} for later`,
    )
  }

  const runUnit = async (unit: BatchUnit, index: number): Promise<void> => {
    logger.info(`* ${unit.label} (${index + 1}/${units.length})`)
    try {
      const descriptor = await readDescriptor(unit)
      const prefix = join(unit.packageDir, PREFIX_DIR)
      await mkdir(prefix, { recursive: true })
      await normalize({
        descriptor,
        prefix,
        workDir: unit.packageDir,
        renamePolicy,
        keepNames,
        logger,
      })
      report.succeeded.push(unit.label)
    } catch (error) {
      const failure = toFailure(unit.label, error)
      logger.error(`${unit.label}: ${failure.message}`)
      report.failed.push(failure)
    }
  }

  const size = Math.max(1, Math.floor(concurrency))
  for (let start = 0; start < selected.length; start += size) {
    if (failFast && report.failed.length > 0) {
      report.aborted = true
      report.pending.unshift(...selected.slice(start).map((u) => u.label))
      break
    }
    const group = selected.slice(start, start + size)
    await Promise.all(group.map((unit, offset) => runUnit(unit, start + offset)))
  }

  report.succeeded.sort()
  report.failed.sort((a, b) => (a.label < b.label ? -1 : a.label > b.label ? 1 : 0))

  return report
}

export function formatStatusReport(report: BatchReport): string {
  const lines = [
    '',
    '### Package normalization',
    '',
    `${report.succeeded.length} of ${report.total} packages processed successfully`,
  ]

  for (const failure of report.failed) {
    lines.push(`- ${failure.label}: ${failure.message}`)
  }
  if (report.aborted) {
    lines.push(`Aborted after the first failure; ${report.pending.length} package(s) not processed`)
  }

  return `${lines.join('\n')}\n`
}

export async function appendStatusReport(statusFile: string, report: BatchReport): Promise<void> {
  await appendFile(statusFile, formatStatusReport(report), 'utf-8')
}
