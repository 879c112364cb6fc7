import { lstat, readdir, rename } from 'node:fs/promises'
import { join } from 'node:path'
import { LayoutConflictError } from './errors.js'
import { silentLogger, type Logger } from './log.js'

/**
 * How a versioned executable name is shortened.
 *
 * - `first-separator`: everything before the first separator
 *   (`my-tool-1.2.3-linux64` becomes `my`)
 * - `version-boundary`: everything before the separator in front of the
 *   version (`my-tool-1.2.3-linux64` becomes `my-tool`)
 * - `keep`: names are never changed
 */
export type RenamePolicy = 'first-separator' | 'version-boundary' | 'keep'

export const RENAME_POLICIES: readonly RenamePolicy[] = [
  'first-separator',
  'version-boundary',
  'keep',
]

export const DEFAULT_SEPARATORS: readonly string[] = ['-']

export type ShortenOptions = {
  version: string
  policy?: RenamePolicy
  separators?: readonly string[]
  // Re-appended when the original name ends with one (`tool-1.0-win64.exe` -> `tool.exe`)
  preserveExtensions?: readonly string[]
}

export type RenameOptions = ShortenOptions & {
  keepNames?: readonly string[]
  logger?: Logger
}

export type RenamedExecutable = {
  from: string
  to: string
}

export function isRenamePolicy(value: string): value is RenamePolicy {
  return RENAME_POLICIES.some((policy) => policy === value)
}

function cutAtFirstSeparator(name: string, separators: readonly string[]): string {
  let cut = -1
  for (const separator of separators) {
    const index = name.indexOf(separator)
    if (index !== -1 && (cut === -1 || index < cut)) cut = index
  }
  return cut === -1 ? name : name.slice(0, cut)
}

function cutAtVersionBoundary(
  name: string,
  version: string,
  separators: readonly string[],
): string {
  let end = name.indexOf(version)
  if (end > 0 && (name[end - 1] === 'v' || name[end - 1] === 'V')) {
    end -= 1
  }
  const before = name[end - 1]
  if (end < 1 || before === undefined || !separators.includes(before)) {
    return name
  }
  return name.slice(0, end - 1)
}

/**
 * Returns the stable command name for `name`, or `name` itself when it
 * carries no version or the policy leaves nothing to keep.
 */
export function shortenExecutableName(name: string, options: ShortenOptions): string {
  const {
    version,
    policy = 'first-separator',
    separators = DEFAULT_SEPARATORS,
    preserveExtensions = [],
  } = options

  if (policy === 'keep' || version === '' || !name.includes(version)) {
    return name
  }

  const short =
    policy === 'first-separator'
      ? cutAtFirstSeparator(name, separators)
      : cutAtVersionBoundary(name, version, separators)

  if (short === '' || short === name) {
    return name
  }

  const extension = preserveExtensions.find((ext) =>
    name.toLowerCase().endsWith(ext.toLowerCase()),
  )
  if (extension && !short.toLowerCase().endsWith(extension.toLowerCase())) {
    return `${short}${name.slice(name.length - extension.length)}`
  }

  return short
}

async function exists(path: string): Promise<boolean> {
  try {
    await lstat(path)
    return true
  } catch {
    return false
  }
}

/** Strips version and platform suffixes from the files in `binDir`. */
export async function renameExecutables(
  binDir: string,
  options: RenameOptions,
): Promise<RenamedExecutable[]> {
  const { keepNames = [], logger = silentLogger, ...shortenOptions } = options
  const renamed: RenamedExecutable[] = []

  const names = (await readdir(binDir, { withFileTypes: true }))
    .filter((d) => !d.isDirectory())
    .map((d) => d.name)
    .sort()

  for (const name of names) {
    if (keepNames.includes(name)) {
      logger.debug(`Keeping ${name} (listed in keep names)`)
      continue
    }

    const short = shortenExecutableName(name, shortenOptions)
    if (short === name) continue

    const target = join(binDir, short)
    if (await exists(target)) {
      throw new LayoutConflictError(
        `Cannot rename ${name} to ${short}: ${short} already exists in ${binDir}`,
        { context: { from: name, to: short, binDir } },
      )
    }

    await rename(join(binDir, name), target)
    logger.info(`Renamed ${name} -> ${short}`)
    renamed.push({ from: name, to: short })
  }

  return renamed
}
