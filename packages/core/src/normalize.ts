import { access, constants, stat } from 'node:fs/promises'
import { join } from 'node:path'
import { classifyEntries, type ClassifiedEntry } from './classify.js'
import { formatDescriptor, type PackageDescriptor } from './descriptor.js'
import { AlreadyNormalizedError, PrefixAccessError } from './errors.js'
import { extractArtifact, type ExtractResult } from './extract.js'
import { flattenLayout, type FlattenResult } from './flatten.js'
import { BIN_DIR, EXTRAS_DIR } from './layout.js'
import { silentLogger, type Logger } from './log.js'
import { getTargetPlatformInfo } from './platform.js'
import { probeFor, type ExecutableProbe } from './probe.js'
import {
  renameExecutables,
  type RenamedExecutable,
  type RenamePolicy,
} from './rename.js'

export type NormalizeOptions = {
  descriptor: PackageDescriptor
  prefix: string
  workDir: string
  renamePolicy?: RenamePolicy
  keepNames?: readonly string[]
  separators?: readonly string[]
  // Defaults to the probe for descriptor.targetPlatform
  probe?: ExecutableProbe
  logger?: Logger
}

export type NormalizeResult = {
  descriptor: PackageDescriptor
  prefix: string
  extracted: ExtractResult
  flattened: FlattenResult
  entries: ClassifiedEntry[]
  renamed: RenamedExecutable[]
}

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory()
  } catch {
    return false
  }
}

export async function assertPrefixAccessible(prefix: string): Promise<void> {
  try {
    const info = await stat(prefix)
    if (!info.isDirectory()) {
      throw new Error('not a directory')
    }
    await access(prefix, constants.R_OK | constants.W_OK | constants.X_OK)
  } catch (error) {
    throw new PrefixAccessError(prefix, error)
  }
}

/** A prefix that already has both output directories has been through a run before. */
export async function isNormalized(prefix: string): Promise<boolean> {
  return (
    (await isDirectory(join(prefix, BIN_DIR))) &&
    (await isDirectory(join(prefix, EXTRAS_DIR)))
  )
}

/**
 * Extracts the release artifact for one package and platform into `prefix`
 * and reshapes it into `bin/`, `extras/` and the reserved directories.
 *
 * The prefix is changed in place and the run cannot be repeated on it; a
 * failure leaves it partially processed.
 */
export async function normalizePrefix(options: NormalizeOptions): Promise<NormalizeResult> {
  const {
    descriptor,
    prefix,
    workDir,
    renamePolicy = 'first-separator',
    keepNames = [],
    separators,
    probe = probeFor(descriptor.targetPlatform),
    logger = silentLogger,
  } = options

  logger.step(`Normalizing ${formatDescriptor(descriptor)} into ${prefix}`)

  await assertPrefixAccessible(prefix)
  if (await isNormalized(prefix)) {
    throw new AlreadyNormalizedError(prefix)
  }

  const extracted = await extractArtifact({ workDir, prefix, descriptor, logger })

  const flattened = await flattenLayout(prefix, { logger })
  if (flattened.iterations > 0) {
    logger.info(
      `Removed ${flattened.iterations} wrapping director${flattened.iterations === 1 ? 'y' : 'ies'}`,
    )
  }

  const entries = await classifyEntries(prefix, { probe, logger })

  const { executableExtensions } = getTargetPlatformInfo(descriptor.targetPlatform)
  const renamed = await renameExecutables(join(prefix, BIN_DIR), {
    version: descriptor.version,
    policy: renamePolicy,
    keepNames,
    preserveExtensions: executableExtensions,
    separators,
    logger,
  })

  const executables = entries.filter((e) => e.placement === 'bin').length
  const extras = entries.filter((e) => e.placement === 'extras').length
  logger.success(
    `${formatDescriptor(descriptor)}: ${executables} executable(s) in bin/, ` +
      `${extras} entr${extras === 1 ? 'y' : 'ies'} in extras/`,
  )

  return { descriptor, prefix, extracted, flattened, entries, renamed }
}
