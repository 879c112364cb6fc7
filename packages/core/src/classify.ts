import { lstat, mkdir, readdir, rename } from 'node:fs/promises'
import { join } from 'node:path'
import { LayoutConflictError } from './errors.js'
import { makeExecutable } from './extract.js'
import {
  BIN_DIR,
  EXTRAS_DIR,
  isReservedDirectory,
  listTopLevel,
  type TopLevelEntry,
} from './layout.js'
import { silentLogger, type Logger } from './log.js'
import type { ExecutableProbe } from './probe.js'

export type Placement = 'bin' | 'extras' | 'reserved'

export type ClassifiedEntry = {
  name: string
  kind: TopLevelEntry['kind']
  placement: Placement
}

export type ClassifyOptions = {
  probe: ExecutableProbe
  logger?: Logger
}

async function exists(path: string): Promise<boolean> {
  try {
    await lstat(path)
    return true
  } catch {
    return false
  }
}

async function relocate(entry: TopLevelEntry, targetDir: string): Promise<void> {
  const target = join(targetDir, entry.name)
  if (await exists(target)) {
    throw new LayoutConflictError(
      `Cannot move ${entry.name} into ${targetDir}: an entry with that name already exists`,
      { context: { entry: entry.path, target } },
    )
  }
  await rename(entry.path, target)
}

async function placementOf(entry: TopLevelEntry, probe: ExecutableProbe): Promise<Placement> {
  switch (entry.kind) {
    case 'directory':
      return isReservedDirectory(entry.name) ? 'reserved' : 'extras'
    case 'file':
      return (await probe.isExecutable(entry.path)) ? 'bin' : 'extras'
    case 'other':
      return 'extras'
  }
}

// A bin/ shipped by the archive may come from a zip without Unix modes
async function markShippedCommands(binDir: string, logger: Logger): Promise<void> {
  for (const dirent of await readdir(binDir, { withFileTypes: true })) {
    if (!dirent.isFile()) continue
    await makeExecutable(join(binDir, dirent.name))
    logger.debug(`bin/${dirent.name} marked executable`)
  }
}

/**
 * Sorts every top-level entry of `prefix` into `bin/`, `extras/`, or leaves
 * it in place when it is a reserved directory.
 */
export async function classifyEntries(
  prefix: string,
  options: ClassifyOptions,
): Promise<ClassifiedEntry[]> {
  const { probe, logger = silentLogger } = options
  const binDir = join(prefix, BIN_DIR)
  const extrasDir = join(prefix, EXTRAS_DIR)

  await mkdir(binDir, { recursive: true })
  await mkdir(extrasDir, { recursive: true })
  await markShippedCommands(binDir, logger)

  const classified: ClassifiedEntry[] = []
  const planned: { entry: TopLevelEntry; placement: Placement }[] = []

  // Decide everything before moving anything; links may point at siblings
  for (const entry of await listTopLevel(prefix)) {
    planned.push({ entry, placement: await placementOf(entry, probe) })
  }

  for (const { entry, placement } of planned) {
    if (placement === 'bin') {
      if (!entry.isSymlink) await makeExecutable(entry.path)
      await relocate(entry, binDir)
    } else if (placement === 'extras') {
      await relocate(entry, extrasDir)
    }

    logger.debug(`${entry.name} -> ${placement === 'reserved' ? 'kept in place' : `${placement}/`}`)
    classified.push({ name: entry.name, kind: entry.kind, placement })
  }

  return classified
}
