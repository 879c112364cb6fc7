import { readdir, rename, rmdir } from 'node:fs/promises'
import { join } from 'node:path'
import { randomUUID } from 'node:crypto'
import { BIN_DIR, isReservedDirectory, listTopLevel } from './layout.js'
import { silentLogger, type Logger } from './log.js'

export type FlattenResult = {
  iterations: number
  // Why the loop stopped
  stoppedBy: 'bin-directory' | 'directory-count' | 'collision'
  // Wrapper directory names removed, outermost first
  removed: string[]
}

/**
 * Collapses single-directory wrapping left by upstream release archives.
 *
 * While `prefix` holds exactly one non-reserved directory and no `bin`, the
 * contents of that directory move up one level and the emptied directory is
 * removed. Stops before moving anything if a child would land on an
 * existing top-level name.
 */
export async function flattenLayout(
  prefix: string,
  options: { logger?: Logger } = {},
): Promise<FlattenResult> {
  const { logger = silentLogger } = options
  const removed: string[] = []

  while (true) {
    const entries = await listTopLevel(prefix)

    if (entries.some((e) => e.name === BIN_DIR && e.kind === 'directory')) {
      logger.debug('Found a bin directory, layout accepted as is')
      return { iterations: removed.length, stoppedBy: 'bin-directory', removed }
    }

    const wrappers = entries.filter(
      (e) => e.kind === 'directory' && !e.isSymlink && !isReservedDirectory(e.name),
    )
    const [wrapper] = wrappers
    if (wrappers.length !== 1 || !wrapper) {
      return { iterations: removed.length, stoppedBy: 'directory-count', removed }
    }

    const children = await readdir(wrapper.path)
    const taken = new Set(entries.filter((e) => e !== wrapper).map((e) => e.name))
    const clashes = children.filter((child) => taken.has(child))

    if (clashes.length > 0) {
      logger.warn(
        `Not flattening ${wrapper.name}/: ${clashes.join(', ')} already exist at the top level`,
      )
      return { iterations: removed.length, stoppedBy: 'collision', removed }
    }

    // Park the wrapper under a unique name so a child named like it (foo/foo) can move up
    const parked = join(prefix, `.binstage-flatten-${randomUUID()}`)
    await rename(wrapper.path, parked)

    for (const child of children) {
      await rename(join(parked, child), join(prefix, child))
    }

    // Non-recursive: fails rather than drop anything that was not moved
    await rmdir(parked)

    logger.debug(`Flattened ${wrapper.name}/ (${children.length} entries moved up)`)
    removed.push(wrapper.name)
  }
}
