import { readdir, stat } from 'node:fs/promises'
import { join } from 'node:path'

export const BIN_DIR = 'bin'
export const EXTRAS_DIR = 'extras'
// Written by the packaging tool before the build script runs
export const METADATA_DIR = 'conda-meta'

export const RESERVED_DIRECTORIES: ReadonlySet<string> = new Set([
  METADATA_DIR,
  BIN_DIR,
  'etc',
  'include',
  'lib',
  'man',
  'share',
  'ssl',
  EXTRAS_DIR,
])

export function isReservedDirectory(name: string): boolean {
  return RESERVED_DIRECTORIES.has(name)
}

export type EntryKind = 'file' | 'directory' | 'other'

export type TopLevelEntry = {
  name: string
  path: string
  kind: EntryKind
  isSymlink: boolean
}

/**
 * Lists the direct children of `root`, hidden entries included, sorted by
 * name so every stage walks the prefix in the same order.
 *
 * Symbolic links report the kind of their target; dangling links are `other`.
 */
export async function listTopLevel(root: string): Promise<TopLevelEntry[]> {
  const dirents = await readdir(root, { withFileTypes: true })
  const entries: TopLevelEntry[] = []

  for (const dirent of dirents) {
    const path = join(root, dirent.name)
    let kind: EntryKind = 'other'

    if (dirent.isDirectory()) {
      kind = 'directory'
    } else if (dirent.isFile()) {
      kind = 'file'
    } else if (dirent.isSymbolicLink()) {
      try {
        const target = await stat(path)
        kind = target.isDirectory() ? 'directory' : target.isFile() ? 'file' : 'other'
      } catch {
        kind = 'other'
      }
    }

    entries.push({ name: dirent.name, path, kind, isSymlink: dirent.isSymbolicLink() })
  }

  return entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))
}
