import { spawnSync } from 'node:child_process'
import { chmod, mkdir, mkdtemp, readdir, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { dirname, join, relative } from 'node:path'
import { gzipSync } from 'node:zlib'
import { strToU8, zipSync, type Zippable } from 'fflate'
import { create as tarCreate } from 'tar'

/**
 * A 64-bit little-endian ELF header with one program header. `type` is
 * e_type (2 executable, 3 shared object); `interpreter` makes the program
 * header PT_INTERP instead of PT_LOAD.
 */
export function elfImage(options: { type: number; interpreter?: boolean }): Buffer {
  const image = Buffer.alloc(64 + 56)
  image.set([0x7f, 0x45, 0x4c, 0x46, 0x02, 0x01, 0x01], 0)
  image.writeUInt16LE(options.type, 16)
  image.writeUInt16LE(0x3e, 18)
  image.writeBigUInt64LE(64n, 0x20)
  image.writeUInt16LE(64, 0x34)
  image.writeUInt16LE(56, 0x36)
  image.writeUInt16LE(1, 0x38)
  image.writeUInt32LE(options.interpreter ? 3 : 1, 64)
  return image
}

/** A 64-bit little-endian Mach-O header; `fileType` 2 is an executable, 6 a dylib. */
export function machOImage(fileType: number): Buffer {
  const image = Buffer.alloc(32)
  image.set([0xcf, 0xfa, 0xed, 0xfe], 0)
  image.writeUInt32LE(fileType, 12)
  return image
}

export const ELF_BYTES = elfImage({ type: 2 })

export const PE_BYTES = Buffer.concat([Buffer.from('MZ'), Buffer.alloc(62)])

export type TreeFile = string | Buffer | { content: string | Buffer; mode: number }

/** Relative path -> file. Paths ending in `/` create empty directories. */
export type Tree = Record<string, TreeFile>

export async function makeTempDir(label = 'binstage-test-'): Promise<string> {
  return mkdtemp(join(tmpdir(), label))
}

export async function removeDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true })
}

export async function writeTree(root: string, tree: Tree): Promise<void> {
  for (const [path, file] of Object.entries(tree)) {
    const full = join(root, path)
    if (path.endsWith('/')) {
      await mkdir(full, { recursive: true })
      continue
    }
    await mkdir(dirname(full), { recursive: true })
    if (typeof file === 'string' || Buffer.isBuffer(file)) {
      await writeFile(full, file)
      await chmod(full, 0o644)
    } else {
      await writeFile(full, file.content)
      await chmod(full, file.mode)
    }
  }
}

/** Every path below `root`, relative and sorted; directories end with `/`. */
export async function listTree(root: string): Promise<string[]> {
  const paths: string[] = []

  async function walk(dir: string): Promise<void> {
    for (const dirent of await readdir(dir, { withFileTypes: true })) {
      const full = join(dir, dirent.name)
      const rel = relative(root, full)
      if (dirent.isDirectory()) {
        paths.push(`${rel}/`)
        await walk(full)
      } else {
        paths.push(rel)
      }
    }
  }

  await walk(root)
  return paths.sort()
}

/** Writes `tree` under a scratch directory and packs its top-level entries into a tar file. */
export async function createTar(
  file: string,
  tree: Tree,
  options: { gzip?: boolean } = {},
): Promise<void> {
  const staging = await makeTempDir('binstage-staging-')
  try {
    await writeTree(staging, tree)
    const entries = await readdir(staging)
    await tarCreate({ file, cwd: staging, gzip: options.gzip === true }, entries)
  } finally {
    await removeDir(staging)
  }
}

/** Compresses `source` with a system tool (`xz` or `zstd`). */
export function compressWithTool(command: 'xz' | 'zstd', source: Buffer): Buffer {
  const result = spawnSync(command, ['-c', '-q'], { input: source, maxBuffer: 64 * 1024 * 1024 })
  if (result.error) {
    throw new Error(`${command} is required to build this fixture: ${result.error.message}`)
  }
  if (result.status !== 0) {
    throw new Error(`${command} failed: ${result.stderr.toString('utf-8')}`)
  }
  return result.stdout
}

export async function createZip(file: string, tree: Tree): Promise<void> {
  const entries: Zippable = {}
  for (const [path, value] of Object.entries(tree)) {
    if (path.endsWith('/')) {
      entries[path.slice(0, -1)] = {}
      continue
    }
    const content = typeof value === 'string' || Buffer.isBuffer(value) ? value : value.content
    entries[path] = typeof content === 'string' ? strToU8(content) : new Uint8Array(content)
  }
  await writeFile(file, zipSync(entries))
}

export function gzipBuffer(data: Buffer): Buffer {
  return gzipSync(data)
}

export function collectLines(): { lines: string[]; write: (line: string) => void } {
  const lines: string[] = []
  return { lines, write: (line) => lines.push(line) }
}
