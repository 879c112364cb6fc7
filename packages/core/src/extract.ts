import { spawn } from 'node:child_process'
import { createReadStream, createWriteStream } from 'node:fs'
import { chmod, copyFile, lstat, mkdir, readdir, stat } from 'node:fs/promises'
import { join } from 'node:path'
import { once } from 'node:events'
import type { Readable } from 'node:stream'
import { pipeline } from 'node:stream/promises'
import { createGunzip } from 'node:zlib'
import { extract as tarExtract } from 'tar'
import { getArtifactBaseName, type PackageDescriptor } from './descriptor.js'
import {
  ExtractionError,
  MissingInputArtifactError,
  type DirectoryListingEntry,
} from './errors.js'
import { silentLogger, type Logger } from './log.js'

export type Decompressor = 'gzip' | 'xz' | 'zstd'

export type ArtifactFormat =
  | { suffix: string; kind: 'archive'; container: 'zip' }
  | { suffix: string; kind: 'archive'; container: 'tar'; decompressor: Decompressor }
  | { suffix: string; kind: 'single'; decompressor: Decompressor }
  | { suffix: ''; kind: 'bare' }

/** Candidates in the order they are looked for; the first existing file wins. */
export const ARTIFACT_FORMATS: readonly ArtifactFormat[] = [
  { suffix: '.zip', kind: 'archive', container: 'zip' },
  { suffix: '.tar.gz', kind: 'archive', container: 'tar', decompressor: 'gzip' },
  { suffix: '.tgz', kind: 'archive', container: 'tar', decompressor: 'gzip' },
  { suffix: '.tar.xz', kind: 'archive', container: 'tar', decompressor: 'xz' },
  { suffix: '.tar.zst', kind: 'archive', container: 'tar', decompressor: 'zstd' },
  { suffix: '.gz', kind: 'single', decompressor: 'gzip' },
  { suffix: '.xz', kind: 'single', decompressor: 'xz' },
  { suffix: '.zst', kind: 'single', decompressor: 'zstd' },
  { suffix: '', kind: 'bare' },
]

export type LocatedArtifact = {
  path: string
  format: ArtifactFormat
}

export type ExtractOptions = {
  archivePath: string
  destination: string
}

export type ExtractArtifactOptions = {
  workDir: string
  prefix: string
  descriptor: PackageDescriptor
  logger?: Logger
}

export type ExtractResult = LocatedArtifact & {
  // Set for single-file formats and bare binaries
  installedBinary: string | null
}

export async function listDirectory(dir: string): Promise<DirectoryListingEntry[]> {
  const dirents = await readdir(dir, { withFileTypes: true })
  const listing: DirectoryListingEntry[] = []

  for (const dirent of dirents) {
    const { size } = await lstat(join(dir, dirent.name))
    listing.push({
      name: dirent.name,
      type: dirent.isFile()
        ? 'file'
        : dirent.isDirectory()
          ? 'directory'
          : dirent.isSymbolicLink()
            ? 'symlink'
            : 'other',
      size,
    })
  }

  return listing.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))
}

async function isRegularFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile()
  } catch {
    return false
  }
}

export async function findArtifact(
  workDir: string,
  descriptor: PackageDescriptor,
): Promise<LocatedArtifact> {
  const baseName = getArtifactBaseName(descriptor)

  for (const format of ARTIFACT_FORMATS) {
    const path = join(workDir, `${baseName}${format.suffix}`)
    if (await isRegularFile(path)) {
      return { path, format }
    }
  }

  let listing: DirectoryListingEntry[] = []
  try {
    listing = await listDirectory(workDir)
  } catch (error) {
    throw new ExtractionError(`Cannot list work directory ${workDir}`, {
      context: { workDir },
      cause: error,
    })
  }

  throw new MissingInputArtifactError({
    expected: baseName,
    workDir,
    listing,
    tried: ARTIFACT_FORMATS.filter((f) => f.kind !== 'bare').map((f) => f.suffix),
  })
}

export async function makeExecutable(filePath: string): Promise<void> {
  if (process.platform !== 'win32') {
    await chmod(filePath, 0o755)
  }
}

type ToolRun = {
  stdout: Readable
  exited: Promise<void>
  // False when the process had already exited
  kill: () => boolean
}

function runTool(command: string, args: string[], archivePath: string): ToolRun {
  const child = spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'] })

  const stderr: Buffer[] = []
  child.stderr.on('data', (chunk: Buffer) => stderr.push(chunk))

  const exited = new Promise<void>((resolve, reject) => {
    child.on('error', (error: NodeJS.ErrnoException) => {
      const reason =
        error.code === 'ENOENT'
          ? `${command} is not installed or not on PATH`
          : `${command} could not be started: ${error.message}`
      reject(
        new ExtractionError(`Failed to extract ${archivePath}: ${reason}`, {
          context: { archivePath, command },
          cause: error,
        }),
      )
    })
    child.on('close', (code, signal) => {
      if (code === 0) {
        resolve()
        return
      }
      const detail = Buffer.concat(stderr).toString('utf-8').trim()
      reject(
        new ExtractionError(
          `Failed to extract ${archivePath}: ${command} exited with ` +
            `${code === null ? `signal ${signal}` : `code ${code}`}` +
            (detail ? `\n${detail}` : ''),
          { context: { archivePath, command } },
        ),
      )
    })
  })

  return {
    stdout: child.stdout,
    exited,
    kill: () => {
      if (child.exitCode !== null || child.signalCode !== null) return false
      return child.kill()
    },
  }
}

/** Streams `xz -dc` / `zstd -dc` output into `sink`, failing if either side fails. */
async function decompressWithTool(
  decompressor: Exclude<Decompressor, 'gzip'>,
  archivePath: string,
  sink: (stdout: Readable) => Promise<void>,
): Promise<void> {
  const run = runTool(decompressor, ['-dc', archivePath], archivePath)

  // A sink that stops reading would leave the tool blocked on a full pipe
  let killed = false
  const sinking = sink(run.stdout).catch((error: unknown) => {
    killed = run.kill()
    throw error
  })

  const [sunk, exited] = await Promise.allSettled([sinking, run.exited])
  // The tool's own diagnostic wins unless we stopped it
  if (exited.status === 'rejected' && !killed) throw exited.reason
  if (sunk.status === 'rejected') throw sunk.reason
  if (exited.status === 'rejected') throw exited.reason
}

async function unpackTarStream(source: Readable, destination: string): Promise<void> {
  const unpack = tarExtract({ cwd: destination })
  const done = new Promise<void>((resolve, reject) => {
    unpack.on('close', () => resolve())
    unpack.on('error', reject)
  })

  for await (const chunk of source) {
    if (!unpack.write(chunk)) {
      await once(unpack, 'drain')
    }
  }
  unpack.end()

  await done
}

export async function extractTarGz(options: ExtractOptions): Promise<void> {
  const { archivePath, destination } = options

  await mkdir(destination, { recursive: true })

  await tarExtract({
    file: archivePath,
    cwd: destination,
  })
}

export async function extractTar(
  options: ExtractOptions & { decompressor: Decompressor },
): Promise<void> {
  const { archivePath, destination, decompressor } = options

  if (decompressor === 'gzip') {
    return extractTarGz(options)
  }

  await mkdir(destination, { recursive: true })
  await decompressWithTool(decompressor, archivePath, (stdout) =>
    unpackTarStream(stdout, destination),
  )
}

export async function extractZip(options: ExtractOptions): Promise<void> {
  const { archivePath, destination } = options

  await mkdir(destination, { recursive: true })

  // System unzip keeps symlinks and permission bits; -n never overwrites
  const run = runTool('unzip', ['-n', '-q', archivePath, '-d', destination], archivePath)
  run.stdout.resume()
  await run.exited
}

/** Decompresses a single compressed binary to `destination` (a file path). */
export async function decompressFile(
  options: ExtractOptions & { decompressor: Decompressor },
): Promise<void> {
  const { archivePath, destination, decompressor } = options

  if (decompressor === 'gzip') {
    await pipeline(
      createReadStream(archivePath),
      createGunzip(),
      createWriteStream(destination),
    )
    return
  }

  await decompressWithTool(decompressor, archivePath, (stdout) =>
    pipeline(stdout, createWriteStream(destination)),
  )
}

function wrapFailure(error: unknown, archivePath: string): ExtractionError {
  if (error instanceof ExtractionError) return error
  const reason = error instanceof Error ? error.message : String(error)
  return new ExtractionError(`Failed to extract ${archivePath}: ${reason}`, {
    context: { archivePath },
    cause: error,
  })
}

/**
 * Locates the artifact for `descriptor` in `workDir` and materializes it in
 * `prefix`. The artifact itself is only read.
 */
export async function extractArtifact(
  options: ExtractArtifactOptions,
): Promise<ExtractResult> {
  const { workDir, prefix, descriptor, logger = silentLogger } = options

  const artifact = await findArtifact(workDir, descriptor)
  const { path: archivePath, format } = artifact
  const binaryPath = join(prefix, descriptor.name)

  logger.step(`Extracting ${archivePath}`)

  try {
    switch (format.kind) {
      case 'archive':
        if (format.container === 'zip') {
          await extractZip({ archivePath, destination: prefix })
        } else {
          await extractTar({
            archivePath,
            destination: prefix,
            decompressor: format.decompressor,
          })
        }
        return { ...artifact, installedBinary: null }
      case 'single':
        await decompressFile({
          archivePath,
          destination: binaryPath,
          decompressor: format.decompressor,
        })
        await makeExecutable(binaryPath)
        return { ...artifact, installedBinary: binaryPath }
      case 'bare':
        await copyFile(archivePath, binaryPath)
        await makeExecutable(binaryPath)
        return { ...artifact, installedBinary: binaryPath }
    }
  } catch (error) {
    throw wrapFailure(error, archivePath)
  }
}
