import { open, stat, type FileHandle } from 'node:fs/promises'
import { extname } from 'node:path'
import {
  getTargetPlatformInfo,
  type TargetPlatform,
} from './platform.js'

/**
 * Decides whether a file installed into the prefix is a command.
 *
 * Call sites never look at the target platform themselves; they get a probe
 * from {@link probeFor} and ask it.
 */
export type ExecutableProbe = {
  isExecutable(path: string): Promise<boolean>
}

export type BinaryKind = 'elf' | 'mach-o' | 'mach-o-fat' | 'pe' | 'script'

const SIGNATURE_LENGTH = 4

export async function readSignature(path: string): Promise<Buffer> {
  const handle = await open(path, 'r')
  try {
    return await readerFor(handle)(0, SIGNATURE_LENGTH)
  } finally {
    await handle.close()
  }
}

export function detectBinaryKind(signature: Uint8Array): BinaryKind | null {
  const [b0, b1, b2, b3] = signature

  if (b0 === 0x7f && b1 === 0x45 && b2 === 0x4c && b3 === 0x46) return 'elf'
  if (b0 === 0x23 && b1 === 0x21) return 'script'
  if (b0 === 0x4d && b1 === 0x5a) return 'pe'

  if (signature.length < 4) return null
  const magic = Buffer.from(signature).readUInt32BE(0)

  switch (magic) {
    case 0xfeedface:
    case 0xfeedfacf:
    case 0xcefaedfe:
    case 0xcffaedfe:
      return 'mach-o'
    case 0xcafebabe:
    case 0xbebafeca:
      return 'mach-o-fat'
    default:
      return null
  }
}

// ELF e_type values and the program header type naming an interpreter
const ET_EXEC = 2
const ET_DYN = 3
const PT_INTERP = 3
const MH_EXECUTE = 2
// Program header tables past this size are not worth reading
const MAX_PROGRAM_HEADER_BYTES = 64 * 1024
// Java class files share the fat Mach-O magic; their version field reads as a large arch count
const MAX_FAT_ARCHES = 30

type ByteReader = (position: number, length: number) => Promise<Buffer>

function readerFor(handle: FileHandle): ByteReader {
  return async (position, length) => {
    const buffer = Buffer.alloc(length)
    const { bytesRead } = await handle.read(buffer, 0, length, position)
    return buffer.subarray(0, bytesRead)
  }
}

/** ET_EXEC, or ET_DYN with an interpreter (a position-independent executable). Shared objects fail. */
async function isElfExecutable(read: ByteReader): Promise<boolean> {
  const header = await read(0, 64)
  const is64 = header[4] === 2
  const littleEndian = header[5] === 1
  if (header.length < (is64 ? 64 : 52)) return false

  const u16 = (buf: Buffer, offset: number) =>
    littleEndian ? buf.readUInt16LE(offset) : buf.readUInt16BE(offset)
  const u32 = (buf: Buffer, offset: number) =>
    littleEndian ? buf.readUInt32LE(offset) : buf.readUInt32BE(offset)

  const type = u16(header, 16)
  if (type === ET_EXEC) return true
  if (type !== ET_DYN) return false

  const phoff = is64
    ? Number(littleEndian ? header.readBigUInt64LE(0x20) : header.readBigUInt64BE(0x20))
    : u32(header, 0x1c)
  const phentsize = u16(header, is64 ? 0x36 : 0x2a)
  const phnum = u16(header, is64 ? 0x38 : 0x2c)
  const tableSize = phentsize * phnum
  if (phentsize < 4 || tableSize > MAX_PROGRAM_HEADER_BYTES) return false

  const table = await read(phoff, tableSize)
  for (let offset = 0; offset + 4 <= table.length; offset += phentsize) {
    if (u32(table, offset) === PT_INTERP) return true
  }
  return false
}

function machOFileType(header: Buffer): number | null {
  if (header.length < 16) return null
  switch (header.readUInt32BE(0)) {
    case 0xfeedface:
    case 0xfeedfacf:
      return header.readUInt32BE(12)
    case 0xcefaedfe:
    case 0xcffaedfe:
      return header.readUInt32LE(12)
    default:
      return null
  }
}

/** A universal binary counts when its first slice is an MH_EXECUTE image. */
async function isFatMachOExecutable(read: ByteReader): Promise<boolean> {
  const header = await read(0, 20)
  if (header.length < 20) return false
  const littleEndian = header.readUInt32BE(0) === 0xbebafeca
  const u32 = (offset: number) =>
    littleEndian ? header.readUInt32LE(offset) : header.readUInt32BE(offset)

  const arches = u32(4)
  if (arches === 0 || arches > MAX_FAT_ARCHES) return false
  return machOFileType(await read(u32(16), 16)) === MH_EXECUTE
}

/**
 * True for a file the host loader would run as a program: a script with a
 * shebang, an ELF or Mach-O executable, or a PE image. ELF shared objects
 * and Mach-O dylibs and bundles are not programs.
 */
export async function isExecutableImage(path: string): Promise<boolean> {
  const handle = await open(path, 'r')
  try {
    const read = readerFor(handle)
    switch (detectBinaryKind(await read(0, SIGNATURE_LENGTH))) {
      case 'script':
      case 'pe':
        return true
      case 'elf':
        return await isElfExecutable(read)
      case 'mach-o':
        return machOFileType(await read(0, 16)) === MH_EXECUTE
      case 'mach-o-fat':
        return await isFatMachOExecutable(read)
      case null:
        return false
    }
  } finally {
    await handle.close()
  }
}

async function hasExecuteBit(path: string): Promise<boolean> {
  const { mode } = await stat(path)
  return (mode & 0o111) !== 0
}

/** Unix targets: an executable image, or an execute bit the archive already carried. */
export const signatureProbe: ExecutableProbe = {
  async isExecutable(path) {
    if (await isExecutableImage(path)) return true
    return hasExecuteBit(path)
  },
}

export function extensionProbe(extensions: readonly string[]): ExecutableProbe {
  const allowed = new Set(extensions.map((e) => e.toLowerCase()))

  return {
    async isExecutable(path) {
      if (allowed.has(extname(path).toLowerCase())) return true
      return detectBinaryKind(await readSignature(path)) === 'pe'
    },
  }
}

export function probeFor(platform: TargetPlatform): ExecutableProbe {
  const { isWindows, executableExtensions } = getTargetPlatformInfo(platform)
  return isWindows ? extensionProbe(executableExtensions) : signatureProbe
}
