import { test, beforeEach, afterEach } from 'node:test'
import assert from 'node:assert/strict'
import { readdir, readFile, rm, stat, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import {
  AlreadyNormalizedError,
  MissingInputArtifactError,
  PrefixAccessError,
  RESERVED_DIRECTORIES,
  createLogger,
  normalizePrefix,
  type PackageDescriptor,
} from '@binstage/core'
import {
  ELF_BYTES,
  collectLines,
  compressWithTool,
  createTar,
  createZip,
  elfImage,
  gzipBuffer,
  listTree,
  machOImage,
  makeTempDir,
  removeDir,
  writeTree,
  type Tree,
} from './helpers.js'

const descriptor: PackageDescriptor = {
  name: 'mytool',
  version: '1.2.3',
  targetPlatform: 'linux-64',
}
const base = 'mytool-1.2.3-linux-64'

// One executable and two non-reserved directories, wrapped twice
const release: Tree = {
  'mytool-1.2.3/dist/mytool-1.2.3-linux64': ELF_BYTES,
  'mytool-1.2.3/dist/completions/mytool.bash': 'complete -F _mytool mytool\n',
  'mytool-1.2.3/dist/completions/mytool.zsh': '#compdef mytool\n',
  'mytool-1.2.3/dist/docs/guide.md': '# Guide\n',
}

const normalizedTree = [
  'bin/',
  'bin/mytool',
  'extras/',
  'extras/completions/',
  'extras/completions/mytool.bash',
  'extras/completions/mytool.zsh',
  'extras/docs/',
  'extras/docs/guide.md',
]

let root: string
let workDir: string
let prefix: string

beforeEach(async () => {
  root = await makeTempDir()
  workDir = join(root, 'work')
  prefix = join(root, 'prefix')
  await writeTree(root, { 'work/': '', 'prefix/': '' })
})

afterEach(async () => {
  await removeDir(root)
})

async function assertNormalized(): Promise<void> {
  assert.deepEqual(await listTree(prefix), normalizedTree)
  const mode = (await stat(join(prefix, 'bin', 'mytool'))).mode & 0o777
  assert.equal(mode, 0o755)
  assert.deepEqual(await readFile(join(prefix, 'bin', 'mytool')), ELF_BYTES)
  assert.equal(
    await readFile(join(prefix, 'extras', 'completions', 'mytool.bash'), 'utf-8'),
    'complete -F _mytool mytool\n',
  )
}

async function tarBytes(): Promise<Buffer> {
  const file = join(root, 'release.tar')
  await createTar(file, release)
  return readFile(file)
}

const archiveFormats: { suffix: string; write: (file: string) => Promise<void> }[] = [
  { suffix: '.zip', write: (file) => createZip(file, release) },
  { suffix: '.tar.gz', write: (file) => createTar(file, release, { gzip: true }) },
  { suffix: '.tgz', write: (file) => createTar(file, release, { gzip: true }) },
  {
    suffix: '.tar.xz',
    write: async (file) => writeFile(file, compressWithTool('xz', await tarBytes())),
  },
  {
    suffix: '.tar.zst',
    write: async (file) => writeFile(file, compressWithTool('zstd', await tarBytes())),
  },
]

for (const format of archiveFormats) {
  test(`normalizes a wrapped ${format.suffix} release`, async () => {
    await format.write(join(workDir, `${base}${format.suffix}`))

    const result = await normalizePrefix({ descriptor, prefix, workDir })

    assert.equal(result.extracted.format.suffix, format.suffix)
    assert.deepEqual(result.flattened.removed, ['mytool-1.2.3', 'dist'])
    assert.deepEqual(result.renamed, [{ from: 'mytool-1.2.3-linux64', to: 'mytool' }])
    await assertNormalized()
  })
}

const singleFormats: { suffix: string; tool?: 'xz' | 'zstd' }[] = [
  { suffix: '.gz' },
  { suffix: '.xz', tool: 'xz' },
  { suffix: '.zst', tool: 'zstd' },
]

for (const format of singleFormats) {
  test(`normalizes a single ${format.suffix} binary`, async () => {
    const data = format.tool ? compressWithTool(format.tool, ELF_BYTES) : gzipBuffer(ELF_BYTES)
    await writeFile(join(workDir, `${base}${format.suffix}`), data)

    const result = await normalizePrefix({ descriptor, prefix, workDir })

    assert.equal(result.flattened.iterations, 0)
    assert.deepEqual(result.renamed, [])
    assert.deepEqual(await listTree(prefix), ['bin/', 'bin/mytool', 'extras/'])
  })
}

test('a zip that ships bin/ without unix modes still yields executable commands', async () => {
  await createZip(join(workDir, `${base}.zip`), {
    'mytool-1.2.3/bin/mytool-1.2.3-linux64': ELF_BYTES,
    'mytool-1.2.3/bin/mytool-helper': '#!/bin/sh\nexit 0\n',
    'mytool-1.2.3/README.md': '# mytool\n',
  })

  const result = await normalizePrefix({ descriptor, prefix, workDir })

  assert.equal(result.flattened.stoppedBy, 'bin-directory')
  assert.deepEqual(await listTree(prefix), [
    'bin/',
    'bin/mytool',
    'bin/mytool-helper',
    'extras/',
    'extras/README.md',
  ])
  for (const name of ['mytool', 'mytool-helper']) {
    assert.equal((await stat(join(prefix, 'bin', name))).mode & 0o777, 0o755, name)
  }
})

test('shared libraries beside the program land in extras', async () => {
  await createTar(
    join(workDir, `${base}.tar.gz`),
    {
      'mytool-1.2.3/mytool': ELF_BYTES,
      'mytool-1.2.3/libmytool.so.1.2.3': elfImage({ type: 3 }),
      'mytool-1.2.3/libmytool.dylib': machOImage(6),
    },
    { gzip: true },
  )

  const result = await normalizePrefix({ descriptor, prefix, workDir })

  assert.deepEqual(
    result.entries.filter((e) => e.placement !== 'reserved').map((e) => [e.name, e.placement]),
    [
      ['libmytool.dylib', 'extras'],
      ['libmytool.so.1.2.3', 'extras'],
      ['mytool', 'bin'],
    ],
  )
  assert.equal((await stat(join(prefix, 'extras', 'libmytool.so.1.2.3'))).mode & 0o777, 0o644)
})

test('normalizes a bare binary', async () => {
  await writeTree(workDir, { [base]: ELF_BYTES })

  await normalizePrefix({ descriptor, prefix, workDir })

  assert.deepEqual(await listTree(prefix), ['bin/', 'bin/mytool', 'extras/'])
  assert.equal((await stat(join(prefix, 'bin', 'mytool'))).mode & 0o777, 0o755)
})

test('reserved directories seeded in the prefix are left untouched', async () => {
  await writeTree(prefix, {
    'conda-meta/history': '==> 2026-01-01 <==\n',
    'etc/mytool/config.toml': 'color = true\n',
  })
  await createTar(join(workDir, `${base}.tar.gz`), release, { gzip: true })

  await normalizePrefix({ descriptor, prefix, workDir })

  assert.deepEqual(await listTree(prefix), [
    ...normalizedTree.slice(0, 2),
    'conda-meta/',
    'conda-meta/history',
    'etc/',
    'etc/mytool/',
    'etc/mytool/config.toml',
    ...normalizedTree.slice(2),
  ])
  assert.equal(await readFile(join(prefix, 'conda-meta', 'history'), 'utf-8'), '==> 2026-01-01 <==\n')
  assert.equal(
    await readFile(join(prefix, 'etc', 'mytool', 'config.toml'), 'utf-8'),
    'color = true\n',
  )
})

test('every top-level entry ends up reserved', async () => {
  await createTar(
    join(workDir, `${base}.tar.gz`),
    {
      'pkg/mytool': ELF_BYTES,
      'pkg/README.md': 'readme\n',
      'pkg/LICENSE': 'license\n',
      'pkg/share/doc/mytool.txt': 'doc\n',
      'pkg/assets/logo.svg': '<svg/>\n',
      'pkg/examples/basic.txt': 'example\n',
    },
    { gzip: true },
  )

  await normalizePrefix({ descriptor, prefix, workDir })

  for (const name of await readdir(prefix)) {
    assert.ok(RESERVED_DIRECTORIES.has(name), `${name} is not a reserved directory`)
  }
  assert.deepEqual((await readdir(join(prefix, 'extras'))).sort(), [
    'LICENSE',
    'README.md',
    'assets',
    'examples',
  ])
})

test('version-boundary policy keeps dashed tool names', async () => {
  await createTar(
    join(workDir, `${base}.tar.gz`),
    { 'my-tool-1.2.3-linux64': ELF_BYTES },
    { gzip: true },
  )

  const result = await normalizePrefix({
    descriptor,
    prefix,
    workDir,
    renamePolicy: 'version-boundary',
  })

  assert.deepEqual(result.renamed, [{ from: 'my-tool-1.2.3-linux64', to: 'my-tool' }])
})

test('an empty work directory fails with the missing input diagnostic', async () => {
  await assert.rejects(normalizePrefix({ descriptor, prefix, workDir }), (error: unknown) => {
    assert.ok(error instanceof MissingInputArtifactError)
    assert.equal(error.exitCode, 1)
    assert.ok(error.message.endsWith('Work directory contents is:\n  (empty)'))
    return true
  })
  assert.deepEqual(await readdir(prefix), [])
})

test('a missing prefix is a prefix access failure', async () => {
  await rm(prefix, { recursive: true })
  await writeTree(workDir, { [base]: ELF_BYTES })

  await assert.rejects(normalizePrefix({ descriptor, prefix, workDir }), (error: unknown) => {
    assert.ok(error instanceof PrefixAccessError)
    assert.equal(error.exitCode, 3)
    return true
  })
})

test('a prefix that is a file is a prefix access failure', async () => {
  await rm(prefix, { recursive: true })
  await writeFile(prefix, 'not a directory')
  await writeTree(workDir, { [base]: ELF_BYTES })

  await assert.rejects(normalizePrefix({ descriptor, prefix, workDir }), PrefixAccessError)
})

test('running twice on the same prefix is refused', async () => {
  await writeTree(workDir, { [base]: ELF_BYTES })
  await normalizePrefix({ descriptor, prefix, workDir })
  const before = await listTree(prefix)

  await assert.rejects(normalizePrefix({ descriptor, prefix, workDir }), (error: unknown) => {
    assert.ok(error instanceof AlreadyNormalizedError)
    assert.equal(error.exitCode, 4)
    return true
  })
  assert.deepEqual(await listTree(prefix), before)
})

test('two runs against disjoint roots do not touch each other', async () => {
  const other = await makeTempDir()
  try {
    const otherDescriptor: PackageDescriptor = {
      name: 'othertool',
      version: '0.9.0',
      targetPlatform: 'linux-64',
    }
    await writeTree(other, {
      'work/othertool-0.9.0-linux-64': ELF_BYTES,
      'prefix/': '',
    })
    await createTar(join(workDir, `${base}.tar.gz`), release, { gzip: true })

    await Promise.all([
      normalizePrefix({ descriptor, prefix, workDir }),
      normalizePrefix({
        descriptor: otherDescriptor,
        prefix: join(other, 'prefix'),
        workDir: join(other, 'work'),
      }),
    ])

    await assertNormalized()
    assert.deepEqual(await listTree(other), [
      'prefix/',
      'prefix/bin/',
      'prefix/bin/othertool',
      'prefix/extras/',
      'work/',
      'work/othertool-0.9.0-linux-64',
    ])
    assert.deepEqual(await listTree(workDir), [`${base}.tar.gz`])
  } finally {
    await removeDir(other)
  }
})

test('progress is reported through the injected logger', async () => {
  await writeTree(workDir, { [base]: ELF_BYTES })
  const { lines, write } = collectLines()

  await normalizePrefix({
    descriptor,
    prefix,
    workDir,
    logger: createLogger({ color: false, write }),
  })

  assert.deepEqual(lines, [
    `[binstage] ▶ Normalizing mytool 1.2.3 (linux-64) into ${prefix}`,
    `[binstage] ▶ Extracting ${join(workDir, base)}`,
    '[binstage] ✓ mytool 1.2.3 (linux-64): 1 executable(s) in bin/, 0 entries in extras/',
  ])
})
