import { test } from 'node:test'
import assert from 'node:assert/strict'
import { join } from 'node:path'
import { ConfigError, detectTargetPlatform, loadConfig, splitList } from '@binstage/core'

const cwd = join('/', 'build', 'mytool')

const baseEnv = {
  PKG_NAME: 'mytool',
  PKG_VERSION: '1.2.3',
  PREFIX: '/opt/env/prefix',
  SRC_DIR: '/opt/env/work',
  target_platform: 'linux-64',
}

test('reads the build environment', () => {
  const config = loadConfig(baseEnv, {}, cwd)

  assert.deepEqual(config, {
    descriptor: { name: 'mytool', version: '1.2.3', targetPlatform: 'linux-64' },
    prefix: '/opt/env/prefix',
    workDir: '/opt/env/work',
    renamePolicy: 'first-separator',
    keepNames: [],
    logLevel: 'info',
  })
})

test('command line values win over the environment', () => {
  const config = loadConfig(
    baseEnv,
    {
      name: 'other',
      version: '2.0.0',
      platform: 'osx-arm64',
      prefix: 'out',
      workDir: 'in',
      renamePolicy: 'keep',
      logLevel: 'debug',
    },
    cwd,
  )

  assert.deepEqual(config.descriptor, {
    name: 'other',
    version: '2.0.0',
    targetPlatform: 'osx-arm64',
  })
  assert.equal(config.prefix, join(cwd, 'out'))
  assert.equal(config.workDir, join(cwd, 'in'))
  assert.equal(config.renamePolicy, 'keep')
  assert.equal(config.logLevel, 'debug')
})

test('TARGET_PLATFORM is accepted when target_platform is unset', () => {
  const { target_platform: _unused, ...env } = baseEnv
  const config = loadConfig({ ...env, TARGET_PLATFORM: 'win-64' }, {}, cwd)
  assert.equal(config.descriptor.targetPlatform, 'win-64')
})

test('the host platform is used when no target platform is given', () => {
  const { target_platform: _unused, ...env } = baseEnv
  const config = loadConfig(env, {}, cwd)
  assert.equal(config.descriptor.targetPlatform, detectTargetPlatform())
})

test('the work directory defaults to the current directory', () => {
  const { SRC_DIR: _unused, ...env } = baseEnv
  assert.equal(loadConfig(env, {}, cwd).workDir, cwd)
})

test('blank values count as unset', () => {
  assert.throws(
    () => loadConfig({ ...baseEnv, PKG_NAME: '  ' }, {}, cwd),
    new ConfigError('Missing required setting(s): PKG_NAME (--name)'),
  )
})

test('every missing required setting is named', () => {
  assert.throws(
    () => loadConfig({}, {}, cwd),
    (error: unknown) => {
      assert.ok(error instanceof ConfigError)
      assert.equal(error.exitCode, 64)
      assert.equal(
        error.message,
        'Missing required setting(s): PKG_NAME (--name), PKG_VERSION (--version), PREFIX (--prefix)',
      )
      return true
    },
  )
})

test('an unsupported platform is rejected', () => {
  assert.throws(
    () => loadConfig({ ...baseEnv, target_platform: 'linux-s390x' }, {}, cwd),
    (error: unknown) => {
      assert.ok(error instanceof ConfigError)
      assert.ok(error.message.startsWith('Unsupported target platform: linux-s390x. '))
      return true
    },
  )
})

test('an unknown rename policy is rejected', () => {
  assert.throws(
    () => loadConfig({ ...baseEnv, BINSTAGE_RENAME_POLICY: 'shortest' }, {}, cwd),
    new ConfigError(
      'Unknown rename policy: shortest. Expected one of first-separator, version-boundary, keep',
    ),
  )
})

test('an unknown log level is rejected', () => {
  assert.throws(
    () => loadConfig({ ...baseEnv, BINSTAGE_LOG_LEVEL: 'trace' }, {}, cwd),
    new ConfigError('Unknown log level: trace. Expected one of silent, info, debug'),
  )
})

test('keep names come from the environment and the command line', () => {
  const config = loadConfig(
    { ...baseEnv, BINSTAGE_KEEP_NAMES: 'tool-1.2.3, helper-1.2.3 ,' },
    { keepNames: ['extra-1.2.3'] },
    cwd,
  )
  assert.deepEqual(config.keepNames, ['tool-1.2.3', 'helper-1.2.3', 'extra-1.2.3'])
})

test('splitList drops empty items', () => {
  assert.deepEqual(splitList(undefined), [])
  assert.deepEqual(splitList(''), [])
  assert.deepEqual(splitList(' a ,,b '), ['a', 'b'])
})
