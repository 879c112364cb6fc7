import { resolve } from 'node:path'
import { appendStatusReport, DEFAULT_BATCH_LIMIT, discoverUnits, runBatch } from './batch.js'
import { loadConfig, type ConfigOverrides, type Env } from './config.js'
import { ConfigError, EXIT_CODES, exitCodeFor } from './errors.js'
import { createLogger, LOG_LEVELS, type LogLevel, type Logger } from './log.js'
import { normalizePrefix } from './normalize.js'
import { isRenamePolicy, RENAME_POLICIES, type RenamePolicy } from './rename.js'

export const NORMALIZE_USAGE = `
Usage: normalize [options]

Extracts {name}-{version}-{platform}[.zip|.tar.gz|.tgz|.tar.xz|.tar.zst|.gz|.xz|.zst]
from the work directory into the prefix and reshapes it into bin/ and extras/.

Options:
  --name <name>            Package name (PKG_NAME)
  --version <version>      Package version (PKG_VERSION)
  --platform <platform>    Target platform, e.g. linux-64 (target_platform, default: host)
  --prefix <dir>           Installation prefix (PREFIX)
  --work-dir <dir>         Directory holding the artifact (SRC_DIR, default: cwd)
  --rename-policy <policy> first-separator | version-boundary | keep (BINSTAGE_RENAME_POLICY)
  --keep-name <file>       Never rename this executable (repeatable, BINSTAGE_KEEP_NAMES)
  --verbose                Debug output
  --quiet                  Errors only
  -h, --help               Show this help message

Exit codes:
  1   no recognizable input artifact
  2   extraction or layout failure
  3   installation prefix not accessible
  4   prefix already normalized
  64  invalid configuration or usage
`

export const BATCH_USAGE = `
Usage: batch [options]

Normalizes every <root>/<platform>/<package>/ holding a binstage.json
({ "name": ..., "version": ... }) into <root>/<platform>/<package>/prefix.

Options:
  --root <dir>             Directory to walk (default: cwd)
  --fail-fast              Stop after the first failing package
  --concurrency <n>        Packages normalized at the same time (default: 1)
  --limit <n>              Stop after n packages (default: ${DEFAULT_BATCH_LIMIT})
  --status-file <file>     Report appended here (default: <root>/status.txt)
  --rename-policy <policy> first-separator | version-boundary | keep
  --keep-name <file>       Never rename this executable (repeatable)
  --verbose                Debug output
  --quiet                  Errors only
  -h, --help               Show this help message
`

export type CommandIo = {
  env?: Env
  cwd?: string
  write?: (line: string) => void
  writeError?: (line: string) => void
  color?: boolean
}

export type ParsedNormalizeArgs = {
  help: boolean
  overrides: ConfigOverrides
}

export type ParsedBatchArgs = {
  help: boolean
  root?: string
  failFast: boolean
  concurrency: number
  limit: number
  statusFile?: string
  renamePolicy?: RenamePolicy
  keepNames: string[]
  logLevel?: LogLevel
}

function takeValue(args: readonly string[], index: number, flag: string): string {
  const value = args[index + 1]
  if (value === undefined || value.startsWith('--')) {
    throw new ConfigError(`${flag} requires a value`)
  }
  return value
}

function parsePositiveInteger(value: string, flag: string): number {
  const parsed = Number(value)
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new ConfigError(`${flag} must be a positive integer, got ${value}`)
  }
  return parsed
}

function parsePolicy(value: string): RenamePolicy {
  if (!isRenamePolicy(value)) {
    throw new ConfigError(
      `Unknown rename policy: ${value}. Expected one of ${RENAME_POLICIES.join(', ')}`,
    )
  }
  return value
}

export function parseNormalizeArgs(args: readonly string[]): ParsedNormalizeArgs {
  const overrides: ConfigOverrides = {}
  let help = false

  for (let i = 0; i < args.length; i++) {
    const arg = args[i]
    if (arg === '--name') {
      overrides.name = takeValue(args, i++, arg)
    } else if (arg === '--version') {
      overrides.version = takeValue(args, i++, arg)
    } else if (arg === '--platform') {
      overrides.platform = takeValue(args, i++, arg)
    } else if (arg === '--prefix') {
      overrides.prefix = takeValue(args, i++, arg)
    } else if (arg === '--work-dir') {
      overrides.workDir = takeValue(args, i++, arg)
    } else if (arg === '--rename-policy') {
      overrides.renamePolicy = takeValue(args, i++, arg)
    } else if (arg === '--keep-name') {
      overrides.keepNames = [...(overrides.keepNames ?? []), takeValue(args, i++, arg)]
    } else if (arg === '--verbose') {
      overrides.logLevel = 'debug'
    } else if (arg === '--quiet') {
      overrides.logLevel = 'silent'
    } else if (arg === '--help' || arg === '-h') {
      help = true
    } else {
      throw new ConfigError(`Unknown argument: ${arg}`)
    }
  }

  return { help, overrides }
}

export function parseBatchArgs(args: readonly string[]): ParsedBatchArgs {
  const parsed: ParsedBatchArgs = {
    help: false,
    failFast: false,
    concurrency: 1,
    limit: DEFAULT_BATCH_LIMIT,
    keepNames: [],
  }

  for (let i = 0; i < args.length; i++) {
    const arg = args[i]
    if (arg === '--root') {
      parsed.root = takeValue(args, i++, arg)
    } else if (arg === '--fail-fast') {
      parsed.failFast = true
    } else if (arg === '--concurrency') {
      parsed.concurrency = parsePositiveInteger(takeValue(args, i++, arg), arg)
    } else if (arg === '--limit') {
      parsed.limit = parsePositiveInteger(takeValue(args, i++, arg), arg)
    } else if (arg === '--status-file') {
      parsed.statusFile = takeValue(args, i++, arg)
    } else if (arg === '--rename-policy') {
      parsed.renamePolicy = parsePolicy(takeValue(args, i++, arg))
    } else if (arg === '--keep-name') {
      parsed.keepNames.push(takeValue(args, i++, arg))
    } else if (arg === '--verbose') {
      parsed.logLevel = 'debug'
    } else if (arg === '--quiet') {
      parsed.logLevel = 'silent'
    } else if (arg === '--help' || arg === '-h') {
      parsed.help = true
    } else {
      throw new ConfigError(`Unknown argument: ${arg}`)
    }
  }

  return parsed
}

function loggerFor(io: CommandIo, level: LogLevel): Logger {
  return createLogger({
    level,
    ...(io.color !== undefined ? { color: io.color } : {}),
    ...(io.write ? { write: io.write } : {}),
    ...(io.writeError ? { writeError: io.writeError } : {}),
  })
}

function envLogLevel(env: Env): LogLevel {
  return LOG_LEVELS.find((level) => level === env['BINSTAGE_LOG_LEVEL']) ?? 'info'
}

function reportFailure(logger: Logger, error: unknown): number {
  logger.error(error instanceof Error ? error.message : String(error))
  return exitCodeFor(error)
}

/** Runs one normalization from argv and the environment; resolves to the exit code. */
export async function runNormalizeCommand(
  args: readonly string[],
  io: CommandIo = {},
): Promise<number> {
  const { env = process.env, cwd = process.cwd(), write = (line) => console.log(line) } = io

  let logger = loggerFor(io, envLogLevel(env))
  try {
    const { help, overrides } = parseNormalizeArgs(args)
    if (help) {
      write(NORMALIZE_USAGE)
      return 0
    }

    const config = loadConfig(env, overrides, cwd)
    logger = loggerFor(io, config.logLevel)

    await normalizePrefix({
      descriptor: config.descriptor,
      prefix: config.prefix,
      workDir: config.workDir,
      renamePolicy: config.renamePolicy,
      keepNames: config.keepNames,
      logger,
    })
    return 0
  } catch (error) {
    const code = reportFailure(logger, error)
    if (error instanceof ConfigError) write(NORMALIZE_USAGE)
    return code
  }
}

/** Runs the batch normalizer; resolves to 0 only if every package succeeded. */
export async function runBatchCommand(
  args: readonly string[],
  io: CommandIo = {},
): Promise<number> {
  const { env = process.env, cwd = process.cwd(), write = (line) => console.log(line) } = io

  let logger = loggerFor(io, envLogLevel(env))
  try {
    const parsed = parseBatchArgs(args)
    if (parsed.help) {
      write(BATCH_USAGE)
      return 0
    }
    if (parsed.logLevel) logger = loggerFor(io, parsed.logLevel)

    const root = resolve(cwd, parsed.root ?? '.')
    const statusFile = resolve(cwd, parsed.statusFile ?? resolve(root, 'status.txt'))

    const units = await discoverUnits(root, { logger })
    logger.step(`Normalizing ${units.length} package(s) found in ${root}`)

    const report = await runBatch(units, {
      failFast: parsed.failFast,
      concurrency: parsed.concurrency,
      limit: parsed.limit,
      renamePolicy: parsed.renamePolicy,
      keepNames: parsed.keepNames,
      logger,
    })
    await appendStatusReport(statusFile, report)

    if (report.failed.length > 0) {
      logger.error(`${report.failed.length} of ${report.total} package(s) failed`)
      return EXIT_CODES.EXTRACTION_FAILED
    }
    logger.success(`${report.succeeded.length} of ${report.total} packages processed successfully`)
    return 0
  } catch (error) {
    const code = reportFailure(logger, error)
    if (error instanceof ConfigError) write(BATCH_USAGE)
    return code
  }
}
