export type LogLevel = 'silent' | 'info' | 'debug'

export const LOG_LEVELS: readonly LogLevel[] = ['silent', 'info', 'debug']

export type Logger = {
  step(message: string): void
  info(message: string): void
  success(message: string): void
  warn(message: string): void
  error(message: string): void
  debug(message: string): void
}

const colors = {
  reset: '\x1b[0m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  cyan: '\x1b[36m',
  dim: '\x1b[2m',
}

type Color = keyof typeof colors

export type LoggerOptions = {
  level?: LogLevel
  color?: boolean
  tag?: string
  write?: (line: string) => void
  writeError?: (line: string) => void
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const {
    level = 'info',
    color = !process.env['NO_COLOR'] && process.stdout.isTTY === true,
    tag = '[binstage]',
    write = (line) => console.log(line),
    writeError = (line) => console.error(line),
  } = options

  const paint = (c: Color, text: string) =>
    color ? `${colors[c]}${text}${colors.reset}` : text

  const enabled = level !== 'silent'
  const verbose = level === 'debug'

  return {
    step(message) {
      if (enabled) write(`${tag} ${paint('cyan', '▶')} ${message}`)
    },
    info(message) {
      if (enabled) write(`${tag} ${message}`)
    },
    success(message) {
      if (enabled) write(`${tag} ${paint('green', '✓')} ${message}`)
    },
    warn(message) {
      if (enabled) write(`${tag} ${paint('yellow', '⚠')} ${message}`)
    },
    // errors are printed even when silent; the exit code alone is not a diagnostic
    error(message) {
      writeError(`${tag} ${paint('red', '✗')} ${message}`)
    },
    debug(message) {
      if (verbose) write(`${tag} ${paint('dim', message)}`)
    },
  }
}

export const silentLogger: Logger = createLogger({
  level: 'silent',
  writeError: () => {},
})
