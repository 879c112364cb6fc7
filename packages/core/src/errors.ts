/** Stable normalizer error codes. */
export type NormalizeErrorCode =
  | 'MISSING_INPUT_ARTIFACT'
  | 'EXTRACTION_FAILED'
  | 'LAYOUT_CONFLICT'
  | 'PREFIX_ACCESS'
  | 'ALREADY_NORMALIZED'
  | 'INVALID_CONFIG'

export const EXIT_CODES: Record<NormalizeErrorCode, number> = {
  MISSING_INPUT_ARTIFACT: 1,
  EXTRACTION_FAILED: 2,
  LAYOUT_CONFLICT: 2,
  PREFIX_ACCESS: 3,
  ALREADY_NORMALIZED: 4,
  INVALID_CONFIG: 64,
}

/** Exit code for failures that are not a {@link NormalizeError}. */
export const GENERIC_EXIT_CODE = 2

/** Base class for every failure the normalizer reports. */
export class NormalizeError extends Error {
  readonly code: NormalizeErrorCode
  readonly context?: Record<string, string> | undefined

  constructor(
    code: NormalizeErrorCode,
    message: string,
    options?: { context?: Record<string, string>; cause?: unknown },
  ) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined)
    this.name = 'NormalizeError'
    this.code = code
    this.context = options?.context
  }

  get exitCode(): number {
    return EXIT_CODES[this.code]
  }

  toJSON(): {
    name: string
    code: NormalizeErrorCode
    message: string
    context: Record<string, string>
  } {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: { ...this.context },
    }
  }
}

export type DirectoryListingEntry = {
  name: string
  type: 'file' | 'directory' | 'symlink' | 'other'
  size: number
}

export class MissingInputArtifactError extends NormalizeError {
  readonly expected: string
  readonly workDir: string
  readonly listing: DirectoryListingEntry[]

  constructor(options: {
    expected: string
    workDir: string
    listing: DirectoryListingEntry[]
    tried: string[]
  }) {
    const { expected, workDir, listing, tried } = options
    const contents =
      listing.length === 0
        ? '  (empty)'
        : listing
            .map((e) => `  ${e.type.padEnd(9)} ${String(e.size).padStart(10)}  ${e.name}`)
            .join('\n')

    super(
      'MISSING_INPUT_ARTIFACT',
      `${expected} not found in ${workDir}: no bare binary and none of ` +
        `${tried.join(', ')}\n` +
        `Work directory contents is:\n${contents}`,
      { context: { expected, workDir } },
    )
    this.name = 'MissingInputArtifactError'
    this.expected = expected
    this.workDir = workDir
    this.listing = listing
  }
}

export class ExtractionError extends NormalizeError {
  constructor(message: string, options?: { context?: Record<string, string>; cause?: unknown }) {
    super('EXTRACTION_FAILED', message, options)
    this.name = 'ExtractionError'
  }
}

export class LayoutConflictError extends NormalizeError {
  constructor(message: string, options?: { context?: Record<string, string>; cause?: unknown }) {
    super('LAYOUT_CONFLICT', message, options)
    this.name = 'LayoutConflictError'
  }
}

export class PrefixAccessError extends NormalizeError {
  constructor(prefix: string, cause?: unknown) {
    const reason = cause instanceof Error ? `: ${cause.message}` : ''
    super('PREFIX_ACCESS', `Cannot access installation prefix ${prefix}${reason}`, {
      context: { prefix },
      cause,
    })
    this.name = 'PrefixAccessError'
  }
}

export class AlreadyNormalizedError extends NormalizeError {
  constructor(prefix: string) {
    super(
      'ALREADY_NORMALIZED',
      `Prefix ${prefix} already contains a normalized layout (bin/ and extras/). ` +
        `Normalization is destructive and is not run twice on the same prefix.`,
      { context: { prefix } },
    )
    this.name = 'AlreadyNormalizedError'
  }
}

export class ConfigError extends NormalizeError {
  constructor(message: string) {
    super('INVALID_CONFIG', message)
    this.name = 'ConfigError'
  }
}

export function exitCodeFor(error: unknown): number {
  return error instanceof NormalizeError ? error.exitCode : GENERIC_EXIT_CODE
}
