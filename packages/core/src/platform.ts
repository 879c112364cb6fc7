export type TargetPlatform =
  | 'linux-64'
  | 'linux-aarch64'
  | 'linux-ppc64le'
  | 'osx-64'
  | 'osx-arm64'
  | 'win-64'
  | 'win-arm64'
  | 'noarch'

export type TargetOs = 'linux' | 'osx' | 'win' | 'noarch'

export type TargetPlatformInfo = {
  platform: TargetPlatform
  os: TargetOs
  arch: string | null
  isWindows: boolean
  // Suffixes that mark a file as a command where permission bits do not
  executableExtensions: readonly string[]
}

export const SUPPORTED_TARGET_PLATFORMS: readonly TargetPlatform[] = [
  'linux-64',
  'linux-aarch64',
  'linux-ppc64le',
  'osx-64',
  'osx-arm64',
  'win-64',
  'win-arm64',
  'noarch',
]

export const WINDOWS_EXECUTABLE_EXTENSIONS: readonly string[] = [
  '.exe',
  '.bat',
  '.com',
  '.cmd',
  '.ps1',
]

export function isTargetPlatform(value: string): value is TargetPlatform {
  return SUPPORTED_TARGET_PLATFORMS.some((platform) => platform === value)
}

/** Target platform of the machine running the build, for local runs outside a recipe build. */
export function detectTargetPlatform(
  platform: string = process.platform,
  arch: string = process.arch,
): TargetPlatform {
  if (platform === 'linux' && arch === 'x64') return 'linux-64'
  if (platform === 'linux' && arch === 'arm64') return 'linux-aarch64'
  if (platform === 'linux' && arch === 'ppc64') return 'linux-ppc64le'
  if (platform === 'darwin' && arch === 'x64') return 'osx-64'
  if (platform === 'darwin' && arch === 'arm64') return 'osx-arm64'
  if (platform === 'win32' && arch === 'x64') return 'win-64'
  if (platform === 'win32' && arch === 'arm64') return 'win-arm64'

  throw new Error(
    `Unsupported host platform: ${platform}-${arch}. ` +
      `Set target_platform explicitly (one of ${SUPPORTED_TARGET_PLATFORMS.join(', ')})`,
  )
}

export function getTargetPlatformInfo(platform: TargetPlatform): TargetPlatformInfo {
  if (platform === 'noarch') {
    return {
      platform,
      os: 'noarch',
      arch: null,
      isWindows: false,
      executableExtensions: [],
    }
  }

  const [os, arch = null] = platform.split('-')
  const isWindows = os === 'win'

  return {
    platform,
    os: os === 'win' ? 'win' : os === 'osx' ? 'osx' : 'linux',
    arch,
    isWindows,
    executableExtensions: isWindows ? WINDOWS_EXECUTABLE_EXTENSIONS : [],
  }
}
