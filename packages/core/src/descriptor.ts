import type { TargetPlatform } from './platform.js'

/** One build unit: the package being normalized and the platform it is built for. */
export type PackageDescriptor = {
  name: string
  version: string
  targetPlatform: TargetPlatform
}

/** `{name}-{version}-{targetPlatform}`, the artifact name without any extension. */
export function getArtifactBaseName(descriptor: PackageDescriptor): string {
  const { name, version, targetPlatform } = descriptor
  return `${name}-${version}-${targetPlatform}`
}

export function formatDescriptor(descriptor: PackageDescriptor): string {
  return `${descriptor.name} ${descriptor.version} (${descriptor.targetPlatform})`
}
