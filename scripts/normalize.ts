#!/usr/bin/env tsx
/**
 * Build-script entry point: normalizes the release artifact of one package
 * into $PREFIX.
 *
 * Usage:
 *   npm run normalize                      # everything from the build environment
 *   npm run normalize -- --prefix ./out --name mytool --version 1.2.3 --platform linux-64
 */

import { runNormalizeCommand } from '@binstage/core'

runNormalizeCommand(process.argv.slice(2)).then(
  (code) => process.exit(code),
  (error) => {
    console.error('[binstage] Error:', error instanceof Error ? error.message : String(error))
    process.exit(2)
  },
)
