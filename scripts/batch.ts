#!/usr/bin/env tsx
/**
 * Normalizes every package found under <root>/<platform>/<package>/ and
 * appends a summary to the status file.
 *
 * Usage:
 *   npm run batch -- --root ./recipes
 *   npm run batch -- --root ./recipes --fail-fast --concurrency 4
 */

import { runBatchCommand } from '@binstage/core'

runBatchCommand(process.argv.slice(2)).then(
  (code) => process.exit(code),
  (error) => {
    console.error('[binstage] Error:', error instanceof Error ? error.message : String(error))
    process.exit(2)
  },
)
