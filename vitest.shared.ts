import path from 'node:path'
import { fileURLToPath } from 'node:url'

import { jsToTsResolver } from './scripts/vite-js-to-ts-resolver'

const rootDir = path.dirname(fileURLToPath(import.meta.url))

export const sharedConfig = {
  plugins: [jsToTsResolver()],
  test: {
    alias: {
      // Workspace packages resolve to their sources, so tests need no build first.
      '@symsync/engine': path.resolve(rootDir, './packages/symsync-engine/src/index.ts'),
    },
    exclude: ['**/node_modules/**', '**/dist/**'],
  },
}
