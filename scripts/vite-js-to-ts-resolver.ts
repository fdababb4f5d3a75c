import fs from 'node:fs'
import path from 'node:path'
import type { Plugin } from 'vite'

const stripQuery = (id: string): string => id.split('?', 1)[0] ?? id

/**
 * Relative imports in the sources end in `.js` (Node ESM style); Vite does not fall back to the
 * `.ts` file on its own, so this resolver does.
 */
export const jsToTsResolver = (): Plugin => ({
  name: 'symsync:js-to-ts-resolver',
  enforce: 'pre',
  resolveId(source, importer) {
    if (!importer || !source.startsWith('.') || !source.endsWith('.js')) {
      return null
    }

    const resolvedJs = path.resolve(path.dirname(stripQuery(importer)), stripQuery(source))
    if (fs.existsSync(resolvedJs)) {
      return null
    }

    const base = resolvedJs.slice(0, -'.js'.length)
    return [`${base}.ts`, `${base}.mts`].find((candidate) => fs.existsSync(candidate)) ?? null
  },
})
