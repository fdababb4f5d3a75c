import { Templates, type TemplateSet } from '@symsync/engine'
import { Effect } from 'effect'
import * as yaml from 'js-yaml'

import { makeCliError, type CliError } from './errors.js'
import { readTextFile } from './output.js'

export const parseTemplatesYaml = (text: string, filePath: string): Effect.Effect<unknown, CliError> =>
  Effect.try({
    try: (): unknown => yaml.load(text, { filename: filePath }),
    catch: (cause) =>
      makeCliError({
        code: 'CLI_INVALID_INPUT',
        message: `templates file is not valid YAML: ${filePath}`,
        cause,
      }),
  })

/** Reads and decodes a `templates:` YAML document; template order follows the file. */
export const loadTemplatesFile = (filePath: string): Effect.Effect<TemplateSet, CliError | Error> =>
  readTextFile(filePath, 'templates file').pipe(
    Effect.flatMap((text) => parseTemplatesYaml(text, filePath)),
    Effect.flatMap(Templates.decodeTemplateSet),
    Effect.tap((templates) => Effect.logDebug(`loaded ${templates.length} templates from ${filePath}`)),
  )
