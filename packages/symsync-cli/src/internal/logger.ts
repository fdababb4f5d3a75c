import { Layer, Logger } from 'effect'

export const silentLoggerLayer: Layer.Layer<never> = Logger.replace(Logger.defaultLogger, Logger.make(() => {}))

// stdout carries the CommandResult protocol, so logs go to stderr.
export const stderrLoggerLayer: Layer.Layer<never> = Logger.replace(
  Logger.defaultLogger,
  Logger.logfmtLogger.pipe(Logger.withConsoleError),
)

export const cliLoggerLayer = (options: { readonly quiet: boolean }): Layer.Layer<never> =>
  options.quiet ? silentLoggerLayer : stderrLoggerLayer
