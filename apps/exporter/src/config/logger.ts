import { createLogger, type ILogger } from '@catalog-exporter/logger'

export const rootLogger = createLogger('exporter')

export type ComponentLoggers = ReturnType<typeof componentLoggers>

export function componentLoggers(base: ILogger = rootLogger) {
  return {
    cli: base.child('cli'),
    fetch: base.child('fetch'),
    pipeline: base.child('pipeline'),
    export: base.child('export'),
  }
}
