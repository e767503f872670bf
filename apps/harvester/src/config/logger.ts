import { createLogger } from '@drawledger/logger'

export const rootLogger = createLogger('harvester')

export const loggers = {
  transport: rootLogger.child('transport'),
  pagination: rootLogger.child('pagination'),
  orchestrator: rootLogger.child('orchestrator'),
  html: rootLogger.child('html'),
  store: rootLogger.child('store'),
  cli: rootLogger.child('cli'),
}
