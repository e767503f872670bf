export * from './ingestion/draws/types.js'
export { CandidateSpace, describeShape } from './ingestion/draws/explorer.js'
export { buildRequest, pageValue } from './ingestion/draws/request.js'
export { DrawTransport, type DrawTransportOptions } from './ingestion/draws/transport.js'
export { RequestPacer, systemClock, type Clock } from './ingestion/draws/pacer.js'
export { extractList, extractTotalHint } from './ingestion/draws/extract.js'
export {
  normalizeDrawItem,
  normalizeBatch,
  isValidDrawRecord,
  isComplete,
} from './ingestion/draws/normalize.js'
export { PaginationController, type PaginationOptions } from './ingestion/draws/pagination.js'
export { HtmlFallback, extractDrawsFromHtml } from './ingestion/draws/html-fallback.js'
export { FallbackOrchestrator } from './ingestion/draws/orchestrator.js'
export { reconcile } from './ingestion/draws/reconcile.js'
export {
  exportStore,
  serializeStore,
  toStoredRecord,
  parseStoredRecord,
  recoverStoredRecord,
} from './ingestion/draws/codec.js'
export { JsonFileDrawStore, type DrawStoreGateway } from './ingestion/draws/store.js'
export { auditEntries, auditStoreFile, type AuditReport } from './ingestion/draws/audit.js'
export { runHarvest, type HarvestOptions } from './ingestion/draws/harvest.js'
export { loadSettings, loadCandidateFile, type HarvestSettings, type CandidateFile } from './config/settings.js'
export { HarvestError, ConfigError, PersistenceWriteError, classifyError } from './config/errors.js'
