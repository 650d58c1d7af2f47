/**
 * Reporting Module
 * @module reporting
 */

export {
  RunStore,
  RunDocumentSchema,
  toRunDocument,
  fromRunDocument,
  formatRunStamp,
  type RunDocument,
  type RunSink,
  type StoredRun,
} from './run-store.js';
export { summarizeRun, type EndpointRollup } from './summary.js';
export { formatRateTables, formatAnalysis } from './format.js';
