/**
 * Load Generation Module
 * @module load
 */

export type { LoadSource, LoadTarget, AttackRequest, AttackArtifact } from './load-source.js';
export {
  VegetaLoadSource,
  VegetaReportSchema,
  parseVegetaReport,
  formatTargets,
  type VegetaReport,
  type VegetaOptions,
} from './vegeta.js';
