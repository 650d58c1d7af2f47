/**
 * Sampler Module
 * @module sampler
 */

export {
  ResourceSampler,
  summarizeSeries,
  type SamplerOptions,
  type SamplingHandle,
  type StartSamplingOptions,
} from './resource-sampler.js';
