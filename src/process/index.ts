/**
 * Process Lifecycle Module
 * @module process
 */

export { ProcessRegistry, type TrackedProcess } from './process-registry.js';
export {
  PsProcessLister,
  PsProcessProbe,
  isServerLaunch,
  lineageOf,
  parseProcessList,
  parseProbeOutput,
  type ProcessInfo,
  type ProcessLister,
  type ProcessProbe,
  type ProbeReading,
} from './process-table.js';
export { isPortFree } from './port-check.js';
export {
  baseUrlFor,
  type ServiceDriver,
  type ServiceInstance,
  type ServiceLaunchConfig,
} from './service-driver.js';
export {
  SubprocessServiceDriver,
  type SubprocessDriverOptions,
  type SpawnFunction,
  type KillFunction,
} from './subprocess-driver.js';
export {
  ShutdownCoordinator,
  type ShutdownCoordinatorOptions,
  type ShutdownSignal,
  type Finalizer,
} from './shutdown.js';
