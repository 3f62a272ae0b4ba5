// UI Components exports

export {
  RegionController,
  type RegionOptions,
  type RegionSink,
  type RegionState,
} from './region-controller.js';
export { withRegion, type WithRegionOptions } from './region-scope.js';
export {
  RegionError,
  InvalidConfigurationError,
  InvalidStateError,
  IndexOutOfRangeError,
  InvalidContentError,
  OutputSinkError,
  isRegionError,
  type RegionErrorCode,
} from './region-errors.js';
export { installRegionConsoleRouter, type UninstallFn } from './console-router.js';
export { ANSI } from './ansi.js';
