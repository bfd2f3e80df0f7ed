export {
  ControlGate,
  type ControlChange,
  type ControlChangeListener,
  type GateWait,
} from './utils/control-gate';
export {
  WorkerPool,
  type PoolCompletion,
  type WorkerPoolOptions,
} from './utils/worker-pool';
export {
  DEFAULT_RETRY_BASE_DELAY_MS,
  DEFAULT_RETRY_MAX_JITTER_MS,
  abortableSleep,
  computeBackoffDelay,
  isTransientError,
  withRetries,
  type RetryOptions,
} from './utils/retry';
export {
  extractEnvelopeText,
  extractResponseText,
  normalizeUsage,
  type VisionResponseLike,
} from './utils/response-normalizer';
export {
  DEFAULT_VISION_MAX_RETRIES,
  VisionCaller,
  type ExtendedTokenUsage,
  type VisionCallConfig,
  type VisionCallResult,
  type VisionImage,
} from './utils/vision-caller';
export { TokenUsageAggregator } from './utils/token-usage-aggregator';
export {
  SpawnExitError,
  spawnAsync,
  spawnChecked,
  type SpawnAsyncOptions,
  type SpawnResult,
} from './utils/spawn-utils';
