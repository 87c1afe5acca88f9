export type { Computed, Signal } from '@tldraw/state';

export { decodeCanonical, encodeCanonical } from './canonical.js';
export {
  ChangeDetector,
  type ComparisonStrategy,
  referenceStrategy,
  type Snapshot,
  strategyFor,
  structuralStrategy,
} from './change-detector.js';
export {
  ChangeEventChannel,
  type ChannelErrorReporter,
  type ChannelSubscriber,
  CurrentValueChannel,
  channelErrorReporter,
  streamOf,
} from './channel.js';
export {
  CONFIG_FILE_NAME,
  type ChangeDetectionMode,
  configFromEnv,
  defaultConfig,
  defineConfig,
  findConfigFile,
  loadConfig,
  mergeConfig,
  type MutationLockMode,
  resolveLogger,
  type StateHubConfig,
  type StateHubFileConfig,
} from './config.js';
export { ConfigError, DisposedError, EncodingError, type EncodingErrorCode, StateHubError } from './errors.js';
export { EventBus, eventKeyOf, HandlerFailed } from './event-bus.js';
export { describeFields, type FieldDescriptor, prototypeGetters } from './fields.js';
export { LockPool, MutationLock } from './lock.js';
export {
  ConsoleLogger,
  createLogger,
  isLogLevelName,
  type Logger,
  LogLevel,
  type LogLevelName,
  parseLogLevel,
  SilentLogger,
  scopedLogger,
} from './logger.js';
export { TypedStateStore } from './store.js';
export type {
  EventKey,
  EventOf,
  FieldName,
  HandlerErrorContext,
  HandlerErrorHook,
  Listener,
  Predicate,
  PropertyChange,
  StateChange,
  StateType,
  Stream,
  Unsubscribe,
  UpdateFn,
} from './types.js';
export {
  computed,
  computedPropsString,
  sortedKeyValuePairs,
  type ViewFunction,
  type ViewPrimitiveProp,
  type ViewProps,
  type ViewReader,
} from './view.js';
