// ============================================================================
// LOG DISPATCH - MAIN EXPORTS
// ============================================================================

export {
  TemplateRegistry,
  TemplateRegistryFrozenError,
  DEFAULT_TEMPLATES,
  loadDefaultTemplates,
  type ReadonlyTemplateRegistry,
} from './templates';

export {
  LogRecord,
  Severity,
  buildLog,
  type LogFields,
  type LogRecordInit,
} from './record';

export {
  RecordSerializationError,
  serializeRecord,
  toSerializedRecord,
  buildPushPayload,
  toUnixNanos,
  type SerializeResult,
  type SerializedRecord,
  type StreamLabels,
  type PushEntry,
  type PushPayload,
  type PushStream,
} from './serialize';

export { emitLocal } from './console';
export { RendezvousChannel, ChannelClosedError } from './channel';

export {
  RemoteSink,
  RemotePushError,
  type RemoteSinkConfig,
  type PushResult,
} from './remote-sink';

export {
  LogDispatcher,
  DispatcherClosedError,
  type DispatcherState,
  type DeliveryOutcome,
  type LogDispatcherConfig,
} from './dispatcher';

export {
  LogPipeline,
  createLogPipeline,
  type CreateLogPipelineOptions,
} from './pipeline';

export { initLogger, createLogger, type LogLevel, type RootLoggerOptions } from './logger';
