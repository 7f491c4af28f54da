// Main entry point
export { BatchGeocoder } from './BatchGeocoder.js';
export type { BatchStatusResult } from './application/usecases/GetBatchStatus.js';

// Domain model
export { GeocodeCommand, createJob, successResult, failureResult } from './domain/model/BatchJob.js';
export type { Job, BatchResult, BatchOutcome } from './domain/model/BatchJob.js';
export { ErrorPolicy, DEFAULT_OUTPUT_FIELDS, resolveBatchOptions } from './domain/model/BatchOptions.js';
export type { BatchOptions, ResolvedBatchOptions } from './domain/model/BatchOptions.js';
export { PipelineStatus, canTransition, isTerminal } from './domain/model/PipelineStatus.js';
export type { BatchProgress, BatchSummary } from './domain/model/Progress.js';
export type {
  Coordinates,
  Bounds,
  Components,
  GeocodeResult,
  GeocodeResponse,
  RateInfo,
  ResponseStatus,
} from './domain/model/GeocodeResponse.js';

// Errors
export {
  ErrorKind,
  GeocodingError,
  RateLimitExceededError,
  ServerError,
  NetworkError,
  BatchProcessingError,
  isGeocodingError,
} from './domain/errors/GeocodingError.js';
export type { RateLimitDetails } from './domain/errors/GeocodingError.js';

// Domain services
export { classifyError, errorForStatus, isRetryableKind } from './domain/services/ErrorClassifier.js';
export type { ClassifiedError } from './domain/services/ErrorClassifier.js';
export { formatReverseQuery, parseReverseQuery, parseDecimal, isDecimal } from './domain/services/Coordinates.js';
export { parseRow } from './domain/services/RowParser.js';
export type { ParsedRow, RowParserOptions } from './domain/services/RowParser.js';
export {
  buildHeader,
  projectRow,
  getFieldPath,
  parseFieldPath,
  statusMessage,
  needsAllResults,
  STATUS_MESSAGE_FIELD,
  RAW_JSON_FIELD,
} from './domain/services/FieldProjector.js';

// Application services
export { RetryingRequestExecutor, DEFAULT_RETRY_POLICY } from './application/services/RetryingRequestExecutor.js';
export type {
  RetryPolicy,
  RetryAttempt,
  RequestOutcome,
  RetryingRequestExecutorOptions,
} from './application/services/RetryingRequestExecutor.js';
export { probeCredential, CONSTRAINED_TIER_RATE_LIMIT } from './application/services/PreflightProbe.js';
export type { PreflightReport } from './application/services/PreflightProbe.js';
export { BoundedChannel, ChannelClosedError } from './application/concurrency/BoundedChannel.js';
export { Semaphore } from './application/concurrency/Semaphore.js';
export { EventBus } from './application/EventBus.js';

// Ports (for custom implementations)
export type { DataSource } from './domain/ports/DataSource.js';
export type { DataSink } from './domain/ports/DataSink.js';
export type { TabularFormat, ReadRowsOptions } from './domain/ports/TabularFormat.js';
export type { Geocoder, RequestParams, RequestParamValue, RequestOptions } from './domain/ports/Geocoder.js';
export type { AdmissionGate } from './domain/ports/AdmissionGate.js';

// Domain events
export type {
  DomainEvent,
  EventType,
  EventPayload,
  JobPreflightedEvent,
  JobStartedEvent,
  JobWarningEvent,
  JobProgressEvent,
  JobCompletedEvent,
  JobFailedEvent,
  RowSkippedEvent,
  RowGeocodedEvent,
  RowFailedEvent,
  RequestRetriedEvent,
} from './domain/events/DomainEvents.js';

// Infrastructure adapters (built-in sources and sinks)
export { BufferSource } from './infrastructure/sources/BufferSource.js';
export { FilePathSource } from './infrastructure/sources/FilePathSource.js';
export type { FilePathSourceOptions } from './infrastructure/sources/FilePathSource.js';
export { StreamSource } from './infrastructure/sources/StreamSource.js';
export type { StreamSourceOptions } from './infrastructure/sources/StreamSource.js';
export { BufferSink } from './infrastructure/sinks/BufferSink.js';
export { FilePathSink } from './infrastructure/sinks/FilePathSink.js';
export type { FilePathSinkOptions } from './infrastructure/sinks/FilePathSink.js';
export { StreamSink } from './infrastructure/sinks/StreamSink.js';
export type { StreamSinkOptions } from './infrastructure/sinks/StreamSink.js';
