/**
 * Punto de entrada del motor de transferencias: reexporta TransferEngine, la fábrica
 * de conexiones, DirectoryLister, los downloaders, la política de reintentos,
 * EventBus, SpeedTracker, los errores y los tipos compartidos.
 *
 * @module engines
 */

export { default as TransferEngine, resolveEndpoint } from './TransferEngine';
export type { TransferEngineDeps, DownloadInput } from './TransferEngine';
export { default as eventBus, EventBus } from './EventBus';
export type {
  EngineEvents,
  TransferStartedPayload,
  TransferProgressPayload,
  SegmentProgressPayload,
  SegmentRetryPayload,
  TransferCompletedPayload,
  TransferFailedPayload,
} from './EventBus';
export { SpeedTracker } from './SpeedTracker';
export type { SpeedUpdateResult } from './SpeedTracker';
export { default as connectionFactory, FtpConnectionFactory, describeEndpoint } from './FtpConnectionFactory';
export type { FtpConnectionFactoryDeps } from './FtpConnectionFactory';
export { BasicFtpSession } from './BasicFtpSession';
export { ActiveDataChannel, buildPortCommand } from './DataChannel';
export {
  default as directoryLister,
  DirectoryLister,
  parseStructuredLine,
  compareEntries,
  sortEntries,
} from './DirectoryLister';
export { default as singleStreamDownloader, SingleStreamDownloader } from './SingleStreamDownloader';
export type { SingleStreamOptions, SingleStreamResult } from './SingleStreamDownloader';
export {
  default as segmentedDownloader,
  SegmentedDownloader,
  partitionSegments,
  clampSegmentCount,
} from './SegmentedDownloader';
export type { SegmentedOptions, SegmentedResult, SegmentRetryInfo } from './SegmentedDownloader';
export { SegmentProgressAggregator } from './SegmentProgressAggregator';
export { default as FileAssembler } from './FileAssembler';
export type { PartToAssemble, AssembleResult } from './FileAssembler';
export { default as SegmentStore } from './SegmentStore';
export { QuotaWriter } from './QuotaWriter';
export { runWithRetry, calculateBackoffDelay } from './RetryPolicy';
export type { RetryInfo, RetryOptions } from './RetryPolicy';
export {
  FtpEngineError,
  ConnectionError,
  ProtocolError,
  TransferError,
  TransferCancelledError,
  PartialFailureError,
} from './errors';
export type { FailedSegment } from './errors';
export { SegmentState } from './types';
export type {
  FtpSession,
  ConnectionFactory,
  RetrieveOutcome,
  Segment,
  SegmentStateType,
} from './types';
