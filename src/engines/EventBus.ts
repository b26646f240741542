/**
 * Bus de eventos del motor de transferencias hacia el colaborador.
 *
 * Emite: transfer:started, transfer:progress, segment:progress, segment:retry,
 * transfer:completed, transfer:failed. Cada payload lleva la ruta remota como
 * identificador y un timestamp.
 *
 * @module EventBus
 */

import EventEmitter from 'events';
import type {
  SegmentProgress,
  TransferMode,
  TransferProgress,
  TransferResult,
} from '../../shared/types';
import { describeCause } from './errors';

export interface TransferStartedPayload {
  remotePath: string;
  localPath: string;
  mode: Exclude<TransferMode, 'auto'>;
  totalBytes: number | null;
  timestamp: number;
}

export interface TransferProgressPayload extends TransferProgress {
  remotePath: string;
  timestamp: number;
}

export interface SegmentProgressPayload extends SegmentProgress {
  remotePath: string;
  timestamp: number;
}

export interface SegmentRetryPayload {
  remotePath: string;
  segmentId: number;
  attempt: number;
  attempts: number;
  delayMs: number;
  error: string;
  timestamp: number;
}

export interface TransferCompletedPayload extends TransferResult {
  remotePath: string;
  timestamp: number;
}

export interface TransferFailedPayload {
  remotePath: string;
  error: string;
  /** Segmentos fallidos si la descarga era segmentada. */
  failedSegments: number[];
  timestamp: number;
}

export interface EngineEvents {
  'transfer:started': [TransferStartedPayload];
  'transfer:progress': [TransferProgressPayload];
  'segment:progress': [SegmentProgressPayload];
  'segment:retry': [SegmentRetryPayload];
  'transfer:completed': [TransferCompletedPayload];
  'transfer:failed': [TransferFailedPayload];
}

class EventBus extends EventEmitter<EngineEvents> {
  constructor() {
    super();
    this.setMaxListeners(100);
  }

  emitTransferStarted(
    remotePath: string,
    localPath: string,
    mode: Exclude<TransferMode, 'auto'>,
    totalBytes: number | null
  ): void {
    this.emit('transfer:started', { remotePath, localPath, mode, totalBytes, timestamp: Date.now() });
  }

  emitTransferProgress(remotePath: string, progress: TransferProgress): void {
    this.emit('transfer:progress', { remotePath, ...progress, timestamp: Date.now() });
  }

  emitSegmentProgress(remotePath: string, progress: SegmentProgress): void {
    this.emit('segment:progress', { remotePath, ...progress, timestamp: Date.now() });
  }

  emitSegmentRetry(
    remotePath: string,
    segmentId: number,
    retry: { attempt: number; attempts: number; delayMs: number; error: unknown }
  ): void {
    this.emit('segment:retry', {
      remotePath,
      segmentId,
      attempt: retry.attempt,
      attempts: retry.attempts,
      delayMs: retry.delayMs,
      error: describeCause(retry.error),
      timestamp: Date.now(),
    });
  }

  emitTransferCompleted(remotePath: string, result: TransferResult): void {
    this.emit('transfer:completed', { remotePath, ...result, timestamp: Date.now() });
  }

  emitTransferFailed(remotePath: string, error: Error | string, failedSegments: number[] = []): void {
    this.emit('transfer:failed', {
      remotePath,
      error: describeCause(error),
      failedSegments,
      timestamp: Date.now(),
    });
  }

  /** Quita todos los listeners. */
  clear(): void {
    this.removeAllListeners();
  }
}

const eventBus = new EventBus();
export default eventBus;
export { EventBus };
