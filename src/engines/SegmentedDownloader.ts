/**
 * Descarga segmentada: N rangos de bytes en paralelo, cada uno con su propia
 * conexión y su archivo temporal, fusionados al final en orden de índice.
 *
 * Cada worker pide el archivo desde el inicio de su segmento y deja de escribir
 * al llenar su cuota; la sesión corta entonces la conexión de datos. Un intento
 * fallido vacía el temporal y vuelve a empezar desde el offset original del
 * segmento. El merge solo empieza cuando todos los segmentos han terminado bien.
 *
 * @module engines/SegmentedDownloader
 */

import { promises as fs } from 'fs';
import config, { MAX_SEGMENTS } from '../config';
import type { AppConfig } from '../configTypes';
import type { SegmentProgressCallback, ServerEndpoint } from '../../shared/types';
import { SEGMENT_ERRORS, TRANSFER_ERRORS } from '../constants/errors';
import { logger } from '../utils';
import { ensureParentDirectory } from '../utils/fileHelpers';
import {
  PartialFailureError,
  TransferCancelledError,
  TransferError,
  type FailedSegment,
} from './errors';
import FileAssembler from './FileAssembler';
import defaultConnectionFactory from './FtpConnectionFactory';
import { QuotaWriter } from './QuotaWriter';
import { runWithRetry, type RetryInfo } from './RetryPolicy';
import SegmentStore from './SegmentStore';
import { SegmentState, type ConnectionFactory, type FtpSession, type Segment } from './types';

const log = logger.child('Segmented');

/** Limita count a [1, maxSegments] (y nunca por encima del tope fijo). */
export function clampSegmentCount(count: number, maxSegments: number = MAX_SEGMENTS): number {
  const upper = Math.max(1, Math.min(Math.floor(maxSegments), MAX_SEGMENTS));
  if (!Number.isFinite(count)) return 1;
  return Math.min(upper, Math.max(1, Math.floor(count)));
}

/**
 * Divide totalSize en segmentos de ceil(totalSize / n) bytes; el último se acorta
 * para encajar y los de longitud ≤ 0 se omiten.
 */
export function partitionSegments(
  totalSize: number,
  segmentCount: number,
  localPath: string,
  maxSegments: number = MAX_SEGMENTS,
  store: SegmentStore = new SegmentStore()
): Segment[] {
  const count = clampSegmentCount(segmentCount, maxSegments);
  const segmentSize = Math.ceil(totalSize / count);
  const segments: Segment[] = [];
  for (let i = 0; i < count; i++) {
    const startOffset = i * segmentSize;
    const length = Math.min(segmentSize, totalSize - startOffset);
    if (length <= 0) continue;
    segments.push({
      id: i,
      startOffset,
      length,
      tempFilePath: store.getPartPath(localPath, i),
      bytesReceived: 0,
      state: SegmentState.PENDING,
      attempts: 0,
    });
  }
  return segments;
}

export interface SegmentedDownloaderDeps {
  connectionFactory?: ConnectionFactory;
  config?: AppConfig;
  segmentStore?: SegmentStore;
  fileAssembler?: FileAssembler;
  sleep?: (_ms: number) => Promise<void>;
}

export interface SegmentRetryInfo extends RetryInfo {
  segmentId: number;
}

export interface SegmentedOptions {
  signal?: AbortSignal;
  onRetry?: (_info: SegmentRetryInfo) => void;
}

export interface SegmentedResult {
  bytesWritten: number;
  segments: Segment[];
}

/** Estado que recibe cada intento de un worker. */
interface SegmentAttemptState {
  attempt: number;
  segment: Segment;
  endpoint: ServerEndpoint;
  remotePath: string;
  onSegmentProgress: SegmentProgressCallback | undefined;
  signal: AbortSignal | undefined;
}

export class SegmentedDownloader {
  private readonly connectionFactory: ConnectionFactory;
  private readonly config: AppConfig;
  private readonly segmentStore: SegmentStore;
  private readonly fileAssembler: FileAssembler;
  private readonly sleep: ((_ms: number) => Promise<void>) | undefined;

  constructor(deps: SegmentedDownloaderDeps = {}) {
    this.connectionFactory = deps.connectionFactory ?? defaultConnectionFactory;
    this.config = deps.config ?? config;
    this.segmentStore = deps.segmentStore ?? new SegmentStore();
    this.fileAssembler =
      deps.fileAssembler ??
      new FileAssembler(this.segmentStore, {
        bufferSize: this.config.transfer.blockSize,
        cleanup: this.config.transfer.cleanupOnComplete,
      });
    this.sleep = deps.sleep;
  }

  /**
   * @throws PartialFailureError si algún segmento agotó sus reintentos (temporales conservados).
   * @throws TransferCancelledError si signal se dispara.
   */
  async download(
    endpoint: ServerEndpoint,
    remotePath: string,
    localPath: string,
    totalSize: number,
    segmentCount: number,
    onSegmentProgress?: SegmentProgressCallback,
    options: SegmentedOptions = {}
  ): Promise<SegmentedResult> {
    await ensureParentDirectory(localPath);
    const segments = partitionSegments(
      totalSize,
      segmentCount,
      localPath,
      this.config.transfer.maxSegments,
      this.segmentStore
    );
    log.info(
      `${remotePath}: ${totalSize} bytes en ${segments.length} segmentos`,
      segments.map(s => `[${s.startOffset},${s.startOffset + s.length})`).join(' ')
    );

    const results = await Promise.allSettled(
      segments.map(segment =>
        this.runSegment(segment, endpoint, remotePath, onSegmentProgress, options)
      )
    );

    const failed: FailedSegment[] = [];
    let cancelled: TransferCancelledError | null = null;
    for (let i = 0; i < results.length; i++) {
      const result = results[i];
      if (result.status === 'fulfilled') continue;
      const error =
        result.reason instanceof Error ? result.reason : new Error(String(result.reason));
      if (error instanceof TransferCancelledError) {
        cancelled = error;
        continue;
      }
      failed.push({ segmentId: segments[i].id, error });
    }

    if (cancelled) throw cancelled;
    if (failed.length > 0) {
      log.error(
        `${remotePath}: ${failed.length}/${segments.length} segmentos fallidos, temporales conservados`
      );
      throw new PartialFailureError(SEGMENT_ERRORS.PARTIAL_FAILURE, failed);
    }

    const assembled = await this.fileAssembler.assemble(
      segments.map(s => ({ index: s.id, path: s.tempFilePath })),
      localPath,
      totalSize
    );
    log.info(`${remotePath}: ${assembled.bytesProcessed} bytes fusionados en ${localPath}`);
    return { bytesWritten: assembled.bytesProcessed, segments };
  }

  private runSegment(
    segment: Segment,
    endpoint: ServerEndpoint,
    remotePath: string,
    onSegmentProgress: SegmentProgressCallback | undefined,
    options: SegmentedOptions
  ): Promise<void> {
    const { signal, onRetry } = options;
    const { downloadRetries, downloadRetryDelayMs } = this.config.transfer;
    const label = `Segmento ${segment.id}`;
    return runWithRetry(
      attempt =>
        this.runSegmentAttempt({
          attempt,
          segment,
          endpoint,
          remotePath,
          onSegmentProgress,
          signal,
        }),
      {
        attempts: downloadRetries,
        baseDelayMs: downloadRetryDelayMs,
        label,
        signal,
        sleep: this.sleep,
        onRetry: info => onRetry?.({ ...info, segmentId: segment.id }),
        toError: (error, attempts) =>
          new TransferError(`${SEGMENT_ERRORS.SEGMENT_FAILED} ${segment.id}`, {
            attempts,
            cause: error,
          }),
      }
    ).then(
      () => {
        segment.state = SegmentState.COMPLETED;
      },
      (error: unknown) => {
        segment.state = SegmentState.FAILED;
        throw error;
      }
    );
  }

  private async runSegmentAttempt(state: SegmentAttemptState): Promise<void> {
    const { attempt, segment, endpoint, remotePath, onSegmentProgress, signal } = state;
    segment.attempts = attempt;
    segment.state = SegmentState.DOWNLOADING;

    // 'w' vacía el temporal: un intento nunca continúa los bytes del anterior.
    const handle = await fs.open(segment.tempFilePath, 'w');
    let session: FtpSession | null = null;
    try {
      session = await this.connectionFactory.connect(endpoint);
      const attemptStart = Date.now();
      let received = 0;

      const sink = new QuotaWriter(handle, {
        quota: segment.length,
        signal,
        onData: bytes => {
          received += bytes;
          segment.bytesReceived = Math.max(segment.bytesReceived, received);
          const elapsed = Math.max(1e-6, (Date.now() - attemptStart) / 1000);
          onSegmentProgress?.({
            segmentId: segment.id,
            bytesReceived: segment.bytesReceived,
            quotaLength: segment.length,
            speedBytesPerSecond: received / elapsed,
          });
        },
      });

      log.debug(
        `Segmento ${segment.id}: intento ${attempt} desde offset ${segment.startOffset} (${segment.length} bytes)`
      );
      const outcome = await session.retrieve(remotePath, segment.startOffset, sink);

      if (sink.bytesWritten < segment.length) {
        throw new Error(
          `${SEGMENT_ERRORS.SHORT_READ} (${sink.bytesWritten}/${segment.length} bytes, ${outcome})`
        );
      }
      log.debug(`Segmento ${segment.id}: completo (${outcome})`);
    } catch (error) {
      if (signal?.aborted && !(error instanceof TransferCancelledError)) {
        throw new TransferCancelledError(TRANSFER_ERRORS.CANCELLED, { cause: error });
      }
      throw error;
    } finally {
      session?.close();
      await handle.close();
    }
  }
}

const segmentedDownloader = new SegmentedDownloader();
export default segmentedDownloader;
