/**
 * Punto de entrada del colaborador: una sesión de control contra un servidor y
 * las operaciones pwd, list y download sobre ella.
 *
 * download elige la estrategia: 'single' usa la sesión abierta; 'segmented' abre
 * una conexión por segmento; 'auto' segmenta cuando hay más de un segmento pedido
 * y el tamaño conocido supera blockSize × segmentedThresholdBlocks. Los eventos
 * de ciclo de vida salen por EventBus y las líneas para el usuario por onLog.
 *
 * @module engines/TransferEngine
 */

import defaultConfig from '../config';
import type { AppConfig } from '../configTypes';
import type {
  DirectoryEntry,
  LogCallback,
  ServerEndpoint,
  TransferCallbacks,
  TransferMode,
  TransferResult,
} from '../../shared/types';
import { CONNECTION_ERRORS, TRANSFER_ERRORS, VALIDATION_ERRORS } from '../constants/errors';
import { formatBytes, formatProgressLine, logger } from '../utils';
import {
  validateEndpoint,
  validateTransferRequest,
  type EndpointInput,
  type TransferRequestInput,
} from '../utils/schemas';
import { DirectoryLister } from './DirectoryLister';
import { PartialFailureError, TransferError, describeCause } from './errors';
import defaultEventBus, { type EventBus } from './EventBus';
import { FtpConnectionFactory, describeEndpoint } from './FtpConnectionFactory';
import type { RetryInfo } from './RetryPolicy';
import { SegmentedDownloader, type SegmentRetryInfo } from './SegmentedDownloader';
import { SegmentProgressAggregator } from './SegmentProgressAggregator';
import { SingleStreamDownloader } from './SingleStreamDownloader';
import type { ConnectionFactory, FtpSession } from './types';

const log = logger.child('TransferEngine');

export interface TransferEngineDeps {
  config?: AppConfig;
  connectionFactory?: ConnectionFactory;
  directoryLister?: DirectoryLister;
  singleStreamDownloader?: SingleStreamDownloader;
  segmentedDownloader?: SegmentedDownloader;
  eventBus?: EventBus;
}

export type DownloadInput = TransferRequestInput & { signal?: AbortSignal };

interface TransferPlan {
  mode: Exclude<TransferMode, 'auto'>;
  totalSize: number | null;
}

/** Completa el endpoint con los valores por defecto de configuración y lo valida. */
export function resolveEndpoint(input: EndpointInput, config: AppConfig = defaultConfig): ServerEndpoint {
  const result = validateEndpoint(input);
  if (!result.success) {
    throw new Error(`${VALIDATION_ERRORS.INVALID_ENDPOINT}: ${result.error}`);
  }
  const data = result.data;
  return Object.freeze({
    host: data.host,
    port: data.port ?? config.endpointDefaults.port,
    username: data.username,
    password: data.password,
    useEncryptedTransport: data.useEncryptedTransport ?? config.endpointDefaults.useEncryptedTransport,
    passiveMode: data.passiveMode ?? config.endpointDefaults.passiveMode,
  });
}

export class TransferEngine {
  readonly endpoint: ServerEndpoint;
  private readonly config: AppConfig;
  private readonly connectionFactory: ConnectionFactory;
  private readonly directoryLister: DirectoryLister;
  private readonly singleStreamDownloader: SingleStreamDownloader;
  private readonly segmentedDownloader: SegmentedDownloader;
  private readonly eventBus: EventBus;
  private session: FtpSession | null = null;

  /** @throws Error si el endpoint no es válido. */
  constructor(endpoint: EndpointInput, deps: TransferEngineDeps = {}) {
    this.config = deps.config ?? defaultConfig;
    this.endpoint = resolveEndpoint(endpoint, this.config);
    this.connectionFactory =
      deps.connectionFactory ?? new FtpConnectionFactory({ config: this.config });
    this.directoryLister = deps.directoryLister ?? new DirectoryLister({ config: this.config });
    this.singleStreamDownloader =
      deps.singleStreamDownloader ??
      new SingleStreamDownloader({ connectionFactory: this.connectionFactory, config: this.config });
    this.segmentedDownloader =
      deps.segmentedDownloader ??
      new SegmentedDownloader({ connectionFactory: this.connectionFactory, config: this.config });
    this.eventBus = deps.eventBus ?? defaultEventBus;
  }

  get isOpen(): boolean {
    return this.session !== null && !this.session.closed;
  }

  /** Abre la sesión de control si no hay una viva. */
  async open(): Promise<void> {
    await this.ensureSession();
  }

  close(): void {
    this.session?.close();
    this.session = null;
  }

  /** Directorio actual; '/' si el servidor rechaza PWD. */
  async pwd(): Promise<string> {
    const session = await this.ensureSession();
    try {
      return await session.pwd();
    } catch (error) {
      if (session.closed) throw error;
      log.warn(`PWD rechazado, usando '/': ${describeCause(error)}`);
      return '/';
    }
  }

  async list(path: string): Promise<DirectoryEntry[]> {
    const session = await this.ensureSession();
    return this.directoryLister.list(session, path);
  }

  /**
   * Descarga request.remotePath en request.localPath.
   *
   * @throws TransferError, PartialFailureError o TransferCancelledError según la estrategia.
   */
  async download(request: DownloadInput, callbacks: TransferCallbacks = {}): Promise<TransferResult> {
    const validation = validateTransferRequest(request);
    if (!validation.success) {
      throw new Error(`${TRANSFER_ERRORS.INVALID_REQUEST}: ${validation.error}`);
    }
    const { remotePath, localPath, expectedSize, segmentCount, mode } = validation.data;
    const { signal } = request;
    const emitLog = this.createLogForwarder(callbacks.onLog);

    try {
      const session = await this.ensureSession();
      const plan = await this.resolvePlan(session, remotePath, mode, segmentCount, expectedSize);
      this.eventBus.emitTransferStarted(remotePath, localPath, plan.mode, plan.totalSize);
      emitLog(
        `Descargando ${remotePath} → ${localPath} (${plan.mode}, ${formatBytes(plan.totalSize)})`
      );

      const result =
        plan.mode === 'segmented' && plan.totalSize !== null
          ? await this.downloadSegmented(
              remotePath,
              localPath,
              plan.totalSize,
              segmentCount,
              callbacks,
              emitLog,
              signal
            )
          : await this.downloadSingle(session, remotePath, localPath, callbacks, emitLog, signal);

      this.eventBus.emitTransferCompleted(remotePath, result);
      emitLog(
        result.skipped
          ? `${localPath} ya estaba completo`
          : `Descarga completada: ${localPath} (${formatBytes(result.bytesWritten)})`
      );
      return result;
    } catch (error) {
      const failedSegments = error instanceof PartialFailureError ? error.failedSegmentIds : [];
      const message = describeCause(error);
      this.eventBus.emitTransferFailed(remotePath, message, failedSegments);
      emitLog(`Error: ${message}`);
      throw error;
    }
  }

  private async downloadSingle(
    session: FtpSession,
    remotePath: string,
    localPath: string,
    callbacks: TransferCallbacks,
    emitLog: LogCallback,
    signal: AbortSignal | undefined
  ): Promise<TransferResult> {
    const outcome = await this.singleStreamDownloader.download(
      session,
      remotePath,
      localPath,
      progress => {
        this.eventBus.emitTransferProgress(remotePath, progress);
        callbacks.onProgress?.(progress);
        if (progress.totalBytes > 0 && progress.bytesTransferred === progress.totalBytes) {
          log.debug(formatProgressLine(progress));
        }
      },
      {
        signal,
        onRetry: (info: RetryInfo) =>
          emitLog(`Reintento ${info.attempt}/${info.attempts}: ${describeCause(info.error)}`),
      }
    );
    return {
      localPath,
      mode: 'single',
      bytesWritten: outcome.bytesTransferred,
      skipped: outcome.skipped,
    };
  }

  private async downloadSegmented(
    remotePath: string,
    localPath: string,
    totalSize: number,
    segmentCount: number,
    callbacks: TransferCallbacks,
    emitLog: LogCallback,
    signal: AbortSignal | undefined
  ): Promise<TransferResult> {
    const aggregator = new SegmentProgressAggregator(totalSize);
    const outcome = await this.segmentedDownloader.download(
      this.endpoint,
      remotePath,
      localPath,
      totalSize,
      segmentCount,
      progress => {
        this.eventBus.emitSegmentProgress(remotePath, progress);
        callbacks.onSegmentProgress?.(progress);
        if (callbacks.onProgress) {
          const total = aggregator.update(progress);
          this.eventBus.emitTransferProgress(remotePath, total);
          callbacks.onProgress(total);
        }
      },
      {
        signal,
        onRetry: (info: SegmentRetryInfo) => {
          this.eventBus.emitSegmentRetry(remotePath, info.segmentId, info);
          emitLog(
            `[seg ${info.segmentId}] reintento ${info.attempt}/${info.attempts}: ${describeCause(info.error)}`
          );
        },
      }
    );
    return {
      localPath,
      mode: 'segmented',
      bytesWritten: outcome.bytesWritten,
      skipped: false,
    };
  }

  private async resolvePlan(
    session: FtpSession,
    remotePath: string,
    mode: TransferMode,
    segmentCount: number,
    expectedSize: number | undefined
  ): Promise<TransferPlan> {
    if (mode === 'single') {
      return { mode: 'single', totalSize: expectedSize ?? null };
    }
    const totalSize = expectedSize ?? (await this.querySize(session, remotePath));
    if (mode === 'segmented') {
      if (totalSize === null) {
        throw new TransferError(`${TRANSFER_ERRORS.SIZE_UNKNOWN}: ${remotePath}`);
      }
      return { mode: 'segmented', totalSize };
    }
    const { blockSize, segmentedThresholdBlocks } = this.config.transfer;
    const useSegments =
      segmentCount > 1 && totalSize !== null && totalSize > blockSize * segmentedThresholdBlocks;
    return { mode: useSegments ? 'segmented' : 'single', totalSize };
  }

  private async querySize(session: FtpSession, remotePath: string): Promise<number | null> {
    try {
      return await session.size(remotePath);
    } catch (error) {
      if (session.closed) throw error;
      log.debug(`SIZE rechazado para ${remotePath}: ${describeCause(error)}`);
      return null;
    }
  }

  private async ensureSession(): Promise<FtpSession> {
    if (this.session && !this.session.closed) return this.session;
    if (this.session) {
      log.info(`${CONNECTION_ERRORS.SESSION_CLOSED}, reconectando a ${describeEndpoint(this.endpoint)}`);
    }
    this.session = await this.connectionFactory.connect(this.endpoint);
    return this.session;
  }

  private createLogForwarder(onLog: LogCallback | undefined): LogCallback {
    return (message: string) => {
      log.info(message);
      onLog?.(message);
    };
  }
}

export default TransferEngine;
