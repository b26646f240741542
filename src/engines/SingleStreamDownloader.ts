/**
 * Descarga reanudable de un archivo completo por una sola conexión.
 *
 * El offset de reanudación es siempre el tamaño actual en disco, leído al
 * empezar cada intento. El primer intento usa la sesión del llamador; los
 * reintentos abren una sesión nueva con la fábrica de conexiones y la cierran
 * al terminar, sin reutilizar una conexión que puede estar muerta.
 *
 * @module engines/SingleStreamDownloader
 */

import { promises as fs } from 'fs';
import type { FileHandle } from 'fs/promises';
import config from '../config';
import type { AppConfig } from '../configTypes';
import type { ProgressCallback, TransferProgress } from '../../shared/types';
import { SEGMENT_ERRORS, TRANSFER_ERRORS } from '../constants/errors';
import { logger } from '../utils';
import { ensureParentDirectory, getLocalFileSize } from '../utils/fileHelpers';
import { TransferError, describeCause } from './errors';
import defaultConnectionFactory from './FtpConnectionFactory';
import { QuotaWriter } from './QuotaWriter';
import { runWithRetry, type RetryInfo } from './RetryPolicy';
import { SpeedTracker } from './SpeedTracker';
import type { ConnectionFactory, FtpSession } from './types';

const log = logger.child('SingleStream');

export interface SingleStreamDownloaderDeps {
  connectionFactory?: ConnectionFactory;
  config?: AppConfig;
  speedTracker?: SpeedTracker;
  sleep?: (_ms: number) => Promise<void>;
}

export interface SingleStreamOptions {
  signal?: AbortSignal;
  onRetry?: (_info: RetryInfo) => void;
}

export interface SingleStreamResult {
  bytesTransferred: number;
  /** null si el servidor no informó el tamaño. */
  totalBytes: number | null;
  /** true si el archivo local ya estaba completo. */
  skipped: boolean;
  attempts: number;
}

/** Estado que recibe cada intento; nada se captura entre intentos. */
interface AttemptState {
  attempt: number;
  session: FtpSession;
  remotePath: string;
  localPath: string;
  remoteSize: number | null;
  onProgress: ProgressCallback | undefined;
  signal: AbortSignal | undefined;
}

export class SingleStreamDownloader {
  private readonly connectionFactory: ConnectionFactory;
  private readonly config: AppConfig;
  private readonly speedTracker: SpeedTracker;
  private readonly sleep: ((_ms: number) => Promise<void>) | undefined;

  constructor(deps: SingleStreamDownloaderDeps = {}) {
    this.connectionFactory = deps.connectionFactory ?? defaultConnectionFactory;
    this.config = deps.config ?? config;
    this.speedTracker = deps.speedTracker ?? new SpeedTracker();
    this.sleep = deps.sleep;
  }

  /**
   * Descarga remotePath en localPath continuando desde lo que ya haya en disco.
   *
   * @throws TransferError tras agotar transfer.downloadRetries intentos; el archivo parcial se conserva.
   * @throws TransferCancelledError si signal se dispara.
   */
  async download(
    session: FtpSession,
    remotePath: string,
    localPath: string,
    onProgress?: ProgressCallback,
    options: SingleStreamOptions = {}
  ): Promise<SingleStreamResult> {
    await ensureParentDirectory(localPath);
    const remoteSize = await this.querySize(session, remotePath);
    const localSize = await getLocalFileSize(localPath);

    if (remoteSize !== null && localSize >= remoteSize) {
      log.info(`${localPath} ya está completo (${localSize}/${remoteSize} bytes)`);
      onProgress?.({
        bytesTransferred: remoteSize,
        totalBytes: remoteSize,
        speedBytesPerSecond: 0,
        etaSeconds: 0,
      });
      return { bytesTransferred: remoteSize, totalBytes: remoteSize, skipped: true, attempts: 0 };
    }

    const { downloadRetries, downloadRetryDelayMs } = this.config.transfer;
    const endOperation = log.startOperation(`Descarga ${remotePath}`);
    let attemptsMade = 0;
    try {
      await runWithRetry(
        attempt => {
          attemptsMade = attempt;
          return this.runAttempt({
            attempt,
            session,
            remotePath,
            localPath,
            remoteSize,
            onProgress,
            signal: options.signal,
          });
        },
        {
          attempts: downloadRetries,
          baseDelayMs: downloadRetryDelayMs,
          label: `Descarga ${remotePath}`,
          signal: options.signal,
          sleep: this.sleep,
          onRetry: options.onRetry,
          toError: (error, attempts) =>
            new TransferError(`${TRANSFER_ERRORS.DOWNLOAD_FAILED} ${remotePath}`, {
              attempts,
              cause: error,
            }),
        }
      );
    } finally {
      this.speedTracker.stopTracking(localPath);
    }

    const bytesTransferred = await getLocalFileSize(localPath);
    endOperation(`${bytesTransferred} bytes en ${attemptsMade} intento(s)`);
    return { bytesTransferred, totalBytes: remoteSize, skipped: false, attempts: attemptsMade };
  }

  private async querySize(session: FtpSession, remotePath: string): Promise<number | null> {
    try {
      return await session.size(remotePath);
    } catch (error) {
      log.debug(`SIZE no disponible para ${remotePath}: ${describeCause(error)}`);
      return null;
    }
  }

  private async runAttempt(state: AttemptState): Promise<void> {
    const { attempt, remotePath, localPath, remoteSize, onProgress, signal } = state;
    const offset = await getLocalFileSize(localPath);
    if (remoteSize !== null && offset >= remoteSize) return;

    const ownedSession =
      attempt > 1 || state.session.closed
        ? await this.connectionFactory.connect(state.session.endpoint)
        : null;
    const session = ownedSession ?? state.session;
    let handle: FileHandle | null = null;
    try {
      handle = await fs.open(localPath, 'a');
      log.debug(`${remotePath}: intento ${attempt} desde offset ${offset}`);
      this.speedTracker.startTracking(localPath, offset);
      const total = remoteSize ?? 0;
      const intervalMs = this.config.transfer.progressIntervalMs;
      let transferred = offset;
      let lastEmit = 0;

      const sink = new QuotaWriter(handle, {
        signal,
        onData: bytes => {
          transferred += bytes;
          const now = Date.now();
          if (intervalMs > 0 && now - lastEmit < intervalMs && transferred !== total) return;
          lastEmit = now;
          onProgress?.(this.snapshot(localPath, transferred, total));
        },
      });

      await session.retrieve(remotePath, offset, sink);

      if (remoteSize !== null && transferred < remoteSize) {
        throw new Error(`${SEGMENT_ERRORS.SHORT_READ} (${transferred}/${remoteSize} bytes)`);
      }
    } finally {
      await handle?.close();
      ownedSession?.close();
    }
  }

  private snapshot(key: string, transferred: number, total: number): TransferProgress {
    const speed = this.speedTracker.update(key, transferred, total);
    return {
      bytesTransferred: transferred,
      totalBytes: total,
      speedBytesPerSecond: speed?.speedBytesPerSec ?? 0,
      etaSeconds: speed?.remainingTime ?? 0,
    };
  }
}

const singleStreamDownloader = new SingleStreamDownloader();
export default singleStreamDownloader;
