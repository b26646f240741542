/**
 * Writable que vuelca los datos recibidos en un archivo local con cuota opcional.
 *
 * Con cuota, el chunk que la sobrepasa se recorta para llenarla exactamente,
 * se emite 'quota' una vez escrito y el resto de datos se descarta. La sesión
 * escucha ese evento para cortar la conexión de datos: es una parada controlada,
 * no un error. La señal de cancelación se consulta en cada chunk.
 *
 * El FileHandle pertenece al llamador, que lo abre y lo cierra.
 *
 * @module engines/QuotaWriter
 */

import { Writable } from 'stream';
import type { FileHandle } from 'fs/promises';
import { TRANSFER_ERRORS } from '../constants/errors';
import { TransferCancelledError } from './errors';

export interface QuotaWriterOptions {
  /** Máximo de bytes a escribir; null = sin límite. */
  quota?: number | null;
  signal?: AbortSignal;
  /** Se llama tras escribir cada porción con los bytes escritos. */
  onData?: (_bytes: number) => void;
}

export class QuotaWriter extends Writable {
  private readonly handle: FileHandle;
  private readonly quota: number | null;
  private readonly signal: AbortSignal | undefined;
  private readonly onData: ((_bytes: number) => void) | undefined;
  private _bytesWritten = 0;
  private _quotaReached = false;

  constructor(handle: FileHandle, options: QuotaWriterOptions = {}) {
    super();
    this.handle = handle;
    this.quota = options.quota ?? null;
    this.signal = options.signal;
    this.onData = options.onData;
    if (this.quota !== null && this.quota <= 0) {
      this._quotaReached = true;
    }
  }

  get bytesWritten(): number {
    return this._bytesWritten;
  }

  get quotaReached(): boolean {
    return this._quotaReached;
  }

  /** Bytes que faltan para la cuota; Infinity sin cuota. */
  get remaining(): number {
    return this.quota === null ? Infinity : this.quota - this._bytesWritten;
  }

  override _write(
    chunk: Buffer,
    _encoding: BufferEncoding,
    callback: (_error?: Error | null) => void
  ): void {
    if (this.signal?.aborted) {
      callback(new TransferCancelledError(TRANSFER_ERRORS.CANCELLED));
      return;
    }
    if (this._quotaReached) {
      callback();
      return;
    }
    const data = chunk.length > this.remaining ? chunk.subarray(0, this.remaining) : chunk;
    this.writeFully(data).then(
      () => {
        this._bytesWritten += data.length;
        this.onData?.(data.length);
        if (this.quota !== null && this._bytesWritten >= this.quota) {
          this._quotaReached = true;
          this.emit('quota');
        }
        callback();
      },
      (error: unknown) => {
        callback(error instanceof Error ? error : new Error(String(error)));
      }
    );
  }

  private async writeFully(data: Buffer): Promise<void> {
    let offset = 0;
    while (offset < data.length) {
      const { bytesWritten } = await this.handle.write(data, offset, data.length - offset);
      offset += bytesWritten;
    }
  }
}
