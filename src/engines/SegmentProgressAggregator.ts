/**
 * Suma el progreso de los segmentos de una descarga en un TransferProgress.
 *
 * Cada segmento informa su propia marca máxima de bytes; el agregado es la suma
 * de esas marcas y la velocidad es la suma de las velocidades instantáneas.
 * Los callbacks llegan desde workers concurrentes en el mismo hilo, así que no
 * hace falta sincronización.
 *
 * @module SegmentProgressAggregator
 */

import type { SegmentProgress, TransferProgress } from '../../shared/types';

interface SegmentEntry {
  bytesReceived: number;
  quotaLength: number;
  speedBytesPerSecond: number;
}

export class SegmentProgressAggregator {
  private readonly totalBytes: number;
  private segments = new Map<number, SegmentEntry>();

  constructor(totalBytes: number) {
    this.totalBytes = Math.max(0, totalBytes);
  }

  /** Registra un snapshot de segmento y devuelve el agregado actualizado. */
  update(progress: SegmentProgress): TransferProgress {
    const previous = this.segments.get(progress.segmentId);
    this.segments.set(progress.segmentId, {
      bytesReceived: Math.max(previous?.bytesReceived ?? 0, progress.bytesReceived),
      quotaLength: progress.quotaLength,
      speedBytesPerSecond: progress.speedBytesPerSecond,
    });
    return this.snapshot();
  }

  snapshot(): TransferProgress {
    let bytesTransferred = 0;
    let speedBytesPerSecond = 0;
    for (const entry of this.segments.values()) {
      bytesTransferred += Math.min(entry.bytesReceived, entry.quotaLength);
      speedBytesPerSecond += entry.speedBytesPerSecond;
    }
    const remaining = Math.max(0, this.totalBytes - bytesTransferred);
    return {
      bytesTransferred,
      totalBytes: this.totalBytes,
      speedBytesPerSecond,
      etaSeconds:
        this.totalBytes > 0 && speedBytesPerSecond > 0 ? remaining / speedBytesPerSecond : 0,
    };
  }
}

export default SegmentProgressAggregator;
