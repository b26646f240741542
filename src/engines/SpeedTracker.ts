/**
 * Velocidad y ETA por transferencia (o por segmento) desde el inicio del intento actual.
 *
 * startTracking fija la línea base (instante y bytes ya presentes); cada reintento
 * vuelve a llamarlo para que la velocidad mida solo lo recibido en ese intento.
 * update() devuelve bytes/s y segundos restantes (0 si no hay velocidad o total).
 *
 * @module engines/SpeedTracker
 */

export interface SpeedTrackerEntry {
  attemptStartTime: number;
  baselineBytes: number;
}

export interface SpeedUpdateResult {
  speedBytesPerSec: number;
  remainingTime: number;
}

/** Tiempo mínimo considerado para no dividir por cero al primer chunk. */
const MIN_ELAPSED_SECONDS = 1e-6;

export class SpeedTracker {
  private trackers = new Map<string, SpeedTrackerEntry>();
  private readonly now: () => number;

  constructor(now: () => number = Date.now) {
    this.now = now;
  }

  /** Reinicia la línea base de `key`: bytes presentes al empezar el intento. */
  startTracking(key: string, baselineBytes = 0): void {
    this.trackers.set(key, {
      attemptStartTime: this.now(),
      baselineBytes: Math.max(0, baselineBytes),
    });
  }

  /**
   * @param transferredBytes - Bytes totales acumulados (incluye la línea base).
   * @param totalBytes - Tamaño total; 0 si es desconocido.
   */
  update(key: string, transferredBytes: number, totalBytes: number): SpeedUpdateResult | null {
    const tracker = this.trackers.get(key);
    if (!tracker) return null;

    const elapsed = Math.max(MIN_ELAPSED_SECONDS, (this.now() - tracker.attemptStartTime) / 1000);
    const speedBytesPerSec = Math.max(0, transferredBytes - tracker.baselineBytes) / elapsed;

    let remainingTime = 0;
    if (totalBytes > 0 && speedBytesPerSec > 0) {
      remainingTime = Math.max(0, totalBytes - transferredBytes) / speedBytesPerSec;
    }

    return { speedBytesPerSec, remainingTime };
  }

  stopTracking(key: string): void {
    this.trackers.delete(key);
  }
}

export default SpeedTracker;
