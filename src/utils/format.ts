/**
 * @fileoverview Formato legible de tamaños, velocidades y ETA para líneas de estado.
 * @module utils/format
 */

import type { TransferProgress } from '../../shared/types';

const UNITS = ['B', 'KB', 'MB', 'GB', 'TB'];

/** "1.50 KB", "12.00 MB"; '?' si el tamaño es desconocido. */
export function formatBytes(bytes: number | null | undefined): string {
  if (bytes === null || bytes === undefined || !Number.isFinite(bytes)) return '?';
  let value = Math.max(0, bytes);
  let i = 0;
  while (value >= 1024 && i < UNITS.length - 1) {
    value /= 1024;
    i++;
  }
  return `${value.toFixed(2)} ${UNITS[i]}`;
}

/** HH:MM:SS; '--:--:--' si no hay estimación. */
export function formatEta(seconds: number): string {
  if (!Number.isFinite(seconds) || seconds <= 0) return '--:--:--';
  const total = Math.floor(seconds);
  const h = Math.floor(total / 3600);
  const m = Math.floor((total % 3600) / 60);
  const s = total % 60;
  return [h, m, s].map(n => String(n).padStart(2, '0')).join(':');
}

/**
 * Línea de estado a partir de un snapshot:
 * "  5.0%  1.00 KB / 20.00 KB  |  512.00 B/s  ETA 00:00:37".
 * Sin tamaño total solo muestra bytes y velocidad.
 */
export function formatProgressLine(progress: TransferProgress): string {
  const speed =
    progress.speedBytesPerSecond > 0
      ? `${formatBytes(Math.floor(progress.speedBytesPerSecond))}/s`
      : '?';
  if (progress.totalBytes > 0) {
    const pct = ((100 * progress.bytesTransferred) / progress.totalBytes).toFixed(1).padStart(5);
    return `${pct}%  ${formatBytes(progress.bytesTransferred)} / ${formatBytes(progress.totalBytes)}  |  ${speed}  ETA ${formatEta(progress.etaSeconds)}`;
  }
  return `${formatBytes(progress.bytesTransferred)}  |  ${speed}`;
}
