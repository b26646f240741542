/**
 * Política de reintentos compartida por conexión, listado y descargas.
 *
 * Número fijo de intentos con retraso lineal (base × intento) entre ellos y
 * sin espera tras el último. Todos los fallos cuentan igual, respuestas 5xx
 * incluidas; solo la cancelación corta antes.
 *
 * Cada intento recibe su número para que la operación lea el estado actual
 * (tamaño en disco, contadores) al empezar, en lugar de capturarlo antes del bucle.
 *
 * @module engines/RetryPolicy
 */

import { setTimeout as delay } from 'timers/promises';
import { logger } from '../utils';
import { TRANSFER_ERRORS } from '../constants/errors';
import { TransferCancelledError, describeCause } from './errors';

const log = logger.child('RetryPolicy');

export interface RetryInfo {
  label: string;
  /** Intento que acaba de fallar (1-based). */
  attempt: number;
  attempts: number;
  delayMs: number;
  error: unknown;
}

export interface RetryOptions {
  attempts: number;
  baseDelayMs: number;
  /** Nombre de la operación para logs ("conexión a host:21", "seg 2"). */
  label: string;
  /** Construye el error final a partir del último fallo y los intentos hechos. */
  toError: (_lastError: unknown, _attempts: number) => Error;
  onRetry?: (_info: RetryInfo) => void;
  sleep?: (_ms: number) => Promise<void>;
  signal?: AbortSignal;
}

const defaultSleep = (ms: number): Promise<void> => delay(ms);

/** Retraso antes del intento `attempt + 1`: base × attempt (lineal, no decreciente). */
export function calculateBackoffDelay(baseDelayMs: number, attempt: number): number {
  return Math.max(0, baseDelayMs) * Math.max(1, attempt);
}

function throwIfAborted(signal: AbortSignal | undefined, attempts: number): void {
  if (signal?.aborted) {
    throw new TransferCancelledError(TRANSFER_ERRORS.CANCELLED, { attempts });
  }
}

/**
 * Ejecuta operation hasta `attempts` veces. Devuelve el primer resultado correcto;
 * si se agotan los intentos lanza toError(...). Una cancelación se propaga tal cual.
 */
export async function runWithRetry<T>(
  operation: (_attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const attempts = Math.max(1, Math.floor(options.attempts));
  const sleep = options.sleep ?? defaultSleep;

  let lastError: unknown;
  for (let attempt = 1; attempt <= attempts; attempt++) {
    throwIfAborted(options.signal, attempt - 1);
    try {
      return await operation(attempt);
    } catch (error) {
      if (error instanceof TransferCancelledError) throw error;
      lastError = error;
      if (attempt >= attempts) break;

      const delayMs = calculateBackoffDelay(options.baseDelayMs, attempt);
      log.warn(
        `${options.label}: reintento ${attempt}/${attempts} tras error: ${describeCause(error)} (espera ${delayMs}ms)`
      );
      options.onRetry?.({ label: options.label, attempt, attempts, delayMs, error });
      if (delayMs > 0) await sleep(delayMs);
    }
  }

  throw options.toError(lastError, attempts);
}
