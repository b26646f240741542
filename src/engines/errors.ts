/**
 * Errores que el motor entrega al colaborador.
 *
 * Todos llevan el número de intentos realizados y el error de transporte original
 * (cause), y el mensaje incluye ambos para poder mostrarlo tal cual al usuario.
 *
 * @module engines/errors
 */

export interface EngineErrorOptions {
  attempts?: number;
  cause?: unknown;
}

/** Texto del error original ('' si no hay). */
export function describeCause(cause: unknown): string {
  if (cause === undefined || cause === null) return '';
  if (typeof cause === 'object' && 'message' in cause && typeof cause.message === 'string') {
    return cause.message;
  }
  return String(cause);
}

function composeMessage(base: string, options: EngineErrorOptions): string {
  let message = base;
  if (options.attempts !== undefined) {
    message += ` (${options.attempts} ${options.attempts === 1 ? 'intento' : 'intentos'})`;
  }
  const detail = describeCause(options.cause);
  if (detail) message += `: ${detail}`;
  return message;
}

export class FtpEngineError extends Error {
  readonly attempts: number;

  constructor(message: string, options: EngineErrorOptions = {}) {
    super(composeMessage(message, options), { cause: options.cause });
    this.name = new.target.name;
    this.attempts = options.attempts ?? 0;
  }
}

/** No se pudo conectar o autenticar tras agotar los reintentos. */
export class ConnectionError extends FtpEngineError {}

/** Fallo de listado o de un comando de control. */
export class ProtocolError extends FtpEngineError {}

/** Descarga de flujo único (o de un segmento) agotó sus reintentos. */
export class TransferError extends FtpEngineError {}

/** La transferencia se detuvo por una señal externa. No se reintenta. */
export class TransferCancelledError extends FtpEngineError {}

export interface FailedSegment {
  segmentId: number;
  error: Error;
}

/**
 * Uno o más segmentos fallaron. Los temporales de los segmentos correctos
 * quedan en disco sin fusionar.
 */
export class PartialFailureError extends FtpEngineError {
  readonly failedSegments: FailedSegment[];

  constructor(message: string, failedSegments: FailedSegment[], options: EngineErrorOptions = {}) {
    const ids = failedSegments.map(f => f.segmentId).join(', ');
    const details = failedSegments.map(f => `[seg ${f.segmentId}] ${f.error.message}`).join('; ');
    super(`${message}: segmentos fallidos ${ids}`, {
      ...options,
      cause: options.cause ?? details,
    });
    this.failedSegments = failedSegments;
  }

  get failedSegmentIds(): number[] {
    return this.failedSegments.map(f => f.segmentId);
  }
}
