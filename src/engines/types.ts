/**
 * Tipos y contratos compartidos por el motor de transferencias.
 *
 * Define la sesión FTP mínima que usan DirectoryLister y los downloaders
 * (FtpSession), la fábrica de conexiones que la produce (ConnectionFactory) y
 * el modelo de segmentos de una descarga segmentada. Ambos contratos permiten
 * inyectar sesiones falsas en tests.
 *
 * @module engines/types
 */

import type { ServerEndpoint } from '../../shared/types';
import type { QuotaWriter } from './QuotaWriter';

/**
 * Resultado de una recuperación de datos:
 * - complete: el servidor envió el archivo hasta el final y confirmó con 2xx.
 * - quota: el sink alcanzó su cuota y el cliente cortó la conexión de datos.
 *   La sesión queda cerrada tras este resultado.
 */
export type RetrieveOutcome = 'complete' | 'quota';

/** Sesión de control autenticada. Un solo comando en curso a la vez. */
export interface FtpSession {
  /** Servidor al que está conectada; permite abrir sesiones hermanas para reintentos. */
  readonly endpoint: ServerEndpoint;
  readonly closed: boolean;
  pwd(): Promise<string>;
  cd(path: string): Promise<void>;
  /** SIZE; rechaza con el error del servidor si no lo soporta o no existe. */
  size(path: string): Promise<number>;
  /** OPTS MLST type;size;modify; → true si el servidor lo acepta. */
  probeStructuredListing(): Promise<boolean>;
  /** Líneas crudas de MLSD del directorio actual. */
  listStructured(): Promise<string[]>;
  /** Nombres de NLST del directorio actual. */
  listNames(): Promise<string[]>;
  /** REST offset (si > 0) + RETR remotePath volcando en sink. */
  retrieve(remotePath: string, offset: number, sink: QuotaWriter): Promise<RetrieveOutcome>;
  close(): void;
}

/** Produce sesiones autenticadas; el llamador es dueño de la sesión y debe cerrarla. */
export interface ConnectionFactory {
  connect(endpoint: ServerEndpoint): Promise<FtpSession>;
}

/** Estados posibles de un segmento durante una descarga segmentada. */
export const SegmentState = Object.freeze({
  PENDING: 'pending',
  DOWNLOADING: 'downloading',
  COMPLETED: 'completed',
  FAILED: 'failed',
} as const);

export type SegmentStateType = (typeof SegmentState)[keyof typeof SegmentState];

/** Rango de bytes asignado a un worker. Lo posee en exclusiva durante la transferencia. */
export interface Segment {
  id: number;
  startOffset: number;
  length: number;
  tempFilePath: string;
  /** Marca máxima de bytes recibidos; nunca decrece, ni entre reintentos. */
  bytesReceived: number;
  state: SegmentStateType;
  attempts: number;
}
