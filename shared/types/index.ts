/**
 * @fileoverview Tipos compartidos entre el motor de transferencias y sus colaboradores.
 * @module shared/types
 *
 * El colaborador (interfaz de usuario, CLI, etc.) entrega un ServerEndpoint y una
 * TransferRequest y recibe snapshots de progreso por callback. Ninguno de estos
 * valores se persiste.
 */

/** Servidor FTP de una sesión. Inmutable durante la vida de la sesión. */
export interface ServerEndpoint {
  readonly host: string;
  readonly port: number;
  readonly username: string;
  readonly password: string;
  /** TLS explícito (AUTH TLS) y canal de datos protegido tras autenticarse. */
  readonly useEncryptedTransport: boolean;
  /** true: el cliente abre la conexión de datos (PASV/EPSV). false: modo activo (PORT). */
  readonly passiveMode: boolean;
}

export type EntryKind = 'file' | 'dir';

export interface DirectoryEntry {
  name: string;
  kind: EntryKind;
  /** Entero no negativo; null si el servidor no lo informa. */
  size: number | null;
  /** Valor crudo del fact `modify` (YYYYMMDDhhmmss[.sss]); null si no hay. */
  modifiedTimestamp: string | null;
}

export type TransferMode = 'auto' | 'single' | 'segmented';

export interface TransferRequest {
  remotePath: string;
  localPath: string;
  expectedSize?: number;
  segmentCount: number;
  /** 'auto' por defecto: segmenta si segmentCount > 1 y el tamaño supera el umbral. */
  mode?: TransferMode;
  /** Parada opcional; se consulta entre chunks. */
  signal?: AbortSignal;
}

export interface TransferProgress {
  bytesTransferred: number;
  /** 0 si el tamaño remoto es desconocido. */
  totalBytes: number;
  speedBytesPerSecond: number;
  etaSeconds: number;
}

export interface SegmentProgress {
  segmentId: number;
  bytesReceived: number;
  quotaLength: number;
  speedBytesPerSecond: number;
}

export type ProgressCallback = (_progress: TransferProgress) => void;
export type SegmentProgressCallback = (_progress: SegmentProgress) => void;
export type LogCallback = (_message: string) => void;

export interface TransferCallbacks {
  onProgress?: ProgressCallback;
  onSegmentProgress?: SegmentProgressCallback;
  onLog?: LogCallback;
}

export interface TransferResult {
  localPath: string;
  mode: Exclude<TransferMode, 'auto'>;
  bytesWritten: number;
  /** true si el archivo local ya estaba completo y no hubo lectura de red. */
  skipped: boolean;
}
