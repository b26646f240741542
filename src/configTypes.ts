/**
 * Tipos para la configuración centralizada del motor de transferencias.
 *
 * La implementación concreta y valores por defecto están en config.ts.
 */
export interface NetworkConfig {
  /** Timeout de sockets (control y datos), en segundos. */
  timeoutSeconds: number;
  connectRetries: number;
  /** Base del retraso lineal entre intentos de conexión (ms × intento). */
  connectRetryDelayMs: number;
  /** Espera máxima a que el servidor abra la conexión de datos en modo activo. */
  activeModeAcceptTimeoutMs: number;
  /** Verificar el certificado del servidor en TLS explícito. */
  verifyTlsCertificates: boolean;
}

export interface ListingConfig {
  listRetries: number;
  listRetryDelayMs: number;
}

export interface TransferConfig {
  downloadRetries: number;
  downloadRetryDelayMs: number;
  /** Tamaño de bloque de lectura/escritura local. */
  blockSize: number;
  /** Tope de segmentos concurrentes (nunca mayor que MAX_SEGMENTS). */
  maxSegments: number;
  /** En modo 'auto' se segmenta si el tamaño supera blockSize × este valor. */
  segmentedThresholdBlocks: number;
  /** Intervalo mínimo entre snapshots de progreso; 0 emite en cada chunk. */
  progressIntervalMs: number;
  /** Borrar archivos .partN tras un merge correcto. */
  cleanupOnComplete: boolean;
}

export interface EndpointDefaults {
  port: number;
  useEncryptedTransport: boolean;
  passiveMode: boolean;
}

export type LogLevelName = 'error' | 'warn' | 'info' | 'verbose' | 'debug' | 'silly';

export interface LoggingConfig {
  fileLevel: LogLevelName;
  consoleLevel: LogLevelName;
  maxSize: number;
}

export interface AppConfig {
  network: NetworkConfig;
  listing: ListingConfig;
  transfer: TransferConfig;
  endpointDefaults: EndpointDefaults;
  logging: LoggingConfig;
}

export type AppConfigOverrides = {
  [K in keyof AppConfig]?: Partial<AppConfig[K]>;
};
